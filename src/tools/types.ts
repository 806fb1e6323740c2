import { z } from "zod";

export interface ToolContext {
  requestId: string;
  now: () => Date;
  logger?: {
    info: (message: string, meta?: unknown) => void;
    warn: (message: string, meta?: unknown) => void;
    error: (message: string, meta?: unknown) => void;
  };
}

export interface ToolDefinition<Input, Output extends object> {
  name: string;
  description: string;
  inputSchema: z.ZodType<Input, z.ZodTypeDef, unknown>;
  outputSchema: z.ZodType<Output, z.ZodTypeDef, unknown>;
  handler: (input: Input, context: ToolContext) => Promise<Output>;
}

/**
 * A tool with its types erased, ready for registration. `invoke` validates
 * the arguments against the input schema before the handler runs.
 */
export interface RegisteredTool {
  name: string;
  description: string;
  inputShape: z.ZodRawShape;
  outputShape: z.ZodRawShape;
  invoke: (args: unknown, context: ToolContext) => Promise<Record<string, unknown>>;
}

function shapeOf(schema: z.ZodTypeAny, toolName: string): z.ZodRawShape {
  if (schema instanceof z.ZodObject) {
    return schema.shape;
  }
  throw new Error(`Tool ${toolName} must describe its input and output with z.object schemas`);
}

export function defineTool<Input, Output extends object>(tool: ToolDefinition<Input, Output>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputShape: shapeOf(tool.inputSchema, tool.name),
    outputShape: shapeOf(tool.outputSchema, tool.name),
    invoke: async (args, context) => {
      const input = tool.inputSchema.parse(args ?? {});
      const output = await tool.handler(input, context);
      return Object.fromEntries(Object.entries(output));
    },
  };
}
