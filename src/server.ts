import { randomUUID } from "node:crypto";
import { createRequire } from "node:module";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  connectToTransport,
  createMcpServer,
  createTransport,
  type McpServer,
  type ServerRequestExtra,
  type TransportStreams,
} from "./framework/mcpServerKit.js";
import { getDataFilePath } from "./data/resultRepository.js";
import { log } from "./logger.js";
import { registerPrompts } from "./prompts/index.js";
import { analyticsSummaryTool } from "./tools/analytics_summary.js";
import { resultsExportTool } from "./tools/results_export.js";
import { settingsGetTool, settingsUpdateTool } from "./tools/settings.js";
import { testGetTool } from "./tools/test_get.js";
import { testListTool } from "./tools/test_list.js";
import { testNotesUpdateTool } from "./tools/test_notes_update.js";
import { testRecordTool } from "./tools/test_record.js";
import type { RegisteredTool, ToolContext } from "./tools/types.js";

// Keep server version in sync with package.json
const require = createRequire(import.meta.url);
const { version: pkgVersion } = z.object({ version: z.string() }).parse(require("../package.json"));
export const SERVER_VERSION = pkgVersion;
export const SERVER_NAME = "meter-accuracy-mcp";

const SERVER_INSTRUCTIONS =
  "Records water-meter field calibration tests. Use test_record for each low- or high-flow test, " +
  "then test_list, analytics_summary and results_export to review and share results.";

const TOOL_REGISTRY: RegisteredTool[] = [
  testRecordTool,
  testGetTool,
  testListTool,
  testNotesUpdateTool,
  analyticsSummaryTool,
  resultsExportTool,
  settingsGetTool,
  settingsUpdateTool,
];

export async function buildServer(streams?: TransportStreams) {
  log({
    level: "info",
    component: "server",
    message: "Building meter accuracy server",
    meta: {
      version: SERVER_VERSION,
      dataPath: getDataFilePath(),
    },
  });

  const server = createMcpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      title: "Meter Accuracy Tester",
    },
    SERVER_INSTRUCTIONS,
  );

  TOOL_REGISTRY.forEach((tool) => registerTool(server, tool));
  await registerDefaultResources(server);
  await registerPrompts(server);

  const transport = createTransport(streams);
  return { server, transport };
}

export async function start(streams?: TransportStreams) {
  const { server, transport } = await buildServer(streams);

  await connectToTransport(server, transport);
}

async function loadFirstAvailable(paths: string[]): Promise<{ path: string; text: string }> {
  for (const candidate of paths) {
    try {
      const text = await readFile(candidate, "utf8");
      return { path: candidate, text };
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw error;
      }
    }
  }

  throw new Error(`Resource not found in any candidate paths: ${paths.join(", ")}`);
}

async function registerDefaultResources(server: McpServer) {
  const moduleDir = fileURLToPath(new URL(".", import.meta.url));
  const projectRoot = resolve(moduleDir, "..");

  const resources = [
    {
      uri: `doc://${SERVER_NAME}/README`,
      name: "Project README",
      description: "Overview of the meter test tools, pass bands and export formats.",
      mimeType: "text/markdown",
      candidates: [resolve(projectRoot, "README.md"), resolve(moduleDir, "README.md")],
    },
  ];

  await Promise.all(
    resources.map(async (resource) => {
      try {
        await loadFirstAvailable(resource.candidates);
        server.registerResource(
          resource.name,
          resource.uri,
          {
            description: resource.description,
            mimeType: resource.mimeType,
          },
          async () => {
            const { text } = await loadFirstAvailable(resource.candidates);
            return {
              contents: [
                {
                  uri: resource.uri,
                  mimeType: resource.mimeType,
                  text,
                },
              ],
            };
          },
        );
      } catch (error) {
        log({
          level: "error",
          component: "resources",
          message: `Failed to register resource ${resource.uri}`,
          meta: { error, attemptedPaths: resource.candidates },
        });
      }
    }),
  );
}

function registerTool(server: McpServer, tool: RegisteredTool) {
  server.registerTool(
    tool.name,
    {
      description: tool.description,
      inputSchema: tool.inputShape,
      outputSchema: tool.outputShape,
    },
    async (args, extra) => {
      const context = createToolContext(tool.name, extra);
      try {
        const structuredContent = await tool.invoke(args, context);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(structuredContent, null, 2),
            },
          ],
          structuredContent,
        };
      } catch (error) {
        context.logger?.error("Tool call failed", { error });
        throw error;
      }
    },
  );
}

function createToolContext(toolName: string, extra?: ServerRequestExtra): ToolContext {
  const requestId = extra?.requestId !== undefined ? String(extra.requestId) : randomUUID();

  const logFor = (level: "info" | "warn" | "error") => (message: string, meta?: unknown) => {
    log({
      level,
      component: `tool:${toolName}`,
      requestId,
      message,
      meta,
    });
  };

  return {
    requestId,
    now: () => new Date(),
    logger: {
      info: logFor("info"),
      warn: logFor("warn"),
      error: logFor("error"),
    },
  };
}
