import type { Readable, Writable } from "node:stream";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { Implementation, ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";

export type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export type ServerRequestExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface TransportStreams {
  input?: Readable;
  output?: Writable;
}

// No sampling: nothing here asks the client for completions.
const SERVER_CAPABILITIES = {
  tools: { listChanged: true },
  resources: { listChanged: true },
  prompts: { listChanged: true },
  logging: {},
};

export function createMcpServer(info: Implementation, instructions?: string): McpServer {
  return new McpServer(info, { capabilities: SERVER_CAPABILITIES, instructions });
}

export async function connectToTransport(server: McpServer, transport: StdioServerTransport): Promise<void> {
  await server.connect(transport);
}

/** Process stdin/stdout unless in-memory streams are given. */
export function createTransport(streams?: TransportStreams): StdioServerTransport {
  return new StdioServerTransport(streams?.input, streams?.output);
}
