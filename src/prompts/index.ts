import type { McpServer } from "../framework/mcpServerKit.js";
import { registerMeterTestReviewPrompt } from "./meter-test-review.js";

/**
 * Register all prompts with the MCP server
 */
export async function registerPrompts(server: McpServer): Promise<void> {
  await registerMeterTestReviewPrompt(server);
}
