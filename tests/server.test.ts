import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import * as mcpServerKit from "../src/framework/mcpServerKit.js";
import { SERVER_NAME, SERVER_VERSION, buildServer, start } from "../src/server.js";
import { initialize, issueRequest } from "./helpers/mcp.js";

const responseSchema = z.object({ result: z.record(z.unknown()) });
const resultOf = (response: unknown) => responseSchema.parse(response).result;

const structuredSchema = z.object({ result: z.object({ structuredContent: z.record(z.unknown()) }) });
const structuredOf = (response: unknown) => structuredSchema.parse(response).result.structuredContent;

describe("mcp server", () => {
  let directory: string;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    directory = await mkdtemp(join(tmpdir(), "meter-server-"));
    vi.stubEnv("METER_TESTS_DATA_PATH", join(directory, "meter-tests.json"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it("lists tools and resources and services tool calls", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const { server, transport } = await buildServer({ input, output });
    await mcpServerKit.connectToTransport(server, transport);

    const initializeResult = resultOf(await initialize(output, input));
    expect(initializeResult).toMatchObject({
      protocolVersion: "2025-06-18",
      serverInfo: { name: "meter-accuracy-mcp", title: "Meter Accuracy Tester", version: SERVER_VERSION },
    });
    expect(initializeResult).toMatchObject({
      capabilities: { tools: { listChanged: true }, resources: { listChanged: true }, prompts: { listChanged: true } },
      instructions: expect.stringContaining("test_record"),
    });
    expect(z.object({ sampling: z.unknown() }).partial().parse(initializeResult.capabilities).sampling).toBeUndefined();
    expect(SERVER_NAME).toBe("meter-accuracy-mcp");

    const toolsList = resultOf(await issueRequest(output, input, { id: 2, method: "tools/list", params: {} }));
    const toolNames = z.array(z.object({ name: z.string() })).parse(toolsList.tools).map((tool) => tool.name);
    expect(toolNames.sort()).toEqual([
      "analytics_summary",
      "results_export",
      "settings_get",
      "settings_update",
      "test_get",
      "test_list",
      "test_notes_update",
      "test_record",
    ]);

    const recorded = structuredOf(
      await issueRequest(output, input, {
        id: 3,
        method: "tools/call",
        params: {
          name: "test_record",
          arguments: {
            testType: "highFlow",
            smallMeterStart: 0,
            smallMeterEnd: "99.5",
            largeMeterStart: 0,
            largeMeterEnd: 0,
            totalVolume: 100,
            flowRate: 40,
            notes: "Hydrant 3",
          },
        },
      }),
    );
    expect(recorded).toMatchObject({ result: { accuracy: 99.5, isPassing: true, testTypeLabel: "High Flow" } });
    const { testId } = z.object({ testId: z.string() }).parse(recorded);

    const fetched = structuredOf(
      await issueRequest(output, input, {
        id: 4,
        method: "tools/call",
        params: { name: "test_get", arguments: { testId } },
      }),
    );
    expect(fetched).toMatchObject({ result: { id: testId, notes: "Hydrant 3" } });

    const missing = resultOf(
      await issueRequest(output, input, {
        id: 5,
        method: "tools/call",
        params: { name: "test_get", arguments: { testId: "test_missing" } },
      }),
    );
    expect(missing.isError).toBe(true);
    const [errorContent] = z.array(z.object({ type: z.literal("text"), text: z.string() })).parse(missing.content);
    expect(errorContent.text).toContain("Test test_missing not found");

    const exported = structuredOf(
      await issueRequest(output, input, {
        id: 6,
        method: "tools/call",
        params: { name: "results_export", arguments: { format: "csv", csvLayout: "analytics" } },
      }),
    );
    expect(exported).toMatchObject({ format: "csv", recordCount: 1 });

    const resourcesList = resultOf(await issueRequest(output, input, { id: 7, method: "resources/list", params: {} }));
    expect(resourcesList.resources).toEqual(
      expect.arrayContaining([expect.objectContaining({ uri: "doc://meter-accuracy-mcp/README" })]),
    );

    const resourceRead = resultOf(
      await issueRequest(output, input, {
        id: 8,
        method: "resources/read",
        params: { uri: "doc://meter-accuracy-mcp/README" },
      }),
    );
    const [readme] = z.array(z.object({ text: z.string() })).parse(resourceRead.contents);
    expect(readme.text).toContain("# meter-accuracy-mcp");

    await server.close();
    await transport.close();
  });

  it("supports starting even when stdin is a TTY", async () => {
    const input = Object.assign(new PassThrough(), { isTTY: true });
    const output = new PassThrough();
    const connectSpy = vi.spyOn(mcpServerKit, "connectToTransport").mockResolvedValue();

    await expect(start({ input, output })).resolves.toBeUndefined();

    expect(connectSpy).toHaveBeenCalled();
  });
});
