import { z } from "zod";
import { appendTestResult } from "../data/resultRepository.js";
import { parseNumericInput, readingAdvisories } from "../domain/readingInput.js";
import { toRecord } from "../export/json.js";
import { accuracy, createMeterReading } from "../schema/meterReading.js";
import { createTestResult, isPassing, type TestResult } from "../schema/testResult.js";
import { TEST_TYPE_LABELS, testTypeSchema } from "../schema/units.js";
import { defineTool, type ToolContext } from "./types.js";

export const testResultViewSchema = z.object({
  id: z.string(),
  testType: testTypeSchema,
  testTypeLabel: z.string(),
  reading: z.object({
    smallMeterStart: z.number(),
    smallMeterEnd: z.number(),
    largeMeterStart: z.number(),
    largeMeterEnd: z.number(),
    totalVolume: z.number(),
    flowRate: z.number(),
  }),
  accuracy: z.number(),
  isPassing: z.boolean(),
  notes: z.string(),
  date: z.string(),
  hasMeterImage: z.boolean(),
});

export type TestResultView = z.infer<typeof testResultViewSchema>;

export function toResultView(result: TestResult): TestResultView {
  const { meterImageData: _image, ...record } = toRecord(result);
  return {
    ...record,
    testTypeLabel: TEST_TYPE_LABELS[result.testType],
    accuracy: accuracy(result.reading),
    isPassing: isPassing(result),
    hasMeterImage: result.meterImageData !== undefined,
  };
}

// Operators type readings as free text; unreadable values count as 0.
const readingValueSchema = z
  .union([z.number(), z.string()])
  .optional()
  .transform((value) => parseNumericInput(value));

const testRecordInputSchema = z.object({
  testType: testTypeSchema,
  smallMeterStart: readingValueSchema,
  smallMeterEnd: readingValueSchema,
  largeMeterStart: readingValueSchema,
  largeMeterEnd: readingValueSchema,
  totalVolume: readingValueSchema,
  flowRate: readingValueSchema,
  notes: z.string().optional(),
  date: z.string().trim().optional(),
  meterImageBase64: z.string().trim().optional(),
});

const testRecordOutputSchema = z.object({
  testId: z.string(),
  result: testResultViewSchema,
  warnings: z.array(z.string()),
});

export type TestRecordInput = z.infer<typeof testRecordInputSchema>;
export type TestRecordOutput = z.infer<typeof testRecordOutputSchema>;

function parseRecordedAt(value: string | undefined, context: ToolContext): Date {
  if (!value) {
    return context.now();
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error("date must be an ISO 8601 date string");
  }
  return date;
}

function parseImage(value: string | undefined): Uint8Array | undefined {
  if (!value) {
    return undefined;
  }
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(value)) {
    throw new Error("meterImageBase64 must be base64 encoded");
  }
  return new Uint8Array(Buffer.from(value, "base64"));
}

export const testRecordTool = defineTool<TestRecordInput, TestRecordOutput>({
  name: "test_record",
  description:
    "Record a low- or high-flow meter test. Computes accuracy from the meter readings and the reference volume and returns the pass/fail verdict.",
  inputSchema: testRecordInputSchema,
  outputSchema: testRecordOutputSchema,
  handler: async (input: TestRecordInput, context: ToolContext) => {
    const reading = createMeterReading({
      smallMeterStart: input.smallMeterStart,
      smallMeterEnd: input.smallMeterEnd,
      largeMeterStart: input.largeMeterStart,
      largeMeterEnd: input.largeMeterEnd,
      totalVolume: input.totalVolume,
      flowRate: input.flowRate,
    });

    const result = createTestResult({
      testType: input.testType,
      reading,
      notes: input.notes?.trim() ?? "",
      date: parseRecordedAt(input.date, context),
      meterImageData: parseImage(input.meterImageBase64),
    });

    const warnings = readingAdvisories(reading);
    if (warnings.length > 0) {
      context.logger?.warn("Recorded test with reading advisories", { testId: result.id, warnings });
    }

    await appendTestResult(result);

    const view = toResultView(result);
    context.logger?.info("Recorded meter test", {
      testId: result.id,
      testType: result.testType,
      accuracy: view.accuracy,
      isPassing: view.isPassing,
    });

    return {
      testId: result.id,
      result: view,
      warnings,
    };
  },
});
