import { z } from "zod";
import { createMeterReading } from "../schema/meterReading.js";
import { createTestResult, type TestResult } from "../schema/testResult.js";
import { parseTestType, type TestType } from "../schema/units.js";

export interface MeterReadingRecord {
  smallMeterStart: number;
  smallMeterEnd: number;
  largeMeterStart: number;
  largeMeterEnd: number;
  totalVolume: number;
  flowRate: number;
}

export interface TestResultRecord {
  id: string;
  testType: TestType;
  reading: MeterReadingRecord;
  notes: string;
  date: string;
  meterImageData?: string;
}

export const meterReadingRecordSchema: z.ZodType<MeterReadingRecord> = z.object({
  smallMeterStart: z.number().finite(),
  smallMeterEnd: z.number().finite(),
  largeMeterStart: z.number().finite(),
  largeMeterEnd: z.number().finite(),
  totalVolume: z.number().finite(),
  flowRate: z.number().finite(),
});

const testTypeFieldSchema = z.string().transform((value, ctx) => {
  const type = parseTestType(value);
  if (!type) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown test type "${value}"` });
    return z.NEVER;
  }
  return type;
});

const isoDateSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: "date must be an ISO 8601 date string",
});

const base64Schema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "meterImageData must be base64");

export const testResultRecordSchema = z.object({
  id: z.string().min(1),
  testType: testTypeFieldSchema,
  reading: meterReadingRecordSchema,
  notes: z.string().default(""),
  date: isoDateSchema,
  meterImageData: base64Schema.optional(),
});

export function encodeImage(data: Uint8Array): string {
  return Buffer.from(data).toString("base64");
}

export function decodeImage(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, "base64"));
}

export function toRecord(result: TestResult): TestResultRecord {
  const record: TestResultRecord = {
    id: result.id,
    testType: result.testType,
    reading: {
      smallMeterStart: result.reading.smallMeterStart,
      smallMeterEnd: result.reading.smallMeterEnd,
      largeMeterStart: result.reading.largeMeterStart,
      largeMeterEnd: result.reading.largeMeterEnd,
      totalVolume: result.reading.totalVolume,
      flowRate: result.reading.flowRate,
    },
    notes: result.notes,
    date: result.date.toISOString(),
  };

  if (result.meterImageData !== undefined) {
    record.meterImageData = encodeImage(result.meterImageData);
  }
  return record;
}

export function fromRecord(record: z.infer<typeof testResultRecordSchema>): TestResult {
  return createTestResult({
    id: record.id,
    testType: record.testType,
    reading: createMeterReading(record.reading),
    notes: record.notes,
    date: new Date(record.date),
    meterImageData: record.meterImageData !== undefined ? decodeImage(record.meterImageData) : undefined,
  });
}

/**
 * Full, round-trippable encoding of the given results, in the given order.
 */
export function toJson(results: readonly TestResult[]): string {
  return JSON.stringify(results.map(toRecord), null, 2);
}

/**
 * Decodes text produced by {@link toJson}. Throws a `ZodError` when the text
 * does not describe an array of test results.
 */
export function fromJson(text: string): TestResult[] {
  const parsed: unknown = JSON.parse(text);
  return z.array(testResultRecordSchema).parse(parsed).map(fromRecord);
}
