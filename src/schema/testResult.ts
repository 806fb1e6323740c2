import { randomUUID } from "node:crypto";
import { accuracy, type MeterReading } from "./meterReading.js";
import type { TestType } from "./units.js";

export interface TestResult {
  readonly id: string;
  readonly testType: TestType;
  readonly reading: MeterReading;
  notes: string;
  readonly date: Date;
  readonly meterImageData?: Uint8Array;
}

export interface PassBand {
  min: number;
  max: number;
}

export const PASS_BANDS: Readonly<Record<TestType, PassBand>> = {
  lowFlow: { min: 95, max: 101 },
  highFlow: { min: 98.5, max: 101.5 },
};

export function passBandFor(testType: TestType): PassBand {
  return PASS_BANDS[testType];
}

export interface CreateTestResultInput {
  testType: TestType;
  reading: MeterReading;
  notes?: string;
  date?: Date;
  meterImageData?: Uint8Array;
  id?: string;
}

export function createTestResult(input: CreateTestResultInput): TestResult {
  const result: TestResult = {
    id: input.id ?? `test_${randomUUID()}`,
    testType: input.testType,
    reading: input.reading,
    notes: input.notes ?? "",
    date: input.date ?? new Date(),
  };

  if (input.meterImageData !== undefined) {
    return { ...result, meterImageData: input.meterImageData };
  }
  return result;
}

/**
 * Pass/fail verdict. Band bounds are inclusive and apply to the rounded
 * accuracy.
 */
export function isPassing(result: TestResult): boolean {
  const band = passBandFor(result.testType);
  const value = accuracy(result.reading);
  return value >= band.min && value <= band.max;
}

export function sameTestResult(a: TestResult, b: TestResult): boolean {
  return a.id === b.id;
}

export function withNotes(result: TestResult, notes: string): TestResult {
  return { ...result, notes };
}

export function appendNotes(result: TestResult, text: string): TestResult {
  const addition = text.trim();
  if (addition.length === 0) {
    return result;
  }
  const current = result.notes.trimEnd();
  return withNotes(result, current.length > 0 ? `${current}\n${addition}` : addition);
}
