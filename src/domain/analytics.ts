import { accuracy } from "../schema/meterReading.js";
import { isPassing, type TestResult } from "../schema/testResult.js";
import type { TestType } from "../schema/units.js";

export type SortOrder = "asc" | "desc";

export interface TrendPoint {
  date: Date;
  average: number;
}

export interface ChartPoint {
  id: string;
  date: Date;
  testType: TestType;
  accuracy: number;
  isPassing: boolean;
}

export interface ResultSummary {
  count: number;
  passCount: number;
  failCount: number;
  averageAccuracy: number | undefined;
}

/**
 * Mean accuracy of the subset, or `undefined` when there is nothing to
 * average.
 */
export function averageAccuracy(results: readonly TestResult[]): number | undefined {
  if (results.length === 0) {
    return undefined;
  }
  const total = results.reduce((sum, item) => sum + accuracy(item.reading), 0);
  return total / results.length;
}

export function sortByDate(results: readonly TestResult[], order: SortOrder = "asc"): TestResult[] {
  const direction = order === "asc" ? 1 : -1;
  // Array.prototype.sort is stable, so equal dates keep record order.
  return [...results].sort((a, b) => direction * (a.date.getTime() - b.date.getTime()));
}

/**
 * One point per result, in ascending date order, each carrying the mean of
 * the whole subset. The line is flat: it is not a moving average.
 */
export function trendSeries(results: readonly TestResult[]): TrendPoint[] {
  const sorted = sortByDate(results, "asc");
  const average = averageAccuracy(sorted);
  if (average === undefined) {
    return [];
  }
  return sorted.map((item) => ({ date: item.date, average }));
}

export function chartSeries(results: readonly TestResult[]): ChartPoint[] {
  return results.map((item) => ({
    id: item.id,
    date: item.date,
    testType: item.testType,
    accuracy: accuracy(item.reading),
    isPassing: isPassing(item),
  }));
}

export function summarizeResults(results: readonly TestResult[]): ResultSummary {
  const passCount = results.filter((item) => isPassing(item)).length;
  return {
    count: results.length,
    passCount,
    failCount: results.length - passCount,
    averageAccuracy: averageAccuracy(results),
  };
}
