import { TEST_TYPE_LABELS, type TestTypeFilter } from "../schema/units.js";
import type { TestResult } from "../schema/testResult.js";
import { sortByDate } from "./analytics.js";

/**
 * Ordered, append-only collection of recorded tests. Insertion order is the
 * order tests were recorded in; every query preserves it.
 */
export class ResultStore {
  private readonly results: TestResult[];

  constructor(initial: Iterable<TestResult> = []) {
    this.results = Array.from(initial);
  }

  get size(): number {
    return this.results.length;
  }

  append(result: TestResult): void {
    this.results.push(result);
  }

  all(): TestResult[] {
    return [...this.results];
  }

  find(id: string): TestResult | undefined {
    return this.results.find((item) => item.id === id);
  }

  filterByType(type: TestTypeFilter): TestResult[] {
    return filterByType(this.results, type);
  }

  filterByText(needle: string): TestResult[] {
    return filterByText(this.results, needle);
  }
}

export type ResultOrder = "recorded" | "asc" | "desc";

export interface ResultQuery {
  testType?: TestTypeFilter;
  text?: string;
  order?: ResultOrder;
}

/**
 * Selects the slice handed to listings, analytics and exporters: type filter,
 * then text filter, then optional date ordering.
 */
export function queryResults(store: ResultStore, query: ResultQuery = {}): TestResult[] {
  const byType = store.filterByType(query.testType ?? "all");
  const byText = filterByText(byType, query.text ?? "");
  const order = query.order ?? "recorded";
  return order === "recorded" ? byText : sortByDate(byText, order);
}

export function filterByType(results: readonly TestResult[], type: TestTypeFilter): TestResult[] {
  if (type === "all") {
    return [...results];
  }
  return results.filter((item) => item.testType === type);
}

/**
 * Case-insensitive substring match on the test type label or the notes.
 */
export function filterByText(results: readonly TestResult[], needle: string): TestResult[] {
  const query = needle.trim().toLowerCase();
  if (query.length === 0) {
    return [...results];
  }
  return results.filter(
    (item) =>
      TEST_TYPE_LABELS[item.testType].toLowerCase().includes(query) ||
      item.notes.toLowerCase().includes(query),
  );
}
