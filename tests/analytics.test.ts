import { describe, expect, it } from "vitest";
import {
  averageAccuracy,
  chartSeries,
  sortByDate,
  summarizeResults,
  trendSeries,
} from "../src/domain/analytics.js";
import { createTestResult } from "../src/schema/testResult.js";
import { benchResult, emptyVolumeResult, hydrantResult, sampleResults } from "./helpers/results.js";

describe("averageAccuracy", () => {
  it("is undefined for an empty subset", () => {
    expect(averageAccuracy([])).toBeUndefined();
  });

  it("averages the rounded accuracies", () => {
    expect(averageAccuracy(sampleResults())).toBe(40);
    expect(averageAccuracy([benchResult(), hydrantResult()])).toBe(60);
  });
});

describe("sortByDate", () => {
  it("sorts ascending by default", () => {
    expect(sortByDate(sampleResults()).map((item) => item.id)).toEqual(["test_hydrant", "test_empty", "test_bench"]);
  });

  it("keeps recorded order for equal dates", () => {
    const date = new Date("2026-05-05T10:00:00Z");
    const first = createTestResult({ ...benchResult(), id: "test_first", date });
    const second = createTestResult({ ...hydrantResult(), id: "test_second", date });
    expect(sortByDate([first, second], "desc").map((item) => item.id)).toEqual(["test_first", "test_second"]);
    expect(sortByDate([second, first], "asc").map((item) => item.id)).toEqual(["test_second", "test_first"]);
  });

  it("does not reorder its input", () => {
    const input = sampleResults();
    sortByDate(input, "desc");
    expect(input.map((item) => item.id)).toEqual(["test_bench", "test_hydrant", "test_empty"]);
  });
});

describe("trendSeries", () => {
  it("is empty for an empty subset", () => {
    expect(trendSeries([])).toEqual([]);
  });

  it("repeats the subset mean at each date in ascending order", () => {
    expect(trendSeries(sampleResults())).toEqual([
      { date: new Date("2026-01-05T13:05:00Z"), average: 40 },
      { date: new Date("2026-03-01T00:00:00Z"), average: 40 },
      { date: new Date("2026-10-19T06:49:05Z"), average: 40 },
    ]);
  });
});

describe("chartSeries", () => {
  it("keeps the given order and carries the verdict", () => {
    expect(chartSeries([emptyVolumeResult(), benchResult()])).toEqual([
      {
        id: "test_empty",
        date: new Date("2026-03-01T00:00:00Z"),
        testType: "lowFlow",
        accuracy: 0,
        isPassing: false,
      },
      {
        id: "test_bench",
        date: new Date("2026-10-19T06:49:05Z"),
        testType: "lowFlow",
        accuracy: 100,
        isPassing: true,
      },
    ]);
  });
});

describe("summarizeResults", () => {
  it("counts passing and failing results", () => {
    expect(summarizeResults(sampleResults())).toEqual({
      count: 3,
      passCount: 1,
      failCount: 2,
      averageAccuracy: 40,
    });
  });

  it("reports no average for an empty subset", () => {
    expect(summarizeResults([])).toEqual({ count: 0, passCount: 0, failCount: 0, averageAccuracy: undefined });
  });
});
