import { z } from "zod";
import { loadConfiguration, loadResultStore } from "../data/resultRepository.js";
import { chartSeries, summarizeResults, trendSeries } from "../domain/analytics.js";
import { queryResults } from "../domain/resultStore.js";
import { formatAccuracyValue } from "../export/csv.js";
import {
  CHART_TYPE_LABELS,
  TEST_TYPE_FILTER_LABELS,
  TEST_TYPE_LABELS,
  VOLUME_UNIT_LABELS,
  chartTypeSchema,
  testTypeFilterSchema,
  testTypeSchema,
  volumeUnitSchema,
} from "../schema/units.js";
import { defineTool, type ToolContext } from "./types.js";

export const NO_RESULTS_MESSAGE = "No test results available for the selected filter.";

const analyticsSummaryInputSchema = z.object({
  testType: testTypeFilterSchema.optional(),
  query: z.string().optional(),
  chartType: chartTypeSchema.optional(),
  showTrendLine: z.boolean().optional(),
});

const chartPointSchema = z.object({
  id: z.string(),
  date: z.string(),
  testType: testTypeSchema,
  testTypeLabel: z.string(),
  accuracy: z.number(),
  accuracyLabel: z.string(),
  isPassing: z.boolean(),
});

const trendPointSchema = z.object({
  date: z.string(),
  average: z.number(),
});

const analyticsSummaryOutputSchema = z.object({
  filter: testTypeFilterSchema,
  filterLabel: z.string(),
  chartType: chartTypeSchema,
  chartTypeLabel: z.string(),
  volumeUnit: volumeUnitSchema,
  volumeUnitLabel: z.string(),
  count: z.number().int().nonnegative(),
  passCount: z.number().int().nonnegative(),
  failCount: z.number().int().nonnegative(),
  averageAccuracy: z.number().nullable(),
  summaryLines: z.array(z.string()),
  points: z.array(chartPointSchema),
  trend: z.array(trendPointSchema),
});

export type AnalyticsSummaryInput = z.infer<typeof analyticsSummaryInputSchema>;
export type AnalyticsSummaryOutput = z.infer<typeof analyticsSummaryOutputSchema>;

export const analyticsSummaryTool = defineTool<AnalyticsSummaryInput, AnalyticsSummaryOutput>({
  name: "analytics_summary",
  description:
    "Summarize recorded tests for charts: counts, pass/fail split, average accuracy, one point per test and an optional trend line.",
  inputSchema: analyticsSummaryInputSchema,
  outputSchema: analyticsSummaryOutputSchema,
  handler: async (input: AnalyticsSummaryInput, context: ToolContext) => {
    const filter = input.testType ?? "all";
    const chartType = input.chartType ?? "bar";
    const [store, configuration] = await Promise.all([loadResultStore(), loadConfiguration()]);
    const selected = queryResults(store, { testType: filter, text: input.query });
    const summary = summarizeResults(selected);

    const summaryLines = [`Tests: ${summary.count}`];
    if (summary.averageAccuracy !== undefined) {
      summaryLines.push(`Avg Accuracy: ${formatAccuracyValue(summary.averageAccuracy)}%`);
    }
    if (summary.count === 0) {
      summaryLines.push(NO_RESULTS_MESSAGE);
    }

    const points = chartSeries(selected).map((point) => ({
      id: point.id,
      date: point.date.toISOString(),
      testType: point.testType,
      testTypeLabel: TEST_TYPE_LABELS[point.testType],
      accuracy: point.accuracy,
      accuracyLabel: `${formatAccuracyValue(point.accuracy)}%`,
      isPassing: point.isPassing,
    }));

    const trend = input.showTrendLine
      ? trendSeries(selected).map((point) => ({ date: point.date.toISOString(), average: point.average }))
      : [];

    context.logger?.info("Computed analytics summary", {
      filter,
      count: summary.count,
      averageAccuracy: summary.averageAccuracy ?? null,
    });

    return {
      filter,
      filterLabel: TEST_TYPE_FILTER_LABELS[filter],
      chartType,
      chartTypeLabel: CHART_TYPE_LABELS[chartType],
      volumeUnit: configuration.preferredVolumeUnit,
      volumeUnitLabel: VOLUME_UNIT_LABELS[configuration.preferredVolumeUnit],
      count: summary.count,
      passCount: summary.passCount,
      failCount: summary.failCount,
      averageAccuracy: summary.averageAccuracy ?? null,
      summaryLines,
      points,
      trend,
    };
  },
});
