import { z } from "zod";
import type { McpServer } from "../framework/mcpServerKit.js";
import { loadConfiguration, loadResultStore } from "../data/resultRepository.js";
import { summarizeResults } from "../domain/analytics.js";
import { queryResults } from "../domain/resultStore.js";
import { formatAccuracyValue } from "../export/csv.js";
import { formatReportLine } from "../export/report.js";
import { render } from "../prompt-helpers/template-renderer.js";
import { PASS_BANDS, isPassing, type TestResult } from "../schema/testResult.js";
import {
  TEST_TYPE_FILTER_LABELS,
  VOLUME_UNIT_LABELS,
  testTypeFilterSchema,
  type TestTypeFilter,
} from "../schema/units.js";

export const METER_TEST_REVIEW_TEMPLATE = `You are reviewing water-meter field calibration tests.

## Scope

- Filter: {{filterLabel}}
- Volume unit: {{volumeUnitLabel}}
- Tests: {{count}} ({{passCount}} passing, {{failCount}} failing)
{{#if hasAverage}}- Average accuracy: {{averageAccuracy}}%
{{else}}- Average accuracy: no data
{{/if}}
## Pass bands

- Low Flow: {{lowFlowMin}}% to {{lowFlowMax}}% inclusive
- High Flow: {{highFlowMin}}% to {{highFlowMax}}% inclusive

{{#if hasFailures}}## Failing tests

{{failingLines}}

For each failing test, check the meter readings for transcription errors
(end below start, swapped meters) before concluding the meter is out of
tolerance. Tests with a reference volume of 0 always read 0% and fail.
{{else}}All tests in scope are within their pass band.
{{/if}}
## Suggested next steps

- \`test_list\` with \`query\` to inspect notes for a site or meter
- \`analytics_summary\` with \`showTrendLine=true\` to chart accuracy over time
- \`results_export\` to produce CSV, JSON or a text report`;

function failingLine(result: TestResult): string {
  const notes = result.notes.trim();
  return `- ${formatReportLine(result)}${notes ? ` (${notes})` : ""} [${result.id}]`;
}

export async function buildMeterTestReview(filter: TestTypeFilter): Promise<string> {
  const [store, configuration] = await Promise.all([loadResultStore(), loadConfiguration()]);
  const selected = queryResults(store, { testType: filter, order: "asc" });
  const summary = summarizeResults(selected);
  const failing = selected.filter((item) => !isPassing(item));

  return render(METER_TEST_REVIEW_TEMPLATE, {
    filterLabel: TEST_TYPE_FILTER_LABELS[filter],
    volumeUnitLabel: VOLUME_UNIT_LABELS[configuration.preferredVolumeUnit],
    count: summary.count,
    passCount: summary.passCount,
    failCount: summary.failCount,
    hasAverage: summary.averageAccuracy !== undefined,
    averageAccuracy:
      summary.averageAccuracy !== undefined ? formatAccuracyValue(summary.averageAccuracy) : undefined,
    lowFlowMin: PASS_BANDS.lowFlow.min,
    lowFlowMax: PASS_BANDS.lowFlow.max,
    highFlowMin: PASS_BANDS.highFlow.min,
    highFlowMax: PASS_BANDS.highFlow.max,
    hasFailures: failing.length > 0,
    failingLines: failing.map(failingLine).join("\n"),
  });
}

/**
 * Register meter_test_review prompt
 */
export async function registerMeterTestReviewPrompt(server: McpServer) {
  server.registerPrompt(
    "meter_test_review",
    {
      description: "Review recorded meter tests: pass/fail split, average accuracy and failing tests",
      argsSchema: {
        testType: z.string().optional().describe("Restrict the review to one test type: all, lowFlow or highFlow"),
      },
    },
    async (args) => {
      const parsed = z.object({ testType: testTypeFilterSchema.optional() }).parse(args);
      const text = await buildMeterTestReview(parsed.testType ?? "all");

      return {
        messages: [
          {
            role: "user" as const,
            content: {
              type: "text" as const,
              text,
            },
          },
        ],
      };
    },
  );
}
