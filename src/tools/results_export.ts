import { z } from "zod";
import { loadConfiguration, loadResultStore } from "../data/resultRepository.js";
import { queryResults } from "../domain/resultStore.js";
import { toDetailCsv } from "../export/csv.js";
import { ExportUnavailableError, exportResults, paginateReport } from "../export/index.js";
import { csvLayoutSchema, exportFormatSchema, testTypeFilterSchema } from "../schema/units.js";
import { resultOrderSchema } from "./test_list.js";
import { defineTool, type ToolContext } from "./types.js";

const resultsExportInputSchema = z.object({
  format: exportFormatSchema,
  testType: testTypeFilterSchema.optional(),
  query: z.string().optional(),
  order: resultOrderSchema.optional(),
  testId: z.string().min(1).optional(),
  csvLayout: csvLayoutSchema.optional(),
  quoteFields: z.boolean().optional(),
  reportTitle: z.string().optional(),
  maxLinesPerPage: z.number().int().min(1).optional(),
});

const resultsExportOutputSchema = z.object({
  format: exportFormatSchema,
  mimeType: z.string(),
  fileName: z.string(),
  recordCount: z.number().int().nonnegative(),
  content: z.string(),
  pages: z.array(z.array(z.string())).optional(),
});

export type ResultsExportInput = z.infer<typeof resultsExportInputSchema>;
export type ResultsExportOutput = z.infer<typeof resultsExportOutputSchema>;

function exportFileName(prefix: string, extension: string, now: Date): string {
  return `${prefix}-${now.toISOString().split("T")[0]}.${extension}`;
}

export const resultsExportTool = defineTool<ResultsExportInput, ResultsExportOutput>({
  name: "results_export",
  description:
    "Export recorded tests as CSV, JSON or a text report. Filters and ordering are applied first; testId exports a single test.",
  inputSchema: resultsExportInputSchema,
  outputSchema: resultsExportOutputSchema,
  handler: async (input: ResultsExportInput, context: ToolContext) => {
    const [store, configuration] = await Promise.all([loadResultStore(), loadConfiguration()]);
    const now = context.now();

    if (input.testId) {
      const result = store.find(input.testId);
      if (!result) {
        throw new Error(`Test ${input.testId} not found`);
      }

      // Single-test CSV uses the detail layout with a long date.
      if (input.format === "csv") {
        context.logger?.info("Exported test detail", { testId: input.testId, format: input.format });
        return {
          format: input.format,
          mimeType: "text/csv",
          fileName: exportFileName("meter-test", "csv", now),
          recordCount: 1,
          content: toDetailCsv(result, { quoteFields: input.quoteFields }),
        };
      }
    }

    const selected = input.testId
      ? store.all().filter((item) => item.id === input.testId)
      : queryResults(store, { testType: input.testType, text: input.query, order: input.order });

    try {
      const payload = exportResults(selected, {
        format: input.format,
        configuration,
        csv: { layout: input.csvLayout, quoteFields: input.quoteFields },
        reportTitle: input.reportTitle,
      });

      context.logger?.info("Exported meter tests", {
        format: payload.format,
        recordCount: selected.length,
        bytes: payload.bytes.byteLength,
      });

      return {
        format: payload.format,
        mimeType: payload.mimeType,
        fileName: exportFileName(input.testId ? "meter-test" : "meter-tests", payload.fileExtension, now),
        recordCount: selected.length,
        content: payload.text,
        pages:
          payload.report && input.maxLinesPerPage !== undefined
            ? paginateReport(payload.report, input.maxLinesPerPage)
            : undefined,
      };
    } catch (error) {
      if (error instanceof ExportUnavailableError) {
        context.logger?.error("Export unavailable", { format: error.format, cause: error.cause });
        throw new Error(`Export data not available: ${error.message}`);
      }
      throw error;
    }
  },
});
