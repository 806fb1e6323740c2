import type { Configuration } from "../schema/configuration.js";
import type { TestResult } from "../schema/testResult.js";
import { EXPORT_FORMATS, type ExportFormat } from "../schema/units.js";
import { toCsv, type CsvOptions } from "./csv.js";
import { toJson } from "./json.js";
import { buildReport, reportToText, type ReportModel } from "./report.js";

export class ExportUnavailableError extends Error {
  readonly format: string;

  constructor(format: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportUnavailableError";
    this.format = format;
  }
}

export interface ExportOptions {
  /** Validated here; anything outside {@link EXPORT_FORMATS} is unavailable. */
  format: string;
  configuration: Configuration;
  csv?: CsvOptions;
  reportTitle?: string;
}

export interface ExportPayload {
  format: ExportFormat;
  mimeType: string;
  fileExtension: string;
  text: string;
  bytes: Uint8Array;
  report?: ReportModel;
}

const MIME_TYPES: Record<ExportFormat, { mimeType: string; fileExtension: string }> = {
  csv: { mimeType: "text/csv", fileExtension: "csv" },
  json: { mimeType: "application/json", fileExtension: "json" },
  report: { mimeType: "text/plain", fileExtension: "txt" },
};

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

function serialize(
  format: ExportFormat,
  results: readonly TestResult[],
  options: ExportOptions,
): { text: string; report?: ReportModel } {
  switch (format) {
    case "csv":
      return { text: toCsv(results, options.csv) };
    case "json":
      return { text: toJson(results) };
    case "report": {
      const report = buildReport(results, {
        configuration: options.configuration,
        title: options.reportTitle,
      });
      return { text: reportToText(report), report };
    }
  }
}

/**
 * Serializes an already filtered and ordered result set. Either the whole
 * payload is returned or `ExportUnavailableError` is thrown.
 */
export function exportResults(results: readonly TestResult[], options: ExportOptions): ExportPayload {
  const { format } = options;
  if (!isExportFormat(format)) {
    throw new ExportUnavailableError(format, `Export format "${format}" is not supported`);
  }

  let serialized: { text: string; report?: ReportModel };
  try {
    serialized = serialize(format, results, options);
  } catch (error) {
    throw new ExportUnavailableError(format, `Could not export results as ${format}`, { cause: error });
  }

  return {
    format,
    ...MIME_TYPES[format],
    text: serialized.text,
    bytes: new TextEncoder().encode(serialized.text),
    report: serialized.report,
  };
}

export { toCsv, toDetailCsv, HISTORY_CSV_HEADER, ANALYTICS_CSV_HEADER } from "./csv.js";
export type { CsvOptions } from "./csv.js";
export { toJson, fromJson } from "./json.js";
export { buildReport, paginateReport, reportToText } from "./report.js";
export type { ReportModel } from "./report.js";
