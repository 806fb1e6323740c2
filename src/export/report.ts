import { accuracy } from "../schema/meterReading.js";
import type { Configuration } from "../schema/configuration.js";
import type { TestResult } from "../schema/testResult.js";
import { TEST_TYPE_LABELS, type VolumeUnit } from "../schema/units.js";
import { formatAccuracyValue } from "./csv.js";
import { formatReportDateTime } from "./dateFormat.js";

export const DEFAULT_REPORT_TITLE = "Test History";

/**
 * Text model handed to a page renderer. `lines[0]` is the title; every
 * following line summarizes one result.
 */
export interface ReportModel {
  title: string;
  volumeUnit: VolumeUnit;
  lines: string[];
}

export interface ReportOptions {
  configuration: Configuration;
  title?: string;
}

export function formatReportLine(result: TestResult): string {
  return `${TEST_TYPE_LABELS[result.testType]} | ${formatAccuracyValue(accuracy(result.reading))}% | ${formatReportDateTime(result.date)}`;
}

export function buildReport(results: readonly TestResult[], options: ReportOptions): ReportModel {
  const title = options.title?.trim() || DEFAULT_REPORT_TITLE;
  return {
    title,
    volumeUnit: options.configuration.preferredVolumeUnit,
    lines: [title, ...results.map(formatReportLine)],
  };
}

export function paginateReport(report: ReportModel, maxLinesPerPage: number): string[][] {
  if (!Number.isFinite(maxLinesPerPage)) {
    return report.lines.length > 0 ? [[...report.lines]] : [];
  }
  const perPage = Math.max(1, Math.floor(maxLinesPerPage));
  const pages: string[][] = [];
  for (let offset = 0; offset < report.lines.length; offset += perPage) {
    pages.push(report.lines.slice(offset, offset + perPage));
  }
  return pages;
}

export function reportToText(report: ReportModel): string {
  return report.lines.map((line) => `${line}\n`).join("");
}
