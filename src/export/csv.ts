import { accuracy } from "../schema/meterReading.js";
import { isPassing, type TestResult } from "../schema/testResult.js";
import { TEST_TYPE_LABELS, type CsvLayout } from "../schema/units.js";
import { formatLongDateTime, formatShortDateTime } from "./dateFormat.js";

export const HISTORY_CSV_HEADER =
  "Test Type,Small Start,Small End,Large Start,Large End,Total Volume,Flow Rate,Accuracy,Notes,Date";
export const ANALYTICS_CSV_HEADER = "Date,Test Type,Accuracy,Status";

export interface CsvOptions {
  layout?: CsvLayout;
  /**
   * When false (the default) fields are written as-is, so notes containing a
   * comma shift the columns after them. When true, fields containing a comma,
   * quote or line break are quoted per RFC 4180.
   */
  quoteFields?: boolean;
}

const EXPONENT_THRESHOLD = 1e16;

/**
 * Reading values always carry a fractional part (`10` → `10.0`) unless they
 * are large enough to print in exponent form (`1e16` → `1e+16`).
 */
export function formatReadingValue(value: number): string {
  if (!Number.isInteger(value)) {
    return String(value);
  }
  return Math.abs(value) >= EXPONENT_THRESHOLD ? value.toExponential() : value.toFixed(1);
}

export function formatAccuracyValue(value: number): string {
  return value.toFixed(1);
}

function escapeCsv(value: string): string {
  const needsQuotes = /[",\r\n]/.test(value);
  const escaped = value.replace(/"/g, '""');
  return needsQuotes ? `"${escaped}"` : escaped;
}

function joinRow(fields: string[], quoteFields: boolean): string {
  return `${(quoteFields ? fields.map(escapeCsv) : fields).join(",")}\n`;
}

function historyFields(result: TestResult, formatDate: (date: Date) => string): string[] {
  const { reading } = result;
  return [
    TEST_TYPE_LABELS[result.testType],
    formatReadingValue(reading.smallMeterStart),
    formatReadingValue(reading.smallMeterEnd),
    formatReadingValue(reading.largeMeterStart),
    formatReadingValue(reading.largeMeterEnd),
    formatReadingValue(reading.totalVolume),
    formatReadingValue(reading.flowRate),
    formatAccuracyValue(accuracy(reading)),
    result.notes,
    formatDate(result.date),
  ];
}

function analyticsFields(result: TestResult): string[] {
  return [
    formatShortDateTime(result.date),
    TEST_TYPE_LABELS[result.testType],
    formatAccuracyValue(accuracy(result.reading)),
    isPassing(result) ? "PASS" : "FAIL",
  ];
}

/**
 * Serializes results in the order given. One header line, one line per
 * result, each terminated by `\n`.
 */
export function toCsv(results: readonly TestResult[], options: CsvOptions = {}): string {
  const layout = options.layout ?? "history";
  const quoteFields = options.quoteFields ?? false;

  if (layout === "analytics") {
    return ANALYTICS_CSV_HEADER + "\n" + results.map((item) => joinRow(analyticsFields(item), quoteFields)).join("");
  }

  return (
    HISTORY_CSV_HEADER +
    "\n" +
    results.map((item) => joinRow(historyFields(item, formatShortDateTime), quoteFields)).join("")
  );
}

/**
 * Single-record export with the history columns and a long date.
 */
export function toDetailCsv(result: TestResult, options: Pick<CsvOptions, "quoteFields"> = {}): string {
  return HISTORY_CSV_HEADER + "\n" + joinRow(historyFields(result, formatLongDateTime), options.quoteFields ?? false);
}
