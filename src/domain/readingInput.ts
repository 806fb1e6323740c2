import type { MeterReading } from "../schema/meterReading.js";

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts a field value typed by an operator into a number. Anything that is
 * not a finite decimal literal reads as 0.
 */
export function parseNumericInput(value: string | number | null | undefined): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (value === null || value === undefined) {
    return 0;
  }

  const trimmed = value.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return 0;
  }

  const parsed = Number.parseFloat(trimmed);
  return Number.isFinite(parsed) ? parsed : 0;
}

export const SMALL_METER_ORDER_ADVISORY = "Small meter: End reading must be ≥ start reading.";
export const LARGE_METER_ORDER_ADVISORY = "Large meter: End reading must be ≥ start reading.";

/**
 * Advisory messages for readings that look mistyped. They never block
 * recording a test.
 */
export function readingAdvisories(reading: MeterReading): string[] {
  const advisories: string[] = [];
  if (reading.smallMeterEnd < reading.smallMeterStart) {
    advisories.push(SMALL_METER_ORDER_ADVISORY);
  }
  if (reading.largeMeterEnd < reading.largeMeterStart) {
    advisories.push(LARGE_METER_ORDER_ADVISORY);
  }
  return advisories;
}
