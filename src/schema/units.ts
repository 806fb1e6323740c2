import { z } from "zod";

export const VOLUME_UNITS = ["gallons", "liters", "cubicFeet"] as const;
export type VolumeUnit = (typeof VOLUME_UNITS)[number];
export const volumeUnitSchema = z.enum(VOLUME_UNITS);

export const VOLUME_UNIT_LABELS: Record<VolumeUnit, string> = {
  gallons: "Gallons",
  liters: "Liters",
  cubicFeet: "Cubic Feet",
};

export const TEST_TYPES = ["lowFlow", "highFlow"] as const;
export type TestType = (typeof TEST_TYPES)[number];
export const testTypeSchema = z.enum(TEST_TYPES);

export const TEST_TYPE_LABELS: Record<TestType, string> = {
  lowFlow: "Low Flow",
  highFlow: "High Flow",
};

export const TEST_TYPE_FILTERS = ["all", ...TEST_TYPES] as const;
export type TestTypeFilter = (typeof TEST_TYPE_FILTERS)[number];
export const testTypeFilterSchema = z.enum(TEST_TYPE_FILTERS);

export const TEST_TYPE_FILTER_LABELS: Record<TestTypeFilter, string> = {
  all: "All",
  ...TEST_TYPE_LABELS,
};

// "report" stands in for the printable summary; page rendering happens elsewhere.
export const EXPORT_FORMATS = ["csv", "json", "report"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];
export const exportFormatSchema = z.enum(EXPORT_FORMATS);

export const EXPORT_FORMAT_LABELS: Record<ExportFormat, string> = {
  csv: "CSV",
  json: "JSON",
  report: "Report",
};

export const CHART_TYPES = ["bar", "line"] as const;
export type ChartType = (typeof CHART_TYPES)[number];
export const chartTypeSchema = z.enum(CHART_TYPES);

export const CHART_TYPE_LABELS: Record<ChartType, string> = {
  bar: "Bar",
  line: "Line",
};

export const APPEARANCE_OPTIONS = ["system", "light", "dark"] as const;
export type AppearanceOption = (typeof APPEARANCE_OPTIONS)[number];
export const appearanceOptionSchema = z.enum(APPEARANCE_OPTIONS);

export const APPEARANCE_OPTION_LABELS: Record<AppearanceOption, string> = {
  system: "System Default",
  light: "Light",
  dark: "Dark",
};

export const CSV_LAYOUTS = ["history", "analytics"] as const;
export type CsvLayout = (typeof CSV_LAYOUTS)[number];
export const csvLayoutSchema = z.enum(CSV_LAYOUTS);

/**
 * Resolves a test type from either its code (`lowFlow`) or its display label
 * (`Low Flow`). Returns `undefined` for anything else.
 */
export function parseTestType(value: string): TestType | undefined {
  const trimmed = value.trim();
  for (const type of TEST_TYPES) {
    if (type === trimmed || TEST_TYPE_LABELS[type] === trimmed) {
      return type;
    }
  }
  return undefined;
}
