export {
  MAGNITUDE_EXPONENTS,
  SREPORT_ERROR_MARKERS,
  PERCENT_FLAG_LABELS,
  DEFAULT_SREPORT_COMMAND,
  DEFAULT_SREPORT_TIMEOUT_MS,
  DEFAULT_DECIMAL_SEPARATOR,
} from "./constants.ts";
export type {
  DelimiterMode,
  SreportAttempt,
  UtilizationReport,
  RawMetricTriple,
  MetricTriple,
  PercentFlag,
  PercentValue,
  AvailabilityResult,
  PeriodKind,
  ReportPeriod,
  AvailConfig,
} from "./types.ts";
