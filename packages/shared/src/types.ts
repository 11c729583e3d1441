// --- Report input ---

/** How a line of sreport output is split into fields. */
export type DelimiterMode = "pipe" | "whitespace";

/** One invocation of sreport, with stdout and stderr merged. */
export interface SreportAttempt {
  argv: string[];
  exitCode: number;
  output: string;
}

export interface UtilizationReport {
  text: string;
  mode: DelimiterMode;
  attempts: SreportAttempt[];
  /** True when the `--parsable2` attempt was rejected. */
  fellBack: boolean;
}

// --- Metrics ---

/** Fields 7, 3 and 4 of the sreport data row, as printed. */
export interface RawMetricTriple {
  reported: string;
  down: string;
  plannedDown: string;
}

/** Same fields in CPU minutes. */
export interface MetricTriple {
  reported: number;
  down: number;
  plannedDown: number;
}

export type PercentFlag = "undefined" | "negative";

export type PercentValue =
  | { kind: "value"; value: number }
  | { kind: PercentFlag };

export interface AvailabilityResult {
  metrics: MetricTriple;
  /** down + plannedDown */
  unavailableTotal: number;
  /** reported - unavailableTotal */
  availableTotal: number;
  /** reported - down */
  availableExclPlanned: number;
  percentTotal: PercentValue;
  percentExclPlanned: PercentValue;
}

// --- Periods ---

export type PeriodKind = "day" | "month" | "year";

export interface ReportPeriod {
  kind: PeriodKind;
  /** The argument as given, e.g. "2025-04". */
  label: string;
  /** Inclusive start, YYYY-MM-DD. */
  start: string;
  /** Exclusive end, YYYY-MM-DD. */
  end: string;
}

// --- Config ---

export interface AvailConfig {
  connection?: {
    host: string;
  };
  sreport: {
    command: string;
    cluster?: string;
    timeout_ms: number;
  };
  display: {
    decimal_separator: string;
  };
}
