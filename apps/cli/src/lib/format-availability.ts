import type {
  AvailabilityResult,
  DelimiterMode,
  PercentFlag,
  PercentValue,
  ReportPeriod,
  SreportAttempt,
  UtilizationReport,
} from "@slurm-availability/shared";
import {
  DEFAULT_DECIMAL_SEPARATOR,
  PERCENT_FLAG_LABELS,
} from "@slurm-availability/shared";
import { FALLBACK_SNIPPET_LINES } from "./constants.ts";
import {
  AvailError,
  ExternalToolFailure,
  MalformedNumberError,
  ReportNotFoundError,
} from "./errors.ts";

/**
 * "93,00%" for values, the flag's label (no `%`) otherwise.
 */
export function formatPercent(
  percent: PercentValue,
  decimalSeparator = DEFAULT_DECIMAL_SEPARATOR,
): string {
  if (percent.kind !== "value") {
    return PERCENT_FLAG_LABELS[percent.kind];
  }
  return `${percent.value.toFixed(2).replace(".", decimalSeparator)}%`;
}

/**
 * Plain digits, no grouping. Fractional totals are cut to 12 significant
 * digits so 0.1 + 0.2 prints as 0.3.
 */
export function formatMinutes(minutes: number): string {
  if (Number.isInteger(minutes)) return String(minutes);
  return String(Number(minutes.toPrecision(12)));
}

export interface AvailabilityRow {
  label: string;
  value: string;
  note?: string;
}

export function availabilityRows(
  result: AvailabilityResult,
  decimalSeparator = DEFAULT_DECIMAL_SEPARATOR,
): {
  figures: AvailabilityRow[];
  totals: AvailabilityRow[];
  percents: AvailabilityRow[];
} {
  return {
    figures: [
      {
        label: "Reported CPU Minutes",
        value: formatMinutes(result.metrics.reported),
      },
      {
        label: "Unplanned Down CPU Minutes",
        value: formatMinutes(result.metrics.down),
      },
      {
        label: "Planned Down CPU Minutes",
        value: formatMinutes(result.metrics.plannedDown),
      },
    ],
    totals: [
      {
        label: "Total Unavailable CPU Time",
        value: formatMinutes(result.unavailableTotal),
        note: "Unplanned + Planned Down",
      },
      {
        label: "Total Available CPU Time",
        value: formatMinutes(result.availableTotal),
        note: "Reported - Total Unavailable",
      },
      {
        label: "Available CPU Time (Ignoring Planned)",
        value: formatMinutes(result.availableExclPlanned),
        note: "Reported - Unplanned Down Only",
      },
    ],
    percents: [
      {
        label: "Percentage of CPU Time Available",
        value: formatPercent(result.percentTotal, decimalSeparator),
      },
      {
        label: "Percentage of CPU Time Available",
        value: formatPercent(result.percentExclPlanned, decimalSeparator),
        note: "Ignoring Planned Downtime",
      },
    ],
  };
}

/** Warnings about results that are valid but not meaningful as ratios. */
export function availabilityWarnings(result: AvailabilityResult): string[] {
  const warnings: string[] = [];
  if (result.percentTotal.kind === "undefined") {
    warnings.push("'Reported' CPU minutes is zero. Cannot calculate percentages.");
    return warnings;
  }
  if (result.percentTotal.kind === "negative") {
    warnings.push(
      `Calculated 'Total Available CPU Time' (${formatMinutes(result.availableTotal)}) is negative.`,
    );
  }
  if (result.percentExclPlanned.kind === "negative") {
    warnings.push(
      `Calculated 'Available CPU Time (Ignoring Planned Downtime)' (${formatMinutes(result.availableExclPlanned)}) is negative.`,
    );
  }
  return warnings;
}

function percentJson(percent: PercentValue): {
  value: number | null;
  flag: PercentFlag | null;
} {
  return percent.kind === "value"
    ? { value: percent.value, flag: null }
    : { value: null, flag: percent.kind };
}

export function availabilityJson(
  period: ReportPeriod,
  mode: DelimiterMode,
  result: AvailabilityResult,
) {
  const total = percentJson(result.percentTotal);
  const exclPlanned = percentJson(result.percentExclPlanned);
  return {
    period,
    mode,
    metrics: result.metrics,
    unavailableTotal: result.unavailableTotal,
    availableTotal: result.availableTotal,
    availableExclPlanned: result.availableExclPlanned,
    percentTotal: total.value,
    percentTotalFlag: total.flag,
    percentExclPlanned: exclPlanned.value,
    percentExclPlannedFlag: exclPlanned.flag,
  };
}

// --- Diagnostics ---

/** Frame raw tool output so it can be told apart from our own messages. */
export function frameRawOutput(label: string, output: string): string[] {
  return [
    `-------------------- ${label} OUTPUT START --------------------`,
    output.trimEnd(),
    `--------------------- ${label} OUTPUT END ---------------------`,
  ];
}

function describeAttempt(attempt: SreportAttempt, index: number): string {
  return `Attempt ${index + 1}: ${attempt.argv.join(" ")} (exit ${attempt.exitCode})`;
}

/** Raw report text attached to a failure, if the failure carries one. */
function failureRawText(error: unknown): string | undefined {
  if (error instanceof ReportNotFoundError) return error.rawText;
  if (error instanceof MalformedNumberError) return error.rawText;
  return undefined;
}

/**
 * Lines to print for a failed run. The first line is the headline; the rest
 * is the sreport output that led to it.
 */
export function failureLines(error: unknown): string[] {
  if (!(error instanceof Error)) return [`Error: ${String(error)}`];

  const lines = [`Error: ${error.message}`];

  if (error instanceof ExternalToolFailure) {
    error.attempts.forEach((attempt, index) => {
      lines.push(describeAttempt(attempt, index));
      lines.push(...frameRawOutput("SREPORT", attempt.output));
    });
    return lines;
  }

  const rawText = failureRawText(error);
  if (rawText !== undefined) {
    lines.push("Please check the sreport output manually:");
    lines.push(...frameRawOutput("SREPORT", rawText));
  }
  return lines;
}

export function failureJson(error: unknown) {
  return {
    error: error instanceof Error ? error.message : String(error),
    code: error instanceof AvailError ? error.code : undefined,
    rawText: failureRawText(error),
    attempts:
      error instanceof ExternalToolFailure ? [...error.attempts] : undefined,
  };
}

/** Warning lines for a report that needed the plain-output retry. */
export function fallbackWarningLines(report: UtilizationReport): string[] {
  const primary = report.attempts[0];
  if (!report.fellBack || !primary) return [];

  const lines = [
    "'sreport ... -t Minutes --parsable2' failed, returned an error, did not produce pipe-delimited output, or is not supported.",
  ];
  if (primary.exitCode !== 0) {
    lines.push(`  Primary attempt exit code: ${primary.exitCode}`);
  }
  lines.push(`  Primary attempt output (first ${FALLBACK_SNIPPET_LINES} lines):`);
  lines.push(...primary.output.split("\n").slice(0, FALLBACK_SNIPPET_LINES));
  lines.push("  Retried with basic sreport output.");
  return lines;
}
