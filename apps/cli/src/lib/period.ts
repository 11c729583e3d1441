import type { PeriodKind, ReportPeriod } from "@slurm-availability/shared";
import { InvalidPeriodError } from "./errors.ts";

const PERIOD_PATTERN = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a report period argument.
 *
 * Accepts: "2025" (year), "2025-04" (month), "2025-04-15" (day).
 * `end` is exclusive: the first day after the period.
 */
export function parsePeriod(input: string): ReportPeriod {
  const match = input.trim().match(PERIOD_PATTERN);
  if (!match) {
    throw new InvalidPeriodError(input);
  }

  const year = Number(match[1]);
  const month = match[2] === undefined ? undefined : Number(match[2]);
  const day = match[3] === undefined ? undefined : Number(match[3]);

  if (month !== undefined && (month < 1 || month > 12)) {
    throw new InvalidPeriodError(input);
  }

  const kind: PeriodKind =
    day !== undefined ? "day" : month !== undefined ? "month" : "year";
  const start = new Date(0);
  start.setUTCFullYear(year, (month ?? 1) - 1, day ?? 1);

  // Dates roll 2025-02-30 over into March; reject instead
  if (day !== undefined && start.getUTCDate() !== day) {
    throw new InvalidPeriodError(input);
  }

  const end = new Date(start);
  if (kind === "day") end.setUTCDate(end.getUTCDate() + 1);
  else if (kind === "month") end.setUTCMonth(end.getUTCMonth() + 1);
  else end.setUTCFullYear(end.getUTCFullYear() + 1);

  return {
    kind,
    label: input.trim(),
    start: isoDate(start),
    end: isoDate(end),
  };
}

export function describePeriod(period: ReportPeriod): string {
  return `for the ${period.kind} ${period.label}`;
}
