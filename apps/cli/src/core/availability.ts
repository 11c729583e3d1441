import type {
  AvailabilityResult,
  DelimiterMode,
  MetricTriple,
  PercentValue,
  RawMetricTriple,
} from "@slurm-availability/shared";
import { parseMagnitude, selectMetrics } from "@/parsers/index.ts";
import { MalformedNumberError, ReportNotFoundError } from "@/lib/errors.ts";

/**
 * Round half away from zero to 2 decimals. The scaled value is first cut to
 * 12 significant digits so that binary noise (61.725 * 100 = 6172.499999…)
 * doesn't decide the direction.
 */
export function roundPercent(value: number): number {
  const scaled = Number((Math.abs(value) * 100).toPrecision(12));
  return (Math.sign(value) * Math.round(scaled)) / 100;
}

function percentOf(available: number, reported: number): PercentValue {
  if (reported === 0) return { kind: "undefined" };
  if (available < 0) return { kind: "negative" };
  return { kind: "value", value: roundPercent((available / reported) * 100) };
}

/**
 * Derive availability from sreport's Reported / Down / PLND Down minutes.
 * Zero reported time and negative availability are returned as flagged
 * percentages, not thrown.
 */
export function computeAvailability(metrics: MetricTriple): AvailabilityResult {
  const { reported, down, plannedDown } = metrics;
  const unavailableTotal = down + plannedDown;
  const availableTotal = reported - unavailableTotal;
  const availableExclPlanned = reported - down;

  return Object.freeze({
    metrics: Object.freeze({ ...metrics }),
    unavailableTotal,
    availableTotal,
    availableExclPlanned,
    percentTotal: percentOf(availableTotal, reported),
    percentExclPlanned: percentOf(availableExclPlanned, reported),
  });
}

function parseTriple(raw: RawMetricTriple, text: string): MetricTriple {
  const parse = (token: string) => {
    try {
      return parseMagnitude(token);
    } catch (error) {
      if (error instanceof MalformedNumberError) {
        throw new MalformedNumberError(token, raw, text);
      }
      throw error;
    }
  };

  return {
    reported: parse(raw.reported),
    down: parse(raw.down),
    plannedDown: parse(raw.plannedDown),
  };
}

/** Select, parse and compute in one step. Same text in, same result out. */
export function analyzeReport(
  text: string,
  mode: DelimiterMode,
): AvailabilityResult {
  const raw = selectMetrics(text, mode);
  if (!raw) {
    throw new ReportNotFoundError(text);
  }
  return computeAvailability(parseTriple(raw, text));
}
