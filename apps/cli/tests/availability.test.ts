import { describe, it, expect } from "vitest";
import type { PercentValue } from "@slurm-availability/shared";
import {
  analyzeReport,
  computeAvailability,
  roundPercent,
} from "@/core/availability.ts";
import { MalformedNumberError, ReportNotFoundError } from "@/lib/errors.ts";
import { catchError, COLUMN_REPORT, PIPE_REPORT } from "./helpers.ts";

function valueOf(percent: PercentValue): number | undefined {
  return percent.kind === "value" ? percent.value : undefined;
}

describe("computeAvailability", () => {
  it("derives totals and percentages", () => {
    const result = computeAvailability({ reported: 1000, down: 50, plannedDown: 20 });
    expect(result.unavailableTotal).toBe(70);
    expect(result.availableTotal).toBe(930);
    expect(result.availableExclPlanned).toBe(950);
    expect(result.percentTotal).toEqual({ kind: "value", value: 93 });
    expect(result.percentExclPlanned).toEqual({ kind: "value", value: 95 });
  });

  it("flags both percentages when nothing was reported", () => {
    const result = computeAvailability({ reported: 0, down: 10, plannedDown: 500 });
    expect(result.availableTotal).toBe(-510);
    expect(result.percentTotal).toEqual({ kind: "undefined" });
    expect(result.percentExclPlanned).toEqual({ kind: "undefined" });
  });

  it("flags each negative availability on its own", () => {
    const result = computeAvailability({ reported: 100, down: 80, plannedDown: 50 });
    expect(result.availableTotal).toBe(-30);
    expect(result.percentTotal).toEqual({ kind: "negative" });
    expect(result.availableExclPlanned).toBe(20);
    expect(result.percentExclPlanned).toEqual({ kind: "value", value: 20 });
  });

  it("reports full availability without downtime", () => {
    const result = computeAvailability({ reported: 525600, down: 0, plannedDown: 0 });
    expect(result.percentTotal).toEqual({ kind: "value", value: 100 });
    expect(result.percentExclPlanned).toEqual({ kind: "value", value: 100 });
  });

  it("allows exactly zero availability", () => {
    const result = computeAvailability({ reported: 100, down: 60, plannedDown: 40 });
    expect(result.percentTotal).toEqual({ kind: "value", value: 0 });
  });

  it("agrees with its own totals within rounding", () => {
    const triples = [
      { reported: 3, down: 1, plannedDown: 0 },
      { reported: 908800, down: 1205, plannedDown: 3333 },
      { reported: 7, down: 2, plannedDown: 1 },
    ];
    for (const metrics of triples) {
      const result = computeAvailability(metrics);
      const total = valueOf(result.percentTotal);
      const exclPlanned = valueOf(result.percentExclPlanned);
      expect(total).toBeDefined();
      expect(exclPlanned).toBeDefined();
      expect(
        Math.abs((result.availableTotal / metrics.reported) * 100 - (total ?? NaN)),
      ).toBeLessThanOrEqual(0.01);
      expect(
        Math.abs(
          (result.availableExclPlanned / metrics.reported) * 100 - (exclPlanned ?? NaN),
        ),
      ).toBeLessThanOrEqual(0.01);
    }
  });

  it("returns a frozen result", () => {
    const result = computeAvailability({ reported: 10, down: 1, plannedDown: 1 });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.metrics)).toBe(true);
  });
});

describe("roundPercent", () => {
  it("rounds half away from zero", () => {
    expect(roundPercent(12.345)).toBe(12.35);
    expect(roundPercent(61.725)).toBe(61.73);
    expect(roundPercent(0.005)).toBe(0.01);
    expect(roundPercent(-2.675)).toBe(-2.68);
  });

  it("rounds down below the midpoint", () => {
    expect(roundPercent(66.66666666)).toBe(66.67);
    expect(roundPercent(33.33333333)).toBe(33.33);
    expect(roundPercent(99.994)).toBe(99.99);
  });

  it("rounds ratios computed from minute counts", () => {
    // 123450 / 200000 * 100 is 61.724999… in binary floating point
    const result = computeAvailability({ reported: 200000, down: 76550, plannedDown: 0 });
    expect(result.percentTotal).toEqual({ kind: "value", value: 61.73 });
  });
});

describe("analyzeReport", () => {
  it("computes the same result from either layout", () => {
    expect(analyzeReport(COLUMN_REPORT, "whitespace")).toEqual(
      analyzeReport(PIPE_REPORT, "pipe"),
    );
  });

  it("gives identical results for identical input", () => {
    const first = analyzeReport(PIPE_REPORT, "pipe");
    const second = analyzeReport(PIPE_REPORT, "pipe");
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("converts suffixed figures to minutes", () => {
    const text = "hpc|2.4M|12K|3,000|0|0|2.5M\n";
    const result = analyzeReport(text, "pipe");
    expect(result.metrics).toEqual({
      reported: 2500000,
      down: 12000,
      plannedDown: 3000,
    });
    expect(result.availableTotal).toBe(2485000);
    expect(result.percentTotal).toEqual({ kind: "value", value: 99.4 });
  });

  it("fails with the raw text when no row matches", () => {
    const text = "Cluster|Allocated|Down|PLND Down|Idle|Planned|Reported\n";
    const error = catchError(() => analyzeReport(text, "pipe"));
    expect(error).toBeInstanceOf(ReportNotFoundError);
    if (error instanceof ReportNotFoundError) {
      expect(error.rawText).toBe(text);
      expect(error.code).toBe("REPORT_NOT_FOUND");
    }
  });

  it("fails with the raw triple when a field is not a number", () => {
    const error = catchError(() => analyzeReport("hpc|10|1.2.3|0|0|0|100", "pipe"));
    expect(error).toBeInstanceOf(MalformedNumberError);
    if (error instanceof MalformedNumberError) {
      expect(error.token).toBe("1.2.3");
      expect(error.context).toEqual({
        reported: "100",
        down: "1.2.3",
        plannedDown: "0",
      });
      expect(error.rawText).toBe("hpc|10|1.2.3|0|0|0|100");
    }
  });

  it("reads fields with a bare decimal point", () => {
    const result = analyzeReport("hpc|10|.5|0|0|0|100", "pipe");
    expect(result.metrics.down).toBe(0.5);
    expect(result.availableExclPlanned).toBe(99.5);
  });
});
