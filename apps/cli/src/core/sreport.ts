import type {
  ReportPeriod,
  SreportAttempt,
  UtilizationReport,
} from "@slurm-availability/shared";
import {
  DEFAULT_SREPORT_COMMAND,
  SREPORT_ERROR_MARKERS,
} from "@slurm-availability/shared";
import type { CommandRunner } from "./runner.ts";
import { ExternalToolFailure } from "@/lib/errors.ts";

export interface UtilizationQuery {
  cluster?: string;
}

/**
 * `--parsable2` output is trusted only if sreport exited cleanly, printed no
 * known error text, and actually produced pipe-delimited fields.
 */
export function acceptsParsableOutput(attempt: SreportAttempt): boolean {
  if (attempt.exitCode !== 0) return false;
  if (SREPORT_ERROR_MARKERS.some((marker) => attempt.output.includes(marker))) {
    return false;
  }
  return attempt.output.includes("|");
}

export class SreportClient {
  private runner: CommandRunner;
  private command: string;

  constructor(runner: CommandRunner, command = DEFAULT_SREPORT_COMMAND) {
    this.runner = runner;
    this.command = command;
  }

  buildArgv(
    period: ReportPeriod,
    query: UtilizationQuery,
    parsable: boolean,
  ): string[] {
    const argv = [
      this.command,
      "cluster",
      "utilization",
      `start=${period.start}`,
      `end=${period.end}`,
    ];
    if (query.cluster) argv.push(`cluster=${query.cluster}`);
    if (parsable) argv.push("-t", "Minutes", "--parsable2");
    return argv;
  }

  private async attempt(argv: string[]): Promise<SreportAttempt> {
    const { exitCode, output } = await this.runner.run(argv);
    return { argv, exitCode, output };
  }

  /**
   * Fetch the cluster utilization report for a period. Tries `--parsable2`
   * first and falls back to the plain column layout exactly once, whatever
   * the reason the first attempt was rejected.
   */
  async getUtilizationReport(
    period: ReportPeriod,
    query: UtilizationQuery = {},
  ): Promise<UtilizationReport> {
    const primary = await this.attempt(this.buildArgv(period, query, true));

    if (acceptsParsableOutput(primary)) {
      return {
        text: primary.output,
        mode: "pipe",
        attempts: [primary],
        fellBack: false,
      };
    }

    const fallback = await this.attempt(this.buildArgv(period, query, false));
    const attempts = [primary, fallback];

    if (fallback.exitCode !== 0) {
      throw new ExternalToolFailure(attempts, fallback.exitCode);
    }

    return {
      text: fallback.output,
      mode: "whitespace",
      attempts,
      fellBack: true,
    };
  }
}
