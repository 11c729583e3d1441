import type { CommandResult, CommandRunner } from "@/core/runner.ts";

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export async function catchAsyncError(
  fn: () => Promise<unknown>,
): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/** Replays canned results in order and records every argv it was given. */
export class FakeRunner implements CommandRunner {
  readonly calls: string[][] = [];
  private results: CommandResult[];

  constructor(results: CommandResult[]) {
    this.results = [...results];
  }

  async run(argv: string[]): Promise<CommandResult> {
    this.calls.push(argv);
    const next = this.results.shift();
    if (!next) {
      throw new Error(`Unexpected command: ${argv.join(" ")}`);
    }
    return next;
  }
}

export const PIPE_REPORT = [
  "Cluster|Allocated|Down|PLND Down|Idle|Planned|Reported",
  "cluster1|1000|50|20|0|0|1000",
  "",
].join("\n");

export const COLUMN_REPORT = [
  "--------------------------------------------------------------------------------",
  "Cluster Utilization 2025-01-01 - 2025-02-01",
  "Usage reported in CPU Minutes",
  "--------------------------------------------------------------------------------",
  "  Cluster  Allocated   Down PLND Down  Idle Planned  Reported",
  "--------- ---------- ------ --------- ----- ------- ---------",
  " cluster1       1000     50        20     0       0      1000",
  "",
].join("\n");
