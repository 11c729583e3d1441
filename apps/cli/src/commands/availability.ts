import type { Command } from "commander";
import ora from "ora";
import type { UtilizationReport } from "@slurm-availability/shared";
import { ensureSetup } from "@/lib/setup.ts";
import { parsePeriod, describePeriod } from "@/lib/period.ts";
import {
  RULE,
  theme,
  formatSectionHeader,
  formatWarning,
} from "@/lib/theme.ts";
import { renderTable } from "@/lib/table.ts";
import {
  availabilityJson,
  availabilityRows,
  availabilityWarnings,
  failureJson,
  failureLines,
  fallbackWarningLines,
  type AvailabilityRow,
} from "@/lib/format-availability.ts";
import { runAvailability } from "@/core/pipeline.ts";

interface AvailabilityOptions {
  cluster?: string;
  host?: string;
  local?: boolean;
  json?: boolean;
}

export function registerAvailabilityCommand(program: Command) {
  program
    .command("availability")
    .alias("avail")
    .description("CPU time availability for a day, month, or year")
    .argument("<period>", "YYYY, YYYY-MM, or YYYY-MM-DD")
    .option("-c, --cluster <name>", "cluster to report on")
    .option("--host <host>", "run sreport on this login node over ssh")
    .option("--local", "run sreport on this machine even if a host is configured")
    .option("--json", "output as JSON")
    .action(async (period: string, options: AvailabilityOptions) => {
      try {
        await runAvailabilityCommand(period, options);
      } catch (error) {
        reportFailure(error, !!options.json);
        process.exit(1);
      }
    });
}

function reportFailure(error: unknown, isJson: boolean): void {
  if (isJson) {
    console.log(JSON.stringify(failureJson(error), null, 2));
    return;
  }

  const [headline, ...details] = failureLines(error);
  console.error(theme.error(`\n${headline}`));
  for (const line of details) {
    console.error(line);
  }
}

function warnFallback(report: UtilizationReport): void {
  const [headline, ...details] = fallbackWarningLines(report);
  if (headline === undefined) return;

  console.error(formatWarning(headline));
  for (const line of details) {
    console.error(theme.muted(line));
  }
}

function rowsToTable(rows: AvailabilityRow[]): string[][] {
  return rows.map((row) => [
    `${row.label}:`,
    row.value,
    row.note ? theme.muted(`(${row.note})`) : "",
  ]);
}

async function runAvailabilityCommand(
  periodArg: string,
  options: AvailabilityOptions,
) {
  const isJson = !!options.json;
  const period = parsePeriod(periodArg);
  const { config, sreport } = ensureSetup({
    host: options.host,
    local: options.local,
  });
  const cluster = options.cluster ?? config.sreport.cluster;

  const spinner = isJson
    ? null
    : ora(
        `Fetching Slurm utilization report ${describePeriod(period)} (from ${period.start} to ${period.end})...`,
      ).start();

  const { report, result } = await runAvailability(sreport, period, {
    cluster,
  }).finally(() => spinner?.stop());

  if (isJson) {
    console.log(
      JSON.stringify(availabilityJson(period, report.mode, result), null, 2),
    );
    return;
  }

  warnFallback(report);
  for (const warning of availabilityWarnings(result)) {
    console.error(formatWarning(warning));
  }

  const rows = availabilityRows(result, config.display.decimal_separator);

  console.log(theme.emphasis(`\nSlurm Cluster CPU Time Availability ${describePeriod(period)}`));
  console.log(theme.muted(`${period.start} to ${period.end}${cluster ? `, cluster ${cluster}` : ""}`));

  console.log(formatSectionHeader("Reported by sreport"));
  renderTable({ rows: rowsToTable(rows.figures) });

  console.log(formatSectionHeader("Availability"));
  renderTable({ rows: rowsToTable(rows.totals) });

  console.log(theme.muted(`  ${RULE}`));
  renderTable({
    rows: rowsToTable(
      rows.percents.map((row) => ({
        ...row,
        value: row.value.endsWith("%")
          ? theme.success(row.value)
          : theme.warning(row.value),
      })),
    ),
  });
  console.log();
}
