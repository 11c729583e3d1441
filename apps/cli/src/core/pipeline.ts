import type {
  AvailabilityResult,
  ReportPeriod,
  UtilizationReport,
} from "@slurm-availability/shared";
import type { SreportClient, UtilizationQuery } from "./sreport.ts";
import { analyzeReport } from "./availability.ts";

export interface AvailabilityRun {
  period: ReportPeriod;
  report: UtilizationReport;
  result: AvailabilityResult;
}

export async function runAvailability(
  client: SreportClient,
  period: ReportPeriod,
  query: UtilizationQuery = {},
): Promise<AvailabilityRun> {
  const report = await client.getUtilizationReport(period, query);
  const result = analyzeReport(report.text, report.mode);
  return { period, report, result };
}
