import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { ReportEnv } from "../config/env";
import { buildTimesheetReport } from "../analytics/timesheet-summary";
import { buildTableRequests, fetchAllTables, type FetchLike } from "../data-api/rest-client";
import { buildReportHtml } from "./report-template";
import { writeReportStatus, type QueryStatus } from "./report-status";

export const REPORT_FILE = "timesheet-report.html";

export interface ReportGeneratorDeps {
  fetch?: FetchLike;
  now?: Date;
}

export interface ReportGeneratorResult {
  outputPath: string;
  status: QueryStatus;
  hasData: boolean;
  errors: string[];
}

/**
 * Fetch → normalize → enrich/aggregate → render. Fetch failures are
 * isolated per table and only show up in the status files; the document
 * is always written.
 */
export async function generateTimesheetReport(
  env: ReportEnv,
  deps: ReportGeneratorDeps = {},
): Promise<ReportGeneratorResult> {
  const now = deps.now ?? new Date();
  const requests = buildTableRequests(env.REPORT_LOOKBACK_DAYS, now);

  console.log(`[report] Fetching ${requests.length} tables (time entries from the last ${env.REPORT_LOOKBACK_DAYS} days)`);
  const { tables, errors } = await fetchAllTables(
    { baseUrl: env.DATA_API_URL, apiKey: env.DATA_API_KEY },
    requests,
    deps.fetch,
  );

  const status = writeReportStatus(env.REPORT_OUTPUT_DIR, errors);
  if (errors.length > 0) {
    console.warn(`[report] ${errors.length} of ${requests.length} fetches failed — continuing with empty tables`);
  }

  const report = buildTimesheetReport(tables);
  if (!report.hasData) {
    console.warn(`[report] ${report.reason} — rendering "no data" sections`);
  }

  const html = buildReportHtml(report, { title: env.REPORT_TITLE, generatedAt: now });
  const outputPath = join(env.REPORT_OUTPUT_DIR, REPORT_FILE);
  mkdirSync(env.REPORT_OUTPUT_DIR, { recursive: true });
  writeFileSync(outputPath, html, "utf-8");

  console.log(`[report] Wrote ${outputPath} (status ${status})`);
  return { outputPath, status, hasData: report.hasData, errors };
}
