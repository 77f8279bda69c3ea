/**
 * Timesheet report generator.
 *
 * Pulls companies, projects, users, activity types and recent time entries
 * from the REST data API and renders reports/timesheet-report.html, plus
 * query_status.txt / error_log.txt for the calling toolchain.
 *
 * Usage:
 *   npx tsx scripts/generate-timesheet-report.ts
 *
 * Environment:
 *   DATA_API_URL, DATA_API_KEY, REPORT_LOOKBACK_DAYS, REPORT_OUTPUT_DIR,
 *   REPORT_TITLE (see .env.example).
 */

import * as dotenv from "dotenv";
import * as path from "path";

const root = path.resolve(__dirname, "..");
dotenv.config({ path: path.join(root, ".env") });
dotenv.config({ path: path.join(root, ".env.local"), override: true });

import { getReportEnv } from "../src/lib/config/env";
import { generateTimesheetReport } from "../src/lib/report/report-generator";

function log(msg: string) {
  const ts = new Date().toISOString().slice(11, 19);
  console.log(`[${ts}] ${msg}`);
}

async function main() {
  const env = getReportEnv();
  const result = await generateTimesheetReport(env);
  log(`Report ${result.hasData ? "rendered" : "rendered without data"}: ${result.outputPath} (${result.status})`);
}

main().catch((err: unknown) => {
  console.error("[report] Fatal:", err instanceof Error ? err.message : err);
  process.exit(1);
});
