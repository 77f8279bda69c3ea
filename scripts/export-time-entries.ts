/**
 * Scheduled timesheet export.
 *
 * Resolves the date filter, queries time entries for the target projects
 * over a direct database connection, writes one CSV, and hands its path to
 * the workflow as the `csv_filepath` output. Committing the file is the
 * workflow's job.
 *
 * Usage:
 *   npx tsx scripts/export-time-entries.ts
 *
 * Environment:
 *   DB_HOST, DB_PORT, DB_NAME, DB_USER (<user>.<project-ref>), DB_PASS,
 *   TARGET_PROJECTS, DATE_FILTER, CUSTOM_START_DATE, CUSTOM_END_DATE
 *   (see .env.example).
 */

import * as dotenv from "dotenv";
import * as path from "path";

const root = path.resolve(__dirname, "..");
dotenv.config({ path: path.join(root, ".env") });
dotenv.config({ path: path.join(root, ".env.local"), override: true });

import type { Pool } from "pg";
import { getExportEnv } from "../src/lib/config/env";
import { closePool, createPool, createQueryRunner } from "../src/lib/db/database";
import { CSV_OUTPUT_NAME, emitOutput, runExportJob, writeFatalError } from "../src/lib/export/export-job";

function log(msg: string) {
  const ts = new Date().toISOString().slice(11, 19);
  console.log(`[${ts}] ${msg}`);
}

async function main() {
  const env = getExportEnv();
  const opened: Pool[] = [];

  try {
    const result = await runExportJob(env, {
      connect: (config) => {
        const pool = createPool(config);
        opened.push(pool);
        return createQueryRunner(pool);
      },
    });

    emitOutput(CSV_OUTPUT_NAME, result.filePath, env.GITHUB_OUTPUT);
    log(`Export complete: ${result.rowCount} rows (${result.range.startDate} .. ${result.range.endDate})`);
  } finally {
    for (const pool of opened) await closePool(pool);
  }
}

main().catch((err: unknown) => {
  const exportDir = process.env.EXPORT_DIR?.trim() || "exports";
  console.error("[export] Fatal:", err instanceof Error ? err.message : err);
  try {
    const file = writeFatalError(exportDir, err);
    console.error(`[export] Details written to ${file}`);
  } catch (writeErr) {
    console.error("[export] Could not write fatal error file:", writeErr);
  }
  process.exit(1);
});
