import { appendFileSync, mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { ExportEnv } from "../config/env";
import type { DbConfig, QueryRunner } from "../db/database";
import { validateDbCredentials } from "../db/credentials";
import { emptyResultWarning, type EmptyResultWarning } from "../errors";
import { buildExportPath, serializeRows, writeExportFile } from "./csv-writer";
import { resolveDateRange, type DateRange } from "./date-range";
import { EXPORT_COLUMNS, buildExportQuery, parseTargetProjects, runExportQuery } from "./export-query";

/** Named output the workflow reads to find the CSV. */
export const CSV_OUTPUT_NAME = "csv_filepath";

export interface ExportJobDeps {
  /** Opens the database; called only after config and credentials check out. */
  connect: (config: DbConfig) => QueryRunner;
  now?: Date;
}

export interface ExportJobResult {
  filePath: string;
  rowCount: number;
  projects: string[];
  range: DateRange;
  warning?: EmptyResultWarning;
}

/**
 * Resolve config → resolve date range → query → write CSV.
 * Every failure propagates; the file is only written once the query has
 * fully succeeded.
 */
export async function runExportJob(env: ExportEnv, deps: ExportJobDeps): Promise<ExportJobResult> {
  const projects = parseTargetProjects(env.TARGET_PROJECTS);
  const range = resolveDateRange(
    env.DATE_FILTER,
    { startDate: env.CUSTOM_START_DATE, endDate: env.CUSTOM_END_DATE },
    deps.now,
  );

  console.log(`[export] Target projects: ${projects.join(" | ")}`);
  console.log(`[export] Date filter: ${range.filter} → ${range.startDate} .. ${range.endDate}`);

  const credentials = validateDbCredentials(env.DB_USER, env.DB_PASS);
  const runner = deps.connect({
    ...credentials,
    host: env.DB_HOST,
    port: env.DB_PORT,
    database: env.DB_NAME,
    ssl: env.DB_SSL,
  });

  const result = await runExportQuery(runner, buildExportQuery(projects, range));
  const columns = result.columns.length > 0 ? result.columns : [...EXPORT_COLUMNS];

  const filePath = buildExportPath(env.EXPORT_DIR, range, projects);
  writeExportFile(filePath, serializeRows(columns, result.rows));

  let warning: EmptyResultWarning | undefined;
  if (result.rows.length === 0) {
    warning = emptyResultWarning(
      `No time entries for ${projects.join(", ")} between ${range.startDate} and ${range.endDate}`,
    );
    console.warn(`[export] ${warning.message} — wrote header-only file`);
  }

  console.log(`[export] Wrote ${result.rows.length} rows to ${filePath}`);
  return { filePath, rowCount: result.rows.length, projects, range, warning };
}

/**
 * Hand a value back to the invoking workflow. When GITHUB_OUTPUT points at
 * a file the `name=value` line is appended there; it is logged either way.
 */
export function emitOutput(name: string, value: string, outputFile?: string): void {
  if (outputFile) {
    appendFileSync(outputFile, `${name}=${value}\n`, "utf-8");
  }
  console.log(`[export] output ${name}=${value}`);
}

/** Leaves the message and stack next to where the CSV would have gone. */
export function writeFatalError(dir: string, err: unknown): string {
  const filePath = join(dir, "fatal_error.txt");
  const detail = err instanceof Error ? `Error: ${err.message}\n\n${err.stack ?? ""}` : `Error: ${String(err)}`;
  mkdirSync(dir, { recursive: true });
  writeFileSync(filePath, detail, "utf-8");
  return filePath;
}
