import { ConfigurationError } from "../errors";
import type { QueryResultSet, QueryRunner } from "../db/database";
import type { DateRange } from "./date-range";

export interface ExportQuery {
  text: string;
  values: string[];
}

/** Column order of the exported CSV. */
export const EXPORT_COLUMNS = [
  "project_name",
  "company_name",
  "user_name",
  "focus_area",
  "entry_date",
  "start_time",
  "end_time",
  "duration_minutes",
  "description",
] as const;

/**
 * Split the comma-separated TARGET_PROJECTS value. Blank entries and
 * repeats are dropped; the first spelling of a repeated name wins.
 */
export function parseTargetProjects(raw: string): string[] {
  const seen = new Set<string>();
  const projects: string[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    projects.push(name);
  }
  if (projects.length === 0) {
    throw new ConfigurationError("TARGET_PROJECTS does not name any project");
  }
  return projects;
}

/**
 * One statement for the whole run: project titles in an IN list, entry date
 * inclusive on both ends. Lookups are left joins so an entry with a dangling
 * user or activity reference is still exported.
 */
export function buildExportQuery(projects: string[], range: DateRange): ExportQuery {
  if (projects.length === 0) {
    throw new ConfigurationError("At least one target project is required");
  }

  const projectParams = projects.map((_, i) => `$${i + 1}`).join(", ");
  const startParam = `$${projects.length + 1}`;
  const endParam = `$${projects.length + 2}`;

  const text = `
    SELECT
      p."title" AS project_name,
      c."name" AS company_name,
      NULLIF(TRIM(CONCAT_WS(' ', u."firstName", u."lastName")), '') AS user_name,
      a."title" AS focus_area,
      te."date"::text AS entry_date,
      te."startTime"::text AS start_time,
      te."endTime"::text AS end_time,
      te."duration" AS duration_minutes,
      te."description" AS description
    FROM "TimeEntry" te
    JOIN "Project" p ON p."id" = te."projectId"
    LEFT JOIN "Company" c ON c."id" = p."companyId"
    LEFT JOIN "User" u ON u."id" = te."userId"
    LEFT JOIN "ActivityType" a ON a."id" = te."activityTypeId"
    WHERE te."deletedAt" IS NULL
      AND p."title" IN (${projectParams})
      AND te."date"::date BETWEEN ${startParam} AND ${endParam}
    ORDER BY project_name, user_name, focus_area, entry_date, start_time`;

  return { text, values: [...projects, range.startDate, range.endDate] };
}

export async function runExportQuery(runner: QueryRunner, query: ExportQuery): Promise<QueryResultSet> {
  const started = Date.now();
  const result = await runner.query(query.text, query.values);
  console.log(`[export] Query returned ${result.rows.length} rows in ${Date.now() - started}ms`);
  return result;
}
