import { format, subDays } from "date-fns";
import type { z } from "zod";
import type { TableName, TimesheetTables } from "@/types/timesheet";
import { ConnectionError, errorMessage } from "../errors";
import {
  ActivityTypeSchema,
  CompanySchema,
  ProjectSchema,
  TimeEntrySchema,
  UserSchema,
  normalizeRows,
} from "../analytics/timesheet-schemas";

export interface DataApiConfig {
  baseUrl: string;
  apiKey: string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TableRequest {
  table: TableName;
  /** Remote table name on the REST endpoint. */
  resource: string;
  /** Query parameters in `column=operator.value` form. */
  filters: Record<string, string>;
}

export interface TableFetchResult {
  table: TableName;
  rows: unknown[];
  error?: string;
}

export interface FetchAllResult {
  tables: TimesheetTables;
  errors: string[];
}

const NOT_DELETED = { deletedAt: "is.null" };

/**
 * One request per table. Every table excludes soft-deleted rows; time
 * entries are additionally bounded below by date.
 */
export function buildTableRequests(lookbackDays: number, today: Date = new Date()): TableRequest[] {
  const since = format(subDays(today, lookbackDays), "yyyy-MM-dd");
  return [
    { table: "companies", resource: "Company", filters: { ...NOT_DELETED } },
    { table: "projects", resource: "Project", filters: { ...NOT_DELETED } },
    { table: "users", resource: "User", filters: { ...NOT_DELETED } },
    { table: "activityTypes", resource: "ActivityType", filters: { ...NOT_DELETED } },
    {
      table: "timeEntries",
      resource: "TimeEntry",
      filters: { ...NOT_DELETED, date: `gte.${since}`, order: "date.desc" },
    },
  ];
}

export function buildTableUrl(config: DataApiConfig, request: TableRequest): string {
  const params = new URLSearchParams({ select: "*", ...request.filters });
  return `${config.baseUrl}/rest/v1/${encodeURIComponent(request.resource)}?${params.toString()}`;
}

function apiHeaders(apiKey: string): Record<string, string> {
  return {
    apikey: apiKey,
    Authorization: `Bearer ${apiKey}`,
    Accept: "application/json",
  };
}

/**
 * Fetch one table. Never throws: a bad status, a transport failure or a
 * body that is not a JSON array all come back as an empty table with the
 * error message attached.
 */
export async function fetchTable(
  config: DataApiConfig,
  request: TableRequest,
  fetchImpl: FetchLike = fetch,
): Promise<TableFetchResult> {
  const url = buildTableUrl(config, request);

  try {
    const response = await fetchImpl(url, { headers: apiHeaders(config.apiKey) });
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new ConnectionError(
        `${request.resource} request returned ${response.status}: ${response.statusText}${body ? ` — ${body.slice(0, 200)}` : ""}`,
      );
    }

    const json: unknown = await response.json();
    if (!Array.isArray(json)) {
      throw new ConnectionError(`${request.resource} response was not a JSON array`);
    }

    console.log(`[data-api] Fetched ${json.length} rows from ${request.resource}`);
    return { table: request.table, rows: json };
  } catch (err) {
    const message = err instanceof ConnectionError ? err.message : `${request.resource} request failed: ${errorMessage(err)}`;
    console.error(`[data-api] ${message}`);
    return { table: request.table, rows: [], error: message };
  }
}

/**
 * Fetch all five tables in sequence and normalize each one. A failure on
 * one table leaves the other four untouched.
 */
export async function fetchAllTables(
  config: DataApiConfig,
  requests: TableRequest[],
  fetchImpl: FetchLike = fetch,
): Promise<FetchAllResult> {
  const raw: Record<TableName, unknown[]> = {
    companies: [],
    projects: [],
    users: [],
    activityTypes: [],
    timeEntries: [],
  };
  const errors: string[] = [];

  for (const request of requests) {
    const result = await fetchTable(config, request, fetchImpl);
    if (result.error) errors.push(result.error);
    raw[request.table] = result.rows;
  }

  return { tables: normalizeTables(raw), errors };
}

function normalizeTable<T>(table: TableName, rows: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const { data, warnings } = normalizeRows(rows, schema);
  for (const warning of warnings) {
    console.warn(`[data-api] ${table}: dropped malformed row — ${warning}`);
  }
  return data;
}

export function normalizeTables(raw: Record<TableName, unknown[]>): TimesheetTables {
  return {
    companies: normalizeTable("companies", raw.companies, CompanySchema),
    projects: normalizeTable("projects", raw.projects, ProjectSchema),
    users: normalizeTable("users", raw.users, UserSchema),
    activityTypes: normalizeTable("activityTypes", raw.activityTypes, ActivityTypeSchema),
    timeEntries: normalizeTable("timeEntries", raw.timeEntries, TimeEntrySchema),
  };
}
