import { isValid, parseISO } from "date-fns";
import type {
  EnrichedTimeEntry,
  TimeEntryRow,
  TimesheetTables,
  UserRow,
} from "@/types/timesheet";

export const UNKNOWN_USER = "Unknown User";
export const UNKNOWN_PROJECT = "Unknown Project";
export const UNKNOWN_ACTIVITY = "Unknown Activity";
export const UNKNOWN_COMPANY = "Unknown Company";
export const NO_DESCRIPTION = "No description";

/** Entries must fall strictly inside (0, MAX_ENTRY_HOURS). */
export const MAX_ENTRY_HOURS = 24;

const TIME_OF_DAY = /^\d{1,2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * "09:30" is read on the entry's own date; anything else must be a full
 * timestamp. Returns epoch millis, or null when it cannot be read.
 */
function toTimestamp(value: string | null, date: string | null): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  const day = date ? date.slice(0, 10) : "1970-01-01";
  const parsed = TIME_OF_DAY.test(trimmed) ? parseISO(`${day}T${padHour(trimmed)}`) : parseISO(trimmed);
  return isValid(parsed) ? parsed.getTime() : null;
}

/** "9:30" -> "09:30" */
function padHour(time: string): string {
  return time.length > 0 && time.indexOf(":") === 1 ? `0${time}` : time;
}

/** Seconds since midnight for a time of day or a full timestamp, null when unreadable. */
export function secondsOfDay(value: string | null): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  const parsed = TIME_OF_DAY.test(trimmed) ? parseISO(`1970-01-01T${padHour(trimmed)}`) : parseISO(trimmed);
  if (!isValid(parsed)) return null;
  return parsed.getHours() * 3600 + parsed.getMinutes() * 60 + parsed.getSeconds();
}

/**
 * Hours worked for one entry.
 *
 * A stored duration that is present and non-zero is minutes. Otherwise the
 * hours come from end minus start. Null when neither path yields a number.
 */
export function calculateDurationHours(entry: TimeEntryRow): number | null {
  if (entry.duration !== null && entry.duration !== 0) {
    return entry.duration / 60;
  }

  const start = toTimestamp(entry.startTime, entry.date);
  const end = toTimestamp(entry.endTime, entry.date);
  if (start === null || end === null) return null;
  return (end - start) / 3_600_000;
}

export function isPlausibleDuration(hours: number | null): hours is number {
  return hours !== null && Number.isFinite(hours) && hours > 0 && hours < MAX_ENTRY_HOURS;
}

export function userDisplayName(user: UserRow | undefined): string {
  if (!user) return UNKNOWN_USER;
  const composed = [user.firstName, user.lastName]
    .map((part) => part?.trim() ?? "")
    .filter(Boolean)
    .join(" ");
  return composed || user.name?.trim() || user.email?.trim() || UNKNOWN_USER;
}

function indexById<T extends { id: string }>(rows: T[]): Map<string, T> {
  const map = new Map<string, T>();
  for (const row of rows) {
    // First row wins on duplicate ids
    if (!map.has(row.id)) map.set(row.id, row);
  }
  return map;
}

function lookup<T>(map: Map<string, T>, key: string | null): T | undefined {
  return key === null ? undefined : map.get(key);
}

export interface EnrichmentResult {
  entries: EnrichedTimeEntry[];
  /** Entries dropped for a missing or implausible duration. */
  excluded: number;
}

/**
 * Derive each entry's duration, drop the implausible ones and left-join the
 * lookup tables. Input order is preserved.
 */
export function enrichTimeEntries(tables: TimesheetTables): EnrichmentResult {
  const projects = indexById(tables.projects);
  const users = indexById(tables.users);
  const activities = indexById(tables.activityTypes);
  const companies = indexById(tables.companies);

  const entries: EnrichedTimeEntry[] = [];
  let excluded = 0;

  for (const entry of tables.timeEntries) {
    const hours = calculateDurationHours(entry);
    if (!isPlausibleDuration(hours)) {
      excluded++;
      continue;
    }

    const project = lookup(projects, entry.projectId);
    const company = project ? lookup(companies, project.companyId) : undefined;
    const activity = lookup(activities, entry.activityTypeId);

    entries.push({
      id: entry.id,
      date: entry.date,
      startTime: entry.startTime,
      endTime: entry.endTime,
      calculatedDuration: hours,
      userId: entry.userId,
      userName: userDisplayName(lookup(users, entry.userId)),
      projectId: entry.projectId,
      projectTitle: project?.title?.trim() || UNKNOWN_PROJECT,
      companyName: company?.name?.trim() || UNKNOWN_COMPANY,
      activityTitle: activity?.title?.trim() || UNKNOWN_ACTIVITY,
      description: entry.description?.trim() || NO_DESCRIPTION,
    });
  }

  if (excluded > 0) {
    console.log(`[timesheet] Excluded ${excluded} entries with a duration outside (0, ${MAX_ENTRY_HOURS}) hours`);
  }

  return { entries, excluded };
}
