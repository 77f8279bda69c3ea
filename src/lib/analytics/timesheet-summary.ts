import type { EnrichedTimeEntry, TimesheetTables } from "@/types/timesheet";
import { enrichTimeEntries, secondsOfDay } from "./timesheet-enrich";

// ─── Types ───────────────────────────────────────────────────

export interface SummaryRow {
  label: string;
  totalHours: number;
  entryCount: number;
  /** Percent of all retained hours, one decimal. */
  sharePercent: number;
}

export interface UserSummaryRow extends SummaryRow {
  projectCount: number;
}

export interface ProjectSummaryRow extends SummaryRow {
  companyName: string;
  userCount: number;
}

export interface DailyTotal {
  date: string;
  totalHours: number;
  entryCount: number;
  userCount: number;
}

export interface RecentEntry {
  date: string;
  userName: string;
  projectTitle: string;
  activityTitle: string;
  hours: number;
  description: string;
}

export interface DataOverview {
  rawCounts: Record<keyof TimesheetTables, number>;
  retainedEntries: number;
  excludedEntries: number;
  firstDate: string | null;
  lastDate: string | null;
  totalHours: number;
}

export interface ExecutiveSummary {
  totalHours: number;
  totalEntries: number;
  activeUsers: number;
  activeProjects: number;
  daysWithEntries: number;
  averageHoursPerDay: number;
  topUser: SummaryRow | null;
  topProject: SummaryRow | null;
}

export type TimesheetReport =
  | { hasData: false; reason: string; overview: DataOverview }
  | {
      hasData: true;
      overview: DataOverview;
      executive: ExecutiveSummary;
      daily: DailyTotal[];
      users: UserSummaryRow[];
      projects: ProjectSummaryRow[];
      activities: SummaryRow[];
      recent: RecentEntry[];
    };

export const TOP_USERS = 10;
export const TOP_PROJECTS = 15;
export const RECENT_ENTRIES = 20;

// ─── Helpers ─────────────────────────────────────────────────

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function sumHours(entries: EnrichedTimeEntry[]): number {
  return entries.reduce((total, e) => total + e.calculatedDuration, 0);
}

/** Groups in order of first appearance. */
function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) group.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}

function distinct(entries: EnrichedTimeEntry[], key: (e: EnrichedTimeEntry) => string): number {
  return new Set(entries.map(key)).size;
}

interface RankedGroup {
  row: SummaryRow;
  group: EnrichedTimeEntry[];
}

/**
 * Total hours per group, highest first. Array.prototype.sort is stable, so
 * equal totals keep first-appearance order. Sorting uses unrounded totals.
 */
function rankGroups(entries: EnrichedTimeEntry[], key: (e: EnrichedTimeEntry) => string): RankedGroup[] {
  const grandTotal = sumHours(entries);
  const ranked = [...groupBy(entries, key)].map(([label, group]) => ({ label, group, hours: sumHours(group) }));
  ranked.sort((a, b) => b.hours - a.hours);

  return ranked.map(({ label, group, hours }) => ({
    group,
    row: {
      label,
      totalHours: round(hours, 2),
      entryCount: group.length,
      sharePercent: grandTotal > 0 ? round((hours / grandTotal) * 100, 1) : 0,
    },
  }));
}

// ─── Summaries ───────────────────────────────────────────────

/** Hours per calendar day, oldest first. Entries without a date are left out. */
export function summarizeDaily(entries: EnrichedTimeEntry[]): DailyTotal[] {
  const dated = entries.filter((e): e is EnrichedTimeEntry & { date: string } => Boolean(e.date));
  return [...groupBy(dated, (e) => e.date.slice(0, 10))]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, group]) => ({
      date,
      totalHours: round(sumHours(group), 2),
      entryCount: group.length,
      userCount: distinct(group, (e) => e.userName),
    }));
}

export function summarizeUsers(entries: EnrichedTimeEntry[], limit = TOP_USERS): UserSummaryRow[] {
  return rankGroups(entries, (e) => e.userName)
    .slice(0, limit)
    .map(({ row, group }) => ({ ...row, projectCount: distinct(group, (e) => e.projectTitle) }));
}

export function summarizeProjects(entries: EnrichedTimeEntry[], limit = TOP_PROJECTS): ProjectSummaryRow[] {
  return rankGroups(entries, (e) => e.projectTitle)
    .slice(0, limit)
    .map(({ row, group }) => ({
      ...row,
      companyName: group[0].companyName,
      userCount: distinct(group, (e) => e.userName),
    }));
}

export function summarizeActivities(entries: EnrichedTimeEntry[]): SummaryRow[] {
  return rankGroups(entries, (e) => e.activityTitle).map(({ row }) => row);
}

/** Descending, with nulls after every value. */
function compareDescNullsLast<T extends string | number>(a: T | null, b: T | null): number {
  if (a === null || b === null) return a === b ? 0 : a === null ? 1 : -1;
  return a < b ? 1 : a > b ? -1 : 0;
}

/** Newest first by date, then start time. Undated entries sort last. */
export function recentEntries(entries: EnrichedTimeEntry[], limit = RECENT_ENTRIES): RecentEntry[] {
  return [...entries]
    .sort(
      (a, b) =>
        compareDescNullsLast(a.date ? a.date.slice(0, 10) : null, b.date ? b.date.slice(0, 10) : null) ||
        compareDescNullsLast(secondsOfDay(a.startTime), secondsOfDay(b.startTime)),
    )
    .slice(0, limit)
    .map((e) => ({
      date: e.date ? e.date.slice(0, 10) : "—",
      userName: e.userName,
      projectTitle: e.projectTitle,
      activityTitle: e.activityTitle,
      hours: round(e.calculatedDuration, 2),
      description: e.description,
    }));
}

export function buildDataOverview(tables: TimesheetTables, entries: EnrichedTimeEntry[], excluded: number): DataOverview {
  const dates = entries
    .map((e) => e.date?.slice(0, 10))
    .filter((d): d is string => Boolean(d))
    .sort();

  return {
    rawCounts: {
      companies: tables.companies.length,
      projects: tables.projects.length,
      users: tables.users.length,
      activityTypes: tables.activityTypes.length,
      timeEntries: tables.timeEntries.length,
    },
    retainedEntries: entries.length,
    excludedEntries: excluded,
    firstDate: dates.length > 0 ? dates[0] : null,
    lastDate: dates.length > 0 ? dates[dates.length - 1] : null,
    totalHours: round(sumHours(entries), 2),
  };
}

function buildExecutiveSummary(
  entries: EnrichedTimeEntry[],
  daily: DailyTotal[],
  users: SummaryRow[],
  projects: SummaryRow[],
): ExecutiveSummary {
  const totalHours = sumHours(entries);
  return {
    totalHours: round(totalHours, 2),
    totalEntries: entries.length,
    activeUsers: distinct(entries, (e) => e.userName),
    activeProjects: distinct(entries, (e) => e.projectTitle),
    daysWithEntries: daily.length,
    averageHoursPerDay: daily.length > 0 ? round(totalHours / daily.length, 2) : 0,
    topUser: users[0] ?? null,
    topProject: projects[0] ?? null,
  };
}

/**
 * Everything the report shows. Without time entries, projects or users
 * there is nothing meaningful to aggregate and every section reports
 * "no data".
 */
export function buildTimesheetReport(tables: TimesheetTables): TimesheetReport {
  const missing = (["timeEntries", "projects", "users"] as const).filter((t) => tables[t].length === 0);
  if (missing.length > 0) {
    const overview = buildDataOverview(tables, [], 0);
    return { hasData: false, reason: `No rows fetched for: ${missing.join(", ")}`, overview };
  }

  const { entries, excluded } = enrichTimeEntries(tables);
  const daily = summarizeDaily(entries);
  const users = summarizeUsers(entries);
  const projects = summarizeProjects(entries);

  return {
    hasData: true,
    overview: buildDataOverview(tables, entries, excluded),
    executive: buildExecutiveSummary(entries, daily, users, projects),
    daily,
    users,
    projects,
    activities: summarizeActivities(entries),
    recent: recentEntries(entries),
  };
}
