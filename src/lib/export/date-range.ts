import {
  endOfMonth,
  endOfWeek,
  format,
  isValid,
  parse,
  startOfMonth,
  startOfWeek,
  subDays,
  subMonths,
  subWeeks,
} from "date-fns";
import { ConfigurationError } from "../errors";

export const DATE_FILTERS = [
  "TODAY",
  "YESTERDAY",
  "THIS_WEEK",
  "LAST_WEEK",
  "THIS_MONTH",
  "LAST_MONTH",
  "TILL_DATE",
] as const;

export type DateFilter = (typeof DATE_FILTERS)[number];

export const DEFAULT_DATE_FILTER: DateFilter = "YESTERDAY";

/** Lower bound used by TILL_DATE. */
export const EARLIEST_DATE = "1970-01-01";

const ISO_DAY = "yyyy-MM-dd";

export interface DateRangeOverrides {
  startDate?: string;
  endDate?: string;
}

/** Inclusive on both ends, `YYYY-MM-DD`. */
export interface DateRange {
  startDate: string;
  endDate: string;
  /** The keyword used, or CUSTOM when both bounds came from overrides. */
  filter: DateFilter | "CUSTOM";
}

export function isDateFilter(value: string): value is DateFilter {
  return DATE_FILTERS.some((filter) => filter === value);
}

function toIsoDay(date: Date): string {
  return format(date, ISO_DAY);
}

function parseOverride(label: string, value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;

  const parsed = /^\d{4}-\d{2}-\d{2}$/.test(trimmed) ? parse(trimmed, ISO_DAY, new Date()) : null;
  if (!parsed || !isValid(parsed)) {
    throw new ConfigurationError(`${label} must be a calendar date in YYYY-MM-DD format, got "${trimmed}"`);
  }
  return trimmed;
}

/**
 * Map a keyword to its [start, end] pair on the local calendar of `today`.
 * Weeks run Monday through Sunday.
 */
export function rangeForFilter(filter: DateFilter, today: Date): { startDate: string; endDate: string } {
  switch (filter) {
    case "TODAY":
      return { startDate: toIsoDay(today), endDate: toIsoDay(today) };
    case "YESTERDAY": {
      const yesterday = subDays(today, 1);
      return { startDate: toIsoDay(yesterday), endDate: toIsoDay(yesterday) };
    }
    case "THIS_WEEK":
      return {
        startDate: toIsoDay(startOfWeek(today, { weekStartsOn: 1 })),
        endDate: toIsoDay(endOfWeek(today, { weekStartsOn: 1 })),
      };
    case "LAST_WEEK": {
      const lastWeek = subWeeks(today, 1);
      return {
        startDate: toIsoDay(startOfWeek(lastWeek, { weekStartsOn: 1 })),
        endDate: toIsoDay(endOfWeek(lastWeek, { weekStartsOn: 1 })),
      };
    }
    case "THIS_MONTH":
      return { startDate: toIsoDay(startOfMonth(today)), endDate: toIsoDay(endOfMonth(today)) };
    case "LAST_MONTH": {
      const lastMonth = subMonths(today, 1);
      return { startDate: toIsoDay(startOfMonth(lastMonth)), endDate: toIsoDay(endOfMonth(lastMonth)) };
    }
    case "TILL_DATE":
      return { startDate: EARLIEST_DATE, endDate: toIsoDay(today) };
  }
}

/**
 * Resolve the export window from a keyword plus optional overrides.
 * Each non-empty override replaces its own bound; with both present the
 * keyword is not consulted at all, so an unknown keyword is tolerated.
 */
export function resolveDateRange(
  keyword: string | undefined,
  overrides: DateRangeOverrides = {},
  today: Date = new Date(),
): DateRange {
  const startOverride = parseOverride("CUSTOM_START_DATE", overrides.startDate);
  const endOverride = parseOverride("CUSTOM_END_DATE", overrides.endDate);

  let range: DateRange;
  if (startOverride && endOverride) {
    range = { startDate: startOverride, endDate: endOverride, filter: "CUSTOM" };
  } else {
    const normalized = keyword?.trim().toUpperCase() || DEFAULT_DATE_FILTER;
    if (!isDateFilter(normalized)) {
      throw new ConfigurationError(
        `Unknown DATE_FILTER "${keyword}". Expected one of ${DATE_FILTERS.join(", ")} ` +
          "or both CUSTOM_START_DATE and CUSTOM_END_DATE",
      );
    }
    const base = rangeForFilter(normalized, today);
    range = {
      startDate: startOverride ?? base.startDate,
      endDate: endOverride ?? base.endDate,
      filter: normalized,
    };
  }

  // ISO day strings compare lexicographically
  if (range.startDate > range.endDate) {
    throw new ConfigurationError(`Start date ${range.startDate} is after end date ${range.endDate}`);
  }

  return range;
}
