/**
 * Unit tests for timesheet aggregation
 */

import type { EnrichedTimeEntry, TimesheetTables } from "@/types/timesheet";
import {
  buildTimesheetReport,
  recentEntries,
  summarizeActivities,
  summarizeDaily,
  summarizeProjects,
  summarizeUsers,
} from "../timesheet-summary";
import { baseTables, timeEntry } from "./fixtures";

function enriched(overrides: Partial<EnrichedTimeEntry> & { id: string }): EnrichedTimeEntry {
  return {
    date: "2024-03-15",
    startTime: null,
    endTime: null,
    calculatedDuration: 1,
    userId: "u1",
    userName: "Ada Lovelace",
    projectId: "p1",
    projectTitle: "Apollo",
    companyName: "Acme Holdings",
    activityTitle: "Development",
    description: "Routine work",
    ...overrides,
  };
}

describe("summarizeUsers", () => {
  it("should keep the 10 highest totals, sorted descending", () => {
    const entries = Array.from({ length: 12 }, (_, i) =>
      enriched({ id: String(i), userName: `User ${i + 1}`, calculatedDuration: i + 1 }),
    );

    const users = summarizeUsers(entries);

    expect(users).toHaveLength(10);
    expect(users.map((u) => u.label)).toEqual([
      "User 12",
      "User 11",
      "User 10",
      "User 9",
      "User 8",
      "User 7",
      "User 6",
      "User 5",
      "User 4",
      "User 3",
    ]);
    expect(users.map((u) => u.totalHours)).toEqual([12, 11, 10, 9, 8, 7, 6, 5, 4, 3]);
  });

  it("should break ties by first appearance", () => {
    const users = summarizeUsers([
      enriched({ id: "1", userName: "Grace Hopper", calculatedDuration: 2 }),
      enriched({ id: "2", userName: "Alan Turing", calculatedDuration: 3 }),
      enriched({ id: "3", userName: "Ada Lovelace", calculatedDuration: 2 }),
    ]);
    expect(users.map((u) => u.label)).toEqual(["Alan Turing", "Grace Hopper", "Ada Lovelace"]);
  });

  it("should report entry counts, project counts and share of hours", () => {
    const users = summarizeUsers([
      enriched({ id: "1", userName: "Ada Lovelace", calculatedDuration: 1.5, projectTitle: "Apollo" }),
      enriched({ id: "2", userName: "Ada Lovelace", calculatedDuration: 1.5, projectTitle: "Gemini" }),
      enriched({ id: "3", userName: "Alan Turing", calculatedDuration: 1 }),
    ]);
    expect(users).toEqual([
      { label: "Ada Lovelace", totalHours: 3, entryCount: 2, sharePercent: 75, projectCount: 2 },
      { label: "Alan Turing", totalHours: 1, entryCount: 1, sharePercent: 25, projectCount: 1 },
    ]);
  });
});

describe("summarizeProjects", () => {
  it("should keep the 15 highest totals", () => {
    const entries = Array.from({ length: 17 }, (_, i) =>
      enriched({ id: String(i), projectTitle: `Project ${i + 1}`, calculatedDuration: (i + 1) / 10 }),
    );
    const projects = summarizeProjects(entries);
    expect(projects).toHaveLength(15);
    expect(projects[0].label).toBe("Project 17");
    expect(projects[14].label).toBe("Project 3");
  });

  it("should carry the company name and distinct user count", () => {
    const projects = summarizeProjects([
      enriched({ id: "1", userName: "Ada Lovelace" }),
      enriched({ id: "2", userName: "Alan Turing" }),
      enriched({ id: "3", userName: "Ada Lovelace" }),
    ]);
    expect(projects).toEqual([
      {
        label: "Apollo",
        totalHours: 3,
        entryCount: 3,
        sharePercent: 100,
        companyName: "Acme Holdings",
        userCount: 2,
      },
    ]);
  });
});

describe("summarizeActivities", () => {
  it("should list every activity type", () => {
    const entries = Array.from({ length: 12 }, (_, i) =>
      enriched({ id: String(i), activityTitle: `Activity ${i}`, calculatedDuration: 1 }),
    );
    expect(summarizeActivities(entries)).toHaveLength(12);
  });
});

describe("summarizeDaily", () => {
  it("should total hours per day in date order and skip undated entries", () => {
    const daily = summarizeDaily([
      enriched({ id: "1", date: "2024-03-15", calculatedDuration: 2 }),
      enriched({ id: "2", date: "2024-03-14", calculatedDuration: 1.25, userName: "Alan Turing" }),
      enriched({ id: "3", date: "2024-03-15", calculatedDuration: 0.5, userName: "Alan Turing" }),
      enriched({ id: "4", date: null, calculatedDuration: 8 }),
    ]);
    expect(daily).toEqual([
      { date: "2024-03-14", totalHours: 1.25, entryCount: 1, userCount: 1 },
      { date: "2024-03-15", totalHours: 2.5, entryCount: 2, userCount: 2 },
    ]);
  });
});

describe("recentEntries", () => {
  it("should return the newest entries first, up to the limit", () => {
    const entries = Array.from({ length: 25 }, (_, i) =>
      enriched({ id: String(i), date: `2024-03-${String(i + 1).padStart(2, "0")}` }),
    );
    const recent = recentEntries(entries);
    expect(recent).toHaveLength(20);
    expect(recent[0].date).toBe("2024-03-25");
    expect(recent[19].date).toBe("2024-03-06");
  });

  it("should order same-day entries by start time and put undated entries last", () => {
    const recent = recentEntries([
      enriched({ id: "1", date: null, description: "undated" }),
      enriched({ id: "2", date: "2024-03-15", startTime: "08:00", description: "early" }),
      enriched({ id: "3", date: "2024-03-15", startTime: "14:00", description: "late" }),
    ]);
    expect(recent.map((r) => r.description)).toEqual(["late", "early", "undated"]);
    expect(recent[2].date).toBe("—");
  });

  it("should compare start times by clock value, not as text", () => {
    const recent = recentEntries([
      enriched({ id: "1", date: "2024-03-15", startTime: "10:00", description: "ten" }),
      enriched({ id: "2", date: "2024-03-15T00:00:00+00:00", startTime: "9:30", description: "half past nine" }),
      enriched({ id: "3", date: "2024-03-15", startTime: null, description: "no start" }),
      enriched({ id: "4", date: "2024-03-14", startTime: "23:00", description: "day before" }),
    ]);
    expect(recent.map((r) => r.description)).toEqual(["ten", "half past nine", "no start", "day before"]);
    expect(recent[1].date).toBe("2024-03-15");
  });
});

describe("buildTimesheetReport", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it.each(["timeEntries", "projects", "users"] as const)("should report no data when %s is empty", (table) => {
    const tables: TimesheetTables = baseTables([timeEntry({ id: "1" })]);
    tables[table] = [];
    const report = buildTimesheetReport(tables);
    expect(report.hasData).toBe(false);
    if (!report.hasData) {
      expect(report.reason).toBe(`No rows fetched for: ${table}`);
    }
  });

  it("should report no data when every table is empty", () => {
    const report = buildTimesheetReport({
      companies: [],
      projects: [],
      users: [],
      activityTypes: [],
      timeEntries: [],
    });
    expect(report).toEqual({
      hasData: false,
      reason: "No rows fetched for: timeEntries, projects, users",
      overview: {
        rawCounts: { companies: 0, projects: 0, users: 0, activityTypes: 0, timeEntries: 0 },
        retainedEntries: 0,
        excludedEntries: 0,
        firstDate: null,
        lastDate: null,
        totalHours: 0,
      },
    });
  });

  it("should keep an entry with an unknown project in user and activity totals", () => {
    const report = buildTimesheetReport(
      baseTables([
        timeEntry({ id: "1", duration: 90 }),
        timeEntry({ id: "2", duration: 30, projectId: "ghost" }),
        timeEntry({ id: "3", duration: 1500 }),
      ]),
    );

    if (!report.hasData) throw new Error("expected data");
    expect(report.projects.map((p) => [p.label, p.totalHours])).toEqual([
      ["Apollo", 1.5],
      ["Unknown Project", 0.5],
    ]);
    expect(report.users).toEqual([
      { label: "Ada Lovelace", totalHours: 2, entryCount: 2, sharePercent: 100, projectCount: 2 },
    ]);
    expect(report.activities).toEqual([
      { label: "Development", totalHours: 2, entryCount: 2, sharePercent: 100 },
    ]);
    expect(report.overview).toMatchObject({ retainedEntries: 2, excludedEntries: 1, totalHours: 2 });
  });

  it("should summarize the period for the executive section", () => {
    const report = buildTimesheetReport(
      baseTables([
        timeEntry({ id: "1", duration: 120, date: "2024-03-14" }),
        timeEntry({ id: "2", duration: 60, date: "2024-03-15", userId: "u2", projectId: "p2" }),
        timeEntry({ id: "3", duration: 60, date: "2024-03-15" }),
      ]),
    );

    if (!report.hasData) throw new Error("expected data");
    expect(report.executive).toEqual({
      totalHours: 4,
      totalEntries: 3,
      activeUsers: 2,
      activeProjects: 2,
      daysWithEntries: 2,
      averageHoursPerDay: 2,
      topUser: { label: "Ada Lovelace", totalHours: 3, entryCount: 2, sharePercent: 75, projectCount: 1 },
      topProject: {
        label: "Apollo",
        totalHours: 3,
        entryCount: 2,
        sharePercent: 75,
        companyName: "Acme Holdings",
        userCount: 1,
      },
    });
    expect(report.overview.firstDate).toBe("2024-03-14");
    expect(report.overview.lastDate).toBe("2024-03-15");
  });
});
