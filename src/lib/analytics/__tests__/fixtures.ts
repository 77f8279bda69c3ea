import type { TimeEntryRow, TimesheetTables } from "@/types/timesheet";

export function timeEntry(overrides: Partial<TimeEntryRow> & { id: string }): TimeEntryRow {
  return {
    projectId: "p1",
    userId: "u1",
    activityTypeId: "a1",
    date: "2024-03-15",
    startTime: null,
    endTime: null,
    duration: 60,
    description: "Routine work",
    deletedAt: null,
    ...overrides,
  };
}

export function baseTables(timeEntries: TimeEntryRow[] = []): TimesheetTables {
  return {
    companies: [{ id: "c1", name: "Acme Holdings", deletedAt: null }],
    projects: [
      { id: "p1", title: "Apollo", companyId: "c1", deletedAt: null },
      { id: "p2", title: "Gemini", companyId: null, deletedAt: null },
    ],
    users: [
      { id: "u1", firstName: "Ada", lastName: "Lovelace", name: null, email: null, deletedAt: null },
      { id: "u2", firstName: "Alan", lastName: "Turing", name: null, email: null, deletedAt: null },
    ],
    activityTypes: [
      { id: "a1", title: "Development", deletedAt: null },
      { id: "a2", title: "Meetings", deletedAt: null },
    ],
    timeEntries,
  };
}
