/** Rows as served by the data API after normalization. */

export interface TimeEntryRow {
  id: string;
  projectId: string | null;
  userId: string | null;
  activityTypeId: string | null;
  date: string | null;
  startTime: string | null;
  endTime: string | null;
  /** Minutes when present and non-zero. */
  duration: number | null;
  description: string | null;
  deletedAt: string | null;
}

export interface ProjectRow {
  id: string;
  title: string | null;
  companyId: string | null;
  deletedAt: string | null;
}

export interface UserRow {
  id: string;
  firstName: string | null;
  lastName: string | null;
  name: string | null;
  email: string | null;
  deletedAt: string | null;
}

export interface CompanyRow {
  id: string;
  name: string | null;
  deletedAt: string | null;
}

export interface ActivityTypeRow {
  id: string;
  title: string | null;
  deletedAt: string | null;
}

export interface TimesheetTables {
  companies: CompanyRow[];
  projects: ProjectRow[];
  users: UserRow[];
  activityTypes: ActivityTypeRow[];
  timeEntries: TimeEntryRow[];
}

export type TableName = keyof TimesheetTables;

/** A time entry that passed the duration check, with every label resolved. */
export interface EnrichedTimeEntry {
  id: string;
  date: string | null;
  startTime: string | null;
  endTime: string | null;
  calculatedDuration: number;
  userId: string | null;
  userName: string;
  projectId: string | null;
  projectTitle: string;
  companyName: string;
  activityTitle: string;
  description: string;
}
