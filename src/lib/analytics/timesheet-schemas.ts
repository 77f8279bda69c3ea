import { z } from "zod";
import type { ActivityTypeRow, CompanyRow, ProjectRow, TimeEntryRow, UserRow } from "@/types/timesheet";

/**
 * Zod schemas for each table served by the data API.
 * Ids arrive as numbers or uuids depending on the table; both become strings
 * so joins compare like with like.
 */

const id = z.union([z.string(), z.number()]).transform((val) => String(val));

const optionalId = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((val) => (val === null || val === undefined || val === "" ? null : String(val)));

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((val) => (val === null || val === undefined ? null : String(val)));

/** "90", 90, null → 90, 90, null. Unparseable values count as absent. */
const minutes = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((val) => {
    if (val === null || val === undefined) return null;
    const num = typeof val === "number" ? val : parseFloat(val);
    return Number.isFinite(num) ? num : null;
  });

export const TimeEntrySchema: z.ZodType<TimeEntryRow, z.ZodTypeDef, unknown> = z.object({
  id,
  projectId: optionalId,
  userId: optionalId,
  activityTypeId: optionalId,
  date: text,
  startTime: text,
  endTime: text,
  duration: minutes,
  description: text,
  deletedAt: text,
});

export const ProjectSchema: z.ZodType<ProjectRow, z.ZodTypeDef, unknown> = z.object({
  id,
  title: text,
  companyId: optionalId,
  deletedAt: text,
});

export const UserSchema: z.ZodType<UserRow, z.ZodTypeDef, unknown> = z.object({
  id,
  firstName: text,
  lastName: text,
  name: text,
  email: text,
  deletedAt: text,
});

export const CompanySchema: z.ZodType<CompanyRow, z.ZodTypeDef, unknown> = z.object({
  id,
  name: text,
  deletedAt: text,
});

export const ActivityTypeSchema: z.ZodType<ActivityTypeRow, z.ZodTypeDef, unknown> = z.object({
  id,
  title: text,
  deletedAt: text,
});

/**
 * Validate raw rows against a schema. Rows that fail are dropped; the first
 * few failures are returned as warnings.
 */
export function normalizeRows<T>(
  rows: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): { data: T[]; warnings: string[] } {
  const data: T[] = [];
  const warnings: string[] = [];

  for (let i = 0; i < rows.length; i++) {
    const result = schema.safeParse(rows[i]);
    if (result.success) {
      data.push(result.data);
    } else if (warnings.length < 10) {
      warnings.push(
        `Row ${i + 1}: ${result.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
      );
    }
  }

  return { data, warnings };
}
