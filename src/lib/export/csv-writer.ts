import Papa from "papaparse";
import { mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import type { DateRange } from "./date-range";

/** "Birch & Vale" -> "birch-vale" */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Output path depends only on the resolved window and the project set, so a
 * re-run over the same inputs overwrites the same file.
 * E.g. "exports/time-report_2024-03-11_2024-03-17_birch-vale_northwind.csv"
 */
export function buildExportPath(dir: string, range: DateRange, projects: string[]): string {
  const slugs = [...new Set(projects.map(slugify).filter(Boolean))].sort();
  const projectPart = slugs.length > 0 ? `_${slugs.join("_")}` : "";
  return join(dir, `time-report_${range.startDate}_${range.endDate}${projectPart}.csv`);
}

function formatCell(value: unknown): string | number | boolean {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "number" || typeof value === "boolean") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** Header row is always written, so zero rows yields a header-only file. */
export function serializeRows(columns: readonly string[], rows: Record<string, unknown>[]): string {
  const data = rows.map((row) => columns.map((col) => formatCell(row[col])));
  const csv = Papa.unparse({ fields: [...columns], data }, { newline: "\n" });
  // unparse ends a header-only file with a newline but not one with rows
  return csv.endsWith("\n") ? csv : `${csv}\n`;
}

export function writeExportFile(filePath: string, csv: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, csv, "utf-8");
}
