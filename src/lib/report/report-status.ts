import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";

export const STATUS_FILE = "query_status.txt";
export const ERROR_LOG_FILE = "error_log.txt";

export type QueryStatus = "SUCCESS" | "FAILED";

export function statusFromErrors(errors: string[]): QueryStatus {
  return errors.length === 0 ? "SUCCESS" : "FAILED";
}

/**
 * Side channel for the rendering toolchain: overall fetch status plus the
 * most recent error message (empty when every fetch succeeded). Both files
 * are rewritten on every run.
 */
export function writeReportStatus(dir: string, errors: string[]): QueryStatus {
  const status = statusFromErrors(errors);
  const lastError = errors.length > 0 ? errors[errors.length - 1] : "";

  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, STATUS_FILE), status, "utf-8");
  writeFileSync(join(dir, ERROR_LOG_FILE), lastError, "utf-8");
  return status;
}
