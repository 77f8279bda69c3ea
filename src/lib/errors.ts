/**
 * Error taxonomy shared by the export job and the report generator.
 *
 * ConfigurationError — bad env/date input, raised before any query runs.
 * ConnectionError    — database or data API unreachable, or credentials unusable.
 * QueryError         — the driver rejected the export query.
 *
 * Zero rows is not an error: see EmptyResultWarning.
 */

export type PipelineErrorKind = "configuration" | "connection" | "query";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
  }
}

export class ConnectionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connection", message, options);
  }
}

export class QueryError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("query", message, options);
  }
}

/** Reported, never thrown. */
export interface EmptyResultWarning {
  kind: "empty-result";
  message: string;
}

export function emptyResultWarning(message: string): EmptyResultWarning {
  return { kind: "empty-result", message };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
