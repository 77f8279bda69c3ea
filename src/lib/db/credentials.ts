import { ConnectionError } from "../errors";

export interface DbCredentials {
  user: string;
  password: string;
}

/**
 * Pooled connections expect `DB_USER` as `<user>.<project-ref>`. A value
 * without the separator authenticates against the wrong tenant, so it is
 * rejected before any connection is attempted.
 */
export function validateDbCredentials(user: string | undefined, password: string | undefined): DbCredentials {
  if (!user || !password) {
    throw new ConnectionError("Database credentials (DB_USER, DB_PASS) are not set");
  }

  const separator = user.indexOf(".");
  if (separator === -1) {
    throw new ConnectionError("DB_USER does not contain a '.' — it is missing the project reference");
  }

  const userPart = user.slice(0, separator);
  const projectRef = user.slice(separator + 1);
  if (!userPart || !projectRef) {
    throw new ConnectionError("DB_USER must be formatted as <user>.<project-ref>");
  }

  console.log(`[db] Credentials found: user=${userPart}, project ref length=${projectRef.length}`);
  return { user, password };
}
