import { DatabaseError } from "pg";

const UNIQUE_VIOLATION = "23505";

/** Name of the violated unique constraint, or `null` for any other error. */
export function uniqueViolationConstraint(error: unknown): string | null {
  if (!(error instanceof DatabaseError) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }
  return error.constraint ?? "";
}
