import { conflict, KeywardConflictError } from "keyward-core";

// SQLSTATE for unique_violation
const PG_UNIQUE_VIOLATION = "23505";

export interface UniqueViolation {
  code: typeof PG_UNIQUE_VIOLATION;
  constraint?: string;
  message?: string;
}

export function isUniqueViolation(error: unknown): error is UniqueViolation {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === PG_UNIQUE_VIOLATION
  );
}

export function conflictFromUniqueViolation(
  error: UniqueViolation,
  message: string,
): KeywardConflictError {
  return conflict(message, error.constraint);
}
