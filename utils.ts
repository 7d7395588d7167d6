import { strict as assert } from "node:assert";

export function ensureDefined<T>(
  value: T,
  message?: string,
): asserts value is NonNullable<T> {
  assert.notEqual(value, undefined, message);
  assert.notEqual(value, null, message);
}

/** SQLSTATE codes the services translate into domain errors. */
export const PgErrorCodes = {
  foreignKeyViolation: "23503",
  uniqueViolation: "23505",
} as const;

export type DriverError = {
  code: string;
  constraint?: string;
  detail?: string;
};

function isDriverError(value: unknown): value is DriverError {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    typeof value.code === "string"
  );
}

/**
 * Both node-postgres and PGlite raise errors carrying the SQLSTATE `code`,
 * and drizzle wraps them in its own query error with the driver error as
 * `cause`. Walks the cause chain until a driver error turns up.
 */
export function findDriverError(error: unknown): DriverError | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth++) {
    if (isDriverError(current)) return current;
    current = current instanceof Error ? current.cause : undefined;
  }

  return null;
}
