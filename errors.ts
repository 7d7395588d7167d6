import * as z from "zod";
import type { AppLogger } from "./logger";
import { findDriverError, PgErrorCodes } from "./utils";

const PROBLEM_BASE_URI = "https://potluck.dev/problems";

export const DomainErrorTypes = {
  invalidValue: "invalidValue",
  notFound: "notFound",
  constraintViolation: "constraintViolation",
} as const;

/**
 * A field failed its declared constraint. Nothing was written when this is
 * raised: every operation validates its whole input before touching storage.
 */
export class InvalidValue extends Error {
  public readonly type = DomainErrorTypes.invalidValue;
  public readonly uri = `${PROBLEM_BASE_URI}/invalid-value`;
  public readonly data: z.ZodError;
  constructor(
    zodError: z.ZodError,
    params?: { message?: string; options?: ErrorOptions },
  ) {
    super(params?.message ?? "Invalid value", params?.options);
    this.data = zodError;
    this.name = "InvalidValue";
  }

  /** First message per violated field, keyed by dotted path ("ingredients.0.amount"). */
  get fields(): Record<string, string> {
    const fields: Record<string, string> = {};
    for (const issue of this.data.issues) {
      const key =
        issue.path.length > 0 ? issue.path.map(String).join(".") : "input";
      fields[key] ??= issue.message;
    }

    return fields;
  }
}

export type EntityKind = "recipe" | "category" | "rating" | "user";

export class NotFound extends Error {
  public readonly type = DomainErrorTypes.notFound;
  public readonly uri = `${PROBLEM_BASE_URI}/not-found`;
  public readonly entity: EntityKind;
  public readonly key: string | number;
  constructor(
    entity: EntityKind,
    key: string | number,
    params?: { message?: string; options?: ErrorOptions },
  ) {
    super(params?.message ?? `No ${entity} matches ${JSON.stringify(key)}`, params?.options);
    this.entity = entity;
    this.key = key;
    this.name = "NotFound";
  }
}

/**
 * The store refused a write because of a uniqueness or foreign-key
 * constraint, e.g. a second recipe with an existing title.
 */
export class ConstraintViolation extends Error {
  public readonly type = DomainErrorTypes.constraintViolation;
  public readonly uri = `${PROBLEM_BASE_URI}/constraint-violation`;
  public readonly constraint: string;
  constructor(
    constraint: string,
    params?: { message?: string; options?: ErrorOptions },
  ) {
    super(params?.message ?? `Constraint ${constraint} violated`, params?.options);
    this.constraint = constraint;
    this.name = "ConstraintViolation";
  }
}

export type DomainError = InvalidValue | NotFound | ConstraintViolation;

export function isDomainError(error: unknown): error is DomainError {
  return (
    error instanceof InvalidValue ||
    error instanceof NotFound ||
    error instanceof ConstraintViolation
  );
}

/**
 * RFC 7807 Problem Details model.
 * See: https://datatracker.ietf.org/doc/html/rfc7807
 */
export class ProblemDetails {
  readonly type: string;
  readonly title: string;
  readonly status?: number;
  readonly detail?: string;
  readonly instance?: string;
  readonly extensions?: Record<string, unknown>;

  constructor(params: {
    type: string;
    title: string;
    status?: number;
    detail?: string;
    instance?: string;
    extensions?: Record<string, unknown>;
  }) {
    this.type = params.type;
    this.title = params.title;
    this.status = params.status;
    this.detail = params.detail;
    this.instance = params.instance;
    if (params.extensions && Object.keys(params.extensions).length > 0) {
      this.extensions = params.extensions;
    }
  }

  toResponse(): Record<string, unknown> {
    return {
      type: this.type,
      title: this.title,
      ...(this.status !== undefined ? { status: this.status } : {}),
      ...(this.detail !== undefined ? { detail: this.detail } : {}),
      ...(this.instance !== undefined ? { instance: this.instance } : {}),
      ...(this.extensions ?? {}),
    };
  }
}

/**
 * Converts anything a service throws into the problem document the request
 * boundary renders. Unknown errors become an opaque 500.
 */
export function toProblemDetails(
  error: unknown,
  instance?: string,
): ProblemDetails {
  if (!isDomainError(error)) {
    return new ProblemDetails({
      type: "about:blank",
      title: "Internal server error",
      status: 500,
      instance,
    });
  }

  switch (error.type) {
    case DomainErrorTypes.invalidValue:
      return new ProblemDetails({
        type: error.uri,
        title: "Invalid value",
        status: 422,
        instance,
        extensions: { issues: error.fields },
      });
    case DomainErrorTypes.notFound:
      return new ProblemDetails({
        type: error.uri,
        title: "Not found",
        status: 404,
        detail: error.message,
        instance,
        extensions: { entity: error.entity },
      });
    case DomainErrorTypes.constraintViolation:
      return new ProblemDetails({
        type: error.uri,
        title: "Conflict",
        status: 409,
        detail: error.message,
        instance,
        extensions: { constraint: error.constraint },
      });
  }
}

/**
 * Parses `input` with `schema`, logging the prettified issues and throwing
 * InvalidValue when it does not conform.
 */
export function validateInput<T extends z.ZodType>(
  schema: T,
  input: unknown,
  logger: AppLogger,
  message = "Input validation failed",
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    logger.warn({ validationIssues: z.prettifyError(parsed.error) }, message);
    throw new InvalidValue(parsed.error);
  }

  return parsed.data;
}

/**
 * Maps a driver-level uniqueness or foreign-key rejection to
 * ConstraintViolation; any other error is returned untouched.
 */
export function translateDriverError(error: unknown): unknown {
  const driverError = findDriverError(error);
  if (
    driverError?.code === PgErrorCodes.uniqueViolation ||
    driverError?.code === PgErrorCodes.foreignKeyViolation
  ) {
    return new ConstraintViolation(driverError.constraint ?? driverError.code, {
      message: driverError.detail,
      options: { cause: error },
    });
  }

  return error;
}
