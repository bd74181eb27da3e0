// snb-adapters - Error Taxonomy

import type { OperationTag } from "./operations.js";

// ============================================================================
// Base Class
// ============================================================================

/**
 * Base class for every error raised by the adapter layer.
 * Errors are structured values; the orchestrator decides how to report them.
 */
export class AdapterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AdapterError";
  }
}

// ============================================================================
// Field Level
// ============================================================================

export class MissingFieldError extends AdapterError {
  public readonly field: string;

  constructor(field: string) {
    super(`Field '${field}' is missing from the result row`);
    this.name = "MissingFieldError";
    this.field = field;
  }
}

export class TypeMismatchError extends AdapterError {
  public readonly field: string;
  public readonly expected: string;
  public readonly value: unknown;

  constructor(field: string, expected: string, value: unknown) {
    super(`Field '${field}' is not a valid ${expected}: ${describeValue(value)}`);
    this.name = "TypeMismatchError";
    this.field = field;
    this.expected = expected;
    this.value = value;
  }
}

export class DateParseError extends AdapterError {
  public readonly field: string;
  public readonly literal: string;

  constructor(field: string, literal: string) {
    super(`Field '${field}' does not hold a date literal: ${literal}`);
    this.name = "DateParseError";
    this.field = field;
    this.literal = literal;
  }
}

/** Any error raised while coercing one field. */
export type FieldError = MissingFieldError | TypeMismatchError | DateParseError;

export function isFieldError(err: unknown): err is FieldError {
  return (
    err instanceof MissingFieldError ||
    err instanceof TypeMismatchError ||
    err instanceof DateParseError
  );
}

// ============================================================================
// Row Level
// ============================================================================

export class RowMappingError extends AdapterError {
  public readonly tag: OperationTag;
  /** Zero-based position of the row in the backend's result. */
  public readonly ordinal: number;
  public readonly field: string;

  constructor(tag: OperationTag, ordinal: number, cause: FieldError) {
    super(`${tag}: row ${ordinal} could not be mapped (${cause.message})`, { cause });
    this.name = "RowMappingError";
    this.tag = tag;
    this.ordinal = ordinal;
    this.field = cause.field;
  }
}

export class UnexpectedRowCountError extends AdapterError {
  public readonly tag: OperationTag;
  public readonly rowCount: number;

  constructor(tag: OperationTag, rowCount: number) {
    super(`${tag} expects at most one row, backend returned ${rowCount}`);
    this.name = "UnexpectedRowCountError";
    this.tag = tag;
    this.rowCount = rowCount;
  }
}

// ============================================================================
// Registry Level
// ============================================================================

export class UnregisteredOperationError extends AdapterError {
  public readonly tag: string;

  constructor(tag: string) {
    super(`No handler registered for operation ${tag}`);
    this.name = "UnregisteredOperationError";
    this.tag = tag;
  }
}

export class DuplicateRegistrationError extends AdapterError {
  public readonly tag: OperationTag;

  constructor(tag: OperationTag) {
    super(`A handler for operation ${tag} is already registered`);
    this.name = "DuplicateRegistrationError";
    this.tag = tag;
  }
}

export class IllegalStateError extends AdapterError {
  public readonly state: string;
  public readonly action: string;

  constructor(state: string, action: string) {
    super(`Cannot ${action} while the registry is ${state}`);
    this.name = "IllegalStateError";
    this.state = state;
    this.action = action;
  }
}

// ============================================================================
// Startup Level
// ============================================================================

export class TemplateLoadError extends AdapterError {
  public readonly directory: string;
  public readonly missing: string[];

  constructor(directory: string, missing: string[], options?: { cause?: unknown }) {
    super(`Missing query templates in ${directory}: ${missing.join(", ")}`, options);
    this.name = "TemplateLoadError";
    this.directory = directory;
    this.missing = missing;
  }
}

export class TemplateRenderError extends AdapterError {
  public readonly tag: OperationTag;
  public readonly parameter: string;

  constructor(tag: OperationTag, parameter: string, reason: string) {
    super(`${tag}: cannot substitute $${parameter} (${reason})`);
    this.name = "TemplateRenderError";
    this.tag = tag;
    this.parameter = parameter;
  }
}

export class ConfigError extends AdapterError {
  public readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid configuration '${key}': ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

// ============================================================================
// Backend Level
// ============================================================================

/**
 * The backend could not be reached at all.
 * Orchestrators may retry these; the adapter layer never does.
 */
export class BackendConnectionError extends AdapterError {
  public readonly endpoint: string;

  constructor(endpoint: string, cause: unknown) {
    super(`Cannot reach backend at ${endpoint}: ${describeValue(cause)}`, { cause });
    this.name = "BackendConnectionError";
    this.endpoint = endpoint;
  }
}

/** The backend answered, but rejected the query. */
export class BackendQueryError extends AdapterError {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(`Backend rejected the query (HTTP ${status}): ${message}`);
    this.name = "BackendQueryError";
    this.status = status;
  }
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EPIPE",
  // neo4j-driver
  "ServiceUnavailable",
  "SessionExpired",
]);

/**
 * Whether an error raised by a backend means the connection itself failed,
 * as opposed to the query being wrong.
 */
export function isConnectionFailure(err: unknown): boolean {
  if (err instanceof BackendConnectionError) return true;
  if (typeof err !== "object" || err === null || !("code" in err)) return false;
  return typeof err.code === "string" && CONNECTION_ERROR_CODES.has(err.code);
}

function describeValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `list(${value.length})`;
  return String(value);
}
