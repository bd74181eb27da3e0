// snb-adapters - Field Coercion
// Pure conversions from one field of a ResultRow to a typed value.

import { DateParseError, MissingFieldError, TypeMismatchError } from "./errors.js";
import type { ResultRow, RowValue } from "./types.js";

/** Separator of multi-valued fields encoded as one literal (GROUP_CONCAT). */
export const LIST_SEPARATOR = ", ";

/** Separator between the members of one tuple inside a tuple list. */
export const TUPLE_SEPARATOR = "|";

/** Separator between tuples. Organisation and place names may contain ", ". */
export const TUPLE_LIST_SEPARATOR = ";";

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

const INTEGER_LITERAL = /^[+-]?\d+$/;
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})?)?$/;

export type Scalar = string | number;

// ============================================================================
// Field Access
// ============================================================================

function fieldValue(row: ResultRow, name: string): Exclude<RowValue, null> {
  if (!Object.hasOwn(row, name)) {
    throw new MissingFieldError(name);
  }
  const value = row[name];
  // Unbound SPARQL variables and SQL NULLs count as absent
  if (value === null || value === undefined) {
    throw new MissingFieldError(name);
  }
  return value;
}

// ============================================================================
// Scalars
// ============================================================================

function toLong(field: string, value: RowValue): number {
  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) return value;
  } else if (typeof value === "bigint") {
    if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(value);
    }
  } else if (typeof value === "string") {
    const text = value.trim();
    if (INTEGER_LITERAL.test(text)) {
      const parsed = Number(text);
      if (Number.isSafeInteger(parsed)) return parsed;
    }
  }
  throw new TypeMismatchError(field, "long", value);
}

function toText(field: string, value: RowValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  throw new TypeMismatchError(field, "string", value);
}

export function coerceLong(row: ResultRow, name: string): number {
  return toLong(name, fieldValue(row, name));
}

export function coerceInteger(row: ResultRow, name: string): number {
  const value = fieldValue(row, name);
  let parsed: number;
  try {
    parsed = toLong(name, value);
  } catch {
    throw new TypeMismatchError(name, "integer", value);
  }
  if (parsed < INT_MIN || parsed > INT_MAX) {
    throw new TypeMismatchError(name, "integer", value);
  }
  return parsed;
}

export function coerceDouble(row: ResultRow, name: string): number {
  const value = fieldValue(row, name);
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string") {
    const text = value.trim();
    if (DECIMAL_LITERAL.test(text)) return Number(text);
  }
  throw new TypeMismatchError(name, "double", value);
}

export function coerceBoolean(row: ResultRow, name: string): boolean {
  const value = fieldValue(row, name);
  if (typeof value === "boolean") return value;
  if (value === 1 || value === 1n) return true;
  if (value === 0 || value === 0n) return false;
  if (typeof value === "string") {
    switch (value.trim().toLowerCase()) {
      case "true":
      case "1":
        return true;
      case "false":
      case "0":
        return false;
    }
  }
  throw new TypeMismatchError(name, "boolean", value);
}

export function coerceString(row: ResultRow, name: string): string {
  return toText(name, fieldValue(row, name));
}

// ============================================================================
// Dates
// ============================================================================

/**
 * Parse an ISO-8601 date or date-time literal into epoch milliseconds.
 * A literal without zone designator is read as UTC.
 */
export function parseDateLiteral(literal: string): number | null {
  const match = ISO_DATE.exec(literal);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds, fraction, zone] = match;
  const y = parseInt(year, 10);
  const mo = parseInt(month, 10);
  const d = parseInt(day, 10);
  const h = hours ? parseInt(hours, 10) : 0;
  const mi = minutes ? parseInt(minutes, 10) : 0;
  const s = seconds ? parseInt(seconds, 10) : 0;
  const ms = fraction ? parseInt(fraction.slice(0, 3).padEnd(3, "0"), 10) : 0;

  if (mo < 1 || mo > 12 || d < 1 || h > 23 || mi > 59 || s > 59) return null;

  const utc = Date.UTC(y, mo - 1, d, h, mi, s, ms);
  // Reject day overflow such as 2013-02-30
  if (new Date(utc).getUTCDate() !== d) return null;

  let offsetMinutes = 0;
  if (zone && zone !== "Z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    const digits = zone.slice(1).replace(":", "");
    offsetMinutes = sign * (parseInt(digits.slice(0, 2), 10) * 60 + parseInt(digits.slice(2), 10));
  }
  return utc - offsetMinutes * 60_000;
}

export function coerceDate(row: ResultRow, name: string): number {
  const value = fieldValue(row, name);

  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time)) throw new DateParseError(name, String(value));
    return time;
  }
  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) return value;
    throw new DateParseError(name, String(value));
  }
  if (typeof value === "bigint") {
    return toLong(name, value);
  }
  if (typeof value === "string") {
    const text = value.trim();
    // Some stores keep dates as epoch milliseconds
    if (INTEGER_LITERAL.test(text)) return toLong(name, text);
    const parsed = parseDateLiteral(text);
    if (parsed === null) throw new DateParseError(name, value);
    return parsed;
  }
  throw new TypeMismatchError(name, "date", value);
}

// ============================================================================
// Lists
// ============================================================================

function listItems(name: string, value: RowValue, separator: string): readonly RowValue[] {
  if (Array.isArray(value)) return value;
  if (typeof value === "string") {
    return value === "" ? [] : value.split(separator);
  }
  throw new TypeMismatchError(name, "list", value);
}

export function coerceStringList(
  row: ResultRow,
  name: string,
  separator: string = LIST_SEPARATOR
): string[] {
  return listItems(name, fieldValue(row, name), separator).map((item) => toText(name, item));
}

export function coerceLongList(
  row: ResultRow,
  name: string,
  separator: string = LIST_SEPARATOR
): number[] {
  return listItems(name, fieldValue(row, name), separator).map((item) => toLong(name, item));
}

function toScalar(field: string, value: RowValue): Scalar {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return toLong(field, value);
  const text = toText(field, value);
  return INTEGER_LITERAL.test(text) ? toLong(field, text) : text;
}

/**
 * Nested list of scalars, e.g. [["MIT", 2004, "Boston"], ...].
 * Encoded form: tuples joined by `separator` (";"), members joined by "|".
 * Integer-looking members become numbers.
 */
export function coerceTupleList(
  row: ResultRow,
  name: string,
  separator: string = TUPLE_LIST_SEPARATOR
): Scalar[][] {
  return listItems(name, fieldValue(row, name), separator).map((item) => {
    const members = typeof item === "string" ? item.split(TUPLE_SEPARATOR) : item;
    if (!Array.isArray(members)) {
      throw new TypeMismatchError(name, "tuple", item);
    }
    return members.map((member: RowValue) => toScalar(name, member));
  });
}
