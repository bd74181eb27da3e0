// snb-adapters - Row Normalization
// Turns whatever a driver returns into ResultRow values.

import type { ResultRow, RowValue } from "./types.js";

/**
 * Hook for driver-specific wrappers. Return undefined to fall through to the
 * generic conversion.
 */
export type ValueUnwrapper = (value: unknown) => RowValue | undefined;

export function toRowValue(value: unknown, unwrap?: ValueUnwrapper): RowValue {
  const unwrapped = unwrap?.(value);
  if (unwrapped !== undefined) return unwrapped;

  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return value;
  }
  if (value instanceof Date) return value;
  if (Array.isArray(value)) return value.map((item: unknown) => toRowValue(item, unwrap));
  if (Buffer.isBuffer(value)) return value.toString("utf-8");
  // json/jsonb columns and other structured values
  return JSON.stringify(value);
}

/**
 * Normalize one driver row (a plain object keyed by column name).
 */
export function toResultRow(record: unknown, unwrap?: ValueUnwrapper): ResultRow {
  if (typeof record !== "object" || record === null || Array.isArray(record)) {
    throw new TypeError(`Expected a row object, got ${typeof record}`);
  }
  const row: Record<string, RowValue> = {};
  for (const [key, value] of Object.entries(record)) {
    row[key] = toRowValue(value, unwrap);
  }
  return row;
}
