// Substitution parameters -> typed operations.

import * as fs from "fs";
import * as path from "path";
import {
  AdapterError,
  DEFAULT_LIMITS,
  coerceDate,
  coerceInteger,
  coerceLong,
  coerceString,
  isFieldError,
  operationNumber,
  type ComplexOperation,
  type ComplexQueryTag,
  type FieldError,
} from "../../src/index.js";
import type { ParamRecord } from "./types.js";

export class ParameterFileError extends AdapterError {
  public readonly file: string;
  public readonly line: number;

  constructor(file: string, line: number, message: string, options?: { cause?: FieldError }) {
    super(`${path.basename(file)}:${line}: ${message}`, options);
    this.name = "ParameterFileError";
    this.file = file;
    this.line = line;
  }
}

export function paramFileName(tag: ComplexQueryTag): string {
  return `interactive_${operationNumber(tag)}_param.txt`;
}

/**
 * Parse a pipe-delimited parameter file. The first line names the columns.
 */
export function parseParamFile(text: string, file = "<inline>"): ParamRecord[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  if (lines.length === 0) return [];

  const header = lines[0].split("|").map((column) => column.trim());
  return lines.slice(1).map((line, index) => {
    const values = line.split("|");
    if (values.length !== header.length) {
      throw new ParameterFileError(
        file,
        index + 2,
        `expected ${header.length} columns, found ${values.length}`
      );
    }
    const record: Record<string, string> = {};
    header.forEach((column, i) => {
      record[column] = values[i].trim();
    });
    return record;
  });
}

function limitOf(record: ParamRecord, tag: keyof typeof DEFAULT_LIMITS): number {
  return Object.hasOwn(record, "limit") ? coerceInteger(record, "limit") : DEFAULT_LIMITS[tag];
}

function dateOf(record: ParamRecord, name: string): Date {
  return new Date(coerceDate(record, name));
}

/**
 * Build the operation for one parameter record.
 * Dates may be epoch milliseconds or ISO literals.
 */
export function toOperation(tag: ComplexQueryTag, record: ParamRecord): ComplexOperation {
  switch (tag) {
    case "Query1":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        firstName: coerceString(record, "firstName"),
        limit: limitOf(record, tag),
      };
    case "Query2":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        maxDate: dateOf(record, "maxDate"),
        limit: limitOf(record, tag),
      };
    case "Query3":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        countryXName: coerceString(record, "countryXName"),
        countryYName: coerceString(record, "countryYName"),
        startDate: dateOf(record, "startDate"),
        durationDays: coerceInteger(record, "durationDays"),
        limit: limitOf(record, tag),
      };
    case "Query4":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        startDate: dateOf(record, "startDate"),
        durationDays: coerceInteger(record, "durationDays"),
        limit: limitOf(record, tag),
      };
    case "Query5":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        minDate: dateOf(record, "minDate"),
        limit: limitOf(record, tag),
      };
    case "Query6":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        tagName: coerceString(record, "tagName"),
        limit: limitOf(record, tag),
      };
    case "Query7":
    case "Query8":
      return { type: tag, personId: coerceLong(record, "personId"), limit: limitOf(record, tag) };
    case "Query9":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        maxDate: dateOf(record, "maxDate"),
        limit: limitOf(record, tag),
      };
    case "Query10":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        month: coerceInteger(record, "month"),
        limit: limitOf(record, tag),
      };
    case "Query11":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        countryName: coerceString(record, "countryName"),
        workFromYear: coerceInteger(record, "workFromYear"),
        limit: limitOf(record, tag),
      };
    case "Query12":
      return {
        type: tag,
        personId: coerceLong(record, "personId"),
        tagClassName: coerceString(record, "tagClassName"),
        limit: limitOf(record, tag),
      };
    case "Query13":
    case "Query14":
      return {
        type: tag,
        person1Id: coerceLong(record, "person1Id"),
        person2Id: coerceLong(record, "person2Id"),
      };
  }
}

/**
 * Inverse of toOperation: the parameters as text, dates in ISO form.
 */
export function toParamRecord(operation: ComplexOperation): ParamRecord {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(operation)) {
    if (key === "type") continue;
    record[key] = value instanceof Date ? value.toISOString() : String(value);
  }
  return record;
}

function readOperations(dir: string, tag: ComplexQueryTag): ComplexOperation[] {
  const file = path.join(dir, paramFileName(tag));
  if (!fs.existsSync(file)) {
    throw new ParameterFileError(file, 0, "parameter file not found");
  }
  return parseParamFile(fs.readFileSync(file, "utf-8"), file).map((record, index) => {
    try {
      return toOperation(tag, record);
    } catch (err) {
      if (isFieldError(err)) {
        throw new ParameterFileError(file, index + 2, err.message, { cause: err });
      }
      throw err;
    }
  });
}

/**
 * Interleave the operations of every tag round-robin, cycling through each
 * tag's parameters, until `count` operations have been produced.
 */
export function interleave(
  perTag: ReadonlyMap<ComplexQueryTag, readonly ComplexOperation[]>,
  count: number
): ComplexOperation[] {
  const queues = [...perTag.values()].filter((operations) => operations.length > 0);
  const workload: ComplexOperation[] = [];
  if (queues.length === 0) return workload;

  for (let round = 0; workload.length < count; round++) {
    for (const operations of queues) {
      if (workload.length >= count) break;
      workload.push(operations[round % operations.length]);
    }
  }
  return workload;
}

export function loadWorkload(
  dir: string,
  tags: readonly ComplexQueryTag[],
  count: number
): ComplexOperation[] {
  const perTag = new Map<ComplexQueryTag, ComplexOperation[]>();
  for (const tag of tags) {
    perTag.set(tag, readOperations(dir, tag));
  }
  return interleave(perTag, count);
}
