// Validation sets: record operation results once, compare later runs.

import * as fs from "fs";
import { isDeepStrictEqual } from "util";
import {
  isComplexQueryTag,
  type ComplexOperation,
  type DispatchOutcome,
  type OperationRegistry,
} from "../../src/index.js";
import { ParameterFileError, toOperation, toParamRecord } from "./workload.js";
import type { ValidationEntry, ValidationMismatch, ValidationReport } from "./types.js";

/** Results as they are stored: plain JSON values. */
export function outcomeToJson(outcome: DispatchOutcome): unknown {
  const results = outcome.mode === "list" ? outcome.results : outcome.result;
  const json: unknown = JSON.parse(JSON.stringify(results));
  return json;
}

export async function createValidationSet(
  registry: OperationRegistry,
  operations: readonly ComplexOperation[],
  worker = 0
): Promise<ValidationEntry[]> {
  const entries: ValidationEntry[] = [];
  for (const operation of operations) {
    const outcome = await registry.execute(operation, worker);
    entries.push({
      operation: { type: operation.type, parameters: toParamRecord(operation) },
      results: outcomeToJson(outcome),
    });
  }
  return entries;
}

export function formatValidationFile(entries: readonly ValidationEntry[]): string {
  return entries.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEntry(line: string, file: string, lineNumber: number): ValidationEntry {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    throw new ParameterFileError(file, lineNumber, `invalid JSON (${String(err)})`);
  }

  const operation = isRecord(value) ? value.operation : undefined;
  if (!isRecord(value) || !isRecord(operation)) {
    throw new ParameterFileError(file, lineNumber, "entry has no operation");
  }
  const type = operation.type;
  const rawParameters = operation.parameters;
  if (typeof type !== "string" || !isComplexQueryTag(type)) {
    throw new ParameterFileError(file, lineNumber, `unknown operation type ${String(type)}`);
  }
  if (!isRecord(rawParameters)) {
    throw new ParameterFileError(file, lineNumber, "operation has no parameters");
  }

  const parameters: Record<string, string> = {};
  for (const [key, parameter] of Object.entries(rawParameters)) {
    if (typeof parameter !== "string") {
      throw new ParameterFileError(file, lineNumber, `parameter ${key} is not a string`);
    }
    parameters[key] = parameter;
  }

  return { operation: { type, parameters }, results: value.results };
}

export function parseValidationFile(text: string, file = "<inline>"): ValidationEntry[] {
  const entries: ValidationEntry[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;
    entries.push(parseEntry(line, file, index + 1));
  });
  return entries;
}

export function readValidationFile(file: string): ValidationEntry[] {
  if (!fs.existsSync(file)) {
    throw new ParameterFileError(file, 0, "validation file not found");
  }
  return parseValidationFile(fs.readFileSync(file, "utf-8"), file);
}

/**
 * Re-run every recorded operation and compare its results with the stored ones.
 */
export async function validate(
  registry: OperationRegistry,
  entries: readonly ValidationEntry[],
  worker = 0
): Promise<ValidationReport> {
  const mismatches: ValidationMismatch[] = [];

  for (const [index, entry] of entries.entries()) {
    const operation = toOperation(entry.operation.type, entry.operation.parameters);
    const actual = outcomeToJson(await registry.execute(operation, worker));
    if (!isDeepStrictEqual(entry.results, actual)) {
      mismatches.push({ index, tag: operation.type, expected: entry.results, actual });
    }
  }

  return { checked: entries.length, mismatches };
}
