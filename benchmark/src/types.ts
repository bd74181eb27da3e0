import type { BackendKind, ComplexQueryTag } from "../../src/index.js";

export interface TimingStats {
  min: number;
  max: number;
  mean: number;
  p50: number;
  p95: number;
  p99: number;
  samples: number;
}

/** Per-tag outcome of a run. */
export interface OperationStats {
  tag: ComplexQueryTag;
  timing: TimingStats;
  /** Rows the backend returned, summed over all executions. */
  rows: number;
  /** Rows that could not be mapped and were skipped. */
  rowErrors: number;
  /** Executions that failed outright. */
  failures: number;
}

export interface RunResult {
  timestamp: string;
  backend: BackendKind;
  endpoint: string;
  workers: number;
  operationCount: number;
  warmupCount: number;
  totalDurationSeconds: number;
  throughput: number;
  operations: OperationStats[];
}

/** A parameter-file record: column name -> raw text. */
export type ParamRecord = Readonly<Record<string, string>>;

/** One line of a validation file. */
export interface ValidationEntry {
  operation: { type: ComplexQueryTag; parameters: ParamRecord };
  /** Result list, or the single result of a singleton operation, as JSON. */
  results: unknown;
}

export interface ValidationMismatch {
  index: number;
  tag: ComplexQueryTag;
  expected: unknown;
  actual: unknown;
}

export interface ValidationReport {
  checked: number;
  mismatches: ValidationMismatch[];
}
