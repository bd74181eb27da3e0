// snb-adapters - Shared Types

import type { RowMappingError } from "./errors.js";
import type { ComplexQueryTag, Operation, OperationResult } from "./operations.js";
import type { TemplateStore } from "./templates.js";

// ============================================================================
// Rows
// ============================================================================

/**
 * A value as a backend hands it over, after the connector has unwrapped
 * driver-specific wrappers (neo4j integers, SPARQL terms).
 */
export type RowValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | null
  | readonly RowValue[];

/** One tabular result row: field name -> native value. */
export type ResultRow = Readonly<Record<string, RowValue>>;

/** Values an operation contributes to a query template. */
export type TemplateValue = string | number | boolean | Date;

// ============================================================================
// Backends
// ============================================================================

export type BackendKind = "sparql" | "postgres" | "neo4j" | "sqlite";

/**
 * Renders template values as literals of one query language.
 */
export interface LiteralDialect {
  readonly name: string;
  string(value: string): string;
  number(value: number): string;
  boolean(value: boolean): string;
  date(value: Date): string;
}

/**
 * A live session to a backend, owned by exactly one worker.
 * Errors raised by `query` are passed to the caller unchanged.
 */
export interface BackendConnection {
  query(text: string): Promise<ResultRow[]>;
  close(): Promise<void>;
}

/**
 * Opens per-worker connections to one backend.
 */
export interface Backend {
  readonly kind: BackendKind;
  readonly dialect: LiteralDialect;
  /** File extension of this backend's query templates, without the dot. */
  readonly templateExtension: string;
  connect(worker: number): Promise<BackendConnection>;
  /** Release resources shared by all connections (driver, pool). */
  close(): Promise<void>;
}

/**
 * Per-worker state handed to mappers: the worker's own connection plus the
 * shared, read-only templates.
 */
export interface ConnectionState {
  readonly worker: number;
  readonly connection: BackendConnection;
  readonly templates: TemplateStore;
  readonly dialect: LiteralDialect;
}

// ============================================================================
// Mappers
// ============================================================================

export interface BuildsQuery<O> {
  buildQuery(state: ConnectionState, operation: O): string;
}

export interface MapsRow<R> {
  mapRow(row: ResultRow): R;
}

/** Zero or more rows, mapped in backend order. */
export interface ListMapper<O, R> extends BuildsQuery<O>, MapsRow<R> {
  readonly mode: "list";
}

/** Exactly one row expected; no row yields `emptyResult()`. */
export interface SingletonMapper<O, R> extends BuildsQuery<O>, MapsRow<R> {
  readonly mode: "singleton";
  emptyResult(): R;
}

export type ResultMapper<O = Operation, R = OperationResult> =
  | ListMapper<O, R>
  | SingletonMapper<O, R>;

// ============================================================================
// Dispatch Outcomes
// ============================================================================

export interface ListOutcome {
  readonly tag: ComplexQueryTag;
  readonly mode: "list";
  /** Successfully mapped rows, in backend order. */
  readonly results: OperationResult[];
  /** One entry per row that failed to map. */
  readonly errors: RowMappingError[];
  readonly rowCount: number;
}

export interface SingletonOutcome {
  readonly tag: ComplexQueryTag;
  readonly mode: "singleton";
  readonly result: OperationResult;
  /** True when the backend returned no row and the default was used. */
  readonly empty: boolean;
}

export type DispatchOutcome = ListOutcome | SingletonOutcome;
