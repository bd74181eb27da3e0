// snb-adapters - Configuration
// The orchestrator hands over a flat key/value mapping; this turns it into a
// typed config, falling back to SNB_* environment variables and defaults.

import * as path from "path";
import { ConfigError } from "./errors.js";
import {
  COMPLEX_QUERY_TAGS,
  isOperationTag,
  type OperationTag,
} from "./operations.js";
import type { BackendKind } from "./types.js";

export type FlatConfig = Readonly<Record<string, string | undefined>>;

export type RowFailurePolicy = "skip" | "fatal";

export interface AdapterConfig {
  backend: BackendKind;
  /** Directory holding this backend's query templates. */
  queryDir: string;
  /** SPARQL endpoint URL, bolt URI, PostgreSQL connection string or SQLite file. */
  endpoint: string;
  user?: string;
  password?: string;
  /** Neo4j database name. */
  database?: string;
  /** One connection state is opened per worker. */
  workers: number;
  /** Operations the workload will dispatch; checked against the registry at startup. */
  enabledOperations: OperationTag[];
  rowFailurePolicy: RowFailurePolicy;
  connectionTimeoutMs: number;
  printQueryNames: boolean;
  printQueryStrings: boolean;
  printQueryResults: boolean;
}

const BACKENDS: readonly BackendKind[] = ["sparql", "postgres", "neo4j", "sqlite"];

export const DEFAULT_ENDPOINTS: Readonly<Record<BackendKind, string>> = {
  sparql: "http://localhost:8890/sparql",
  postgres: "postgresql://localhost:5432/snb",
  neo4j: "bolt://localhost:7687",
  sqlite: "./snb.db",
};

export const ADAPTER_DEFAULTS = {
  backend: process.env.SNB_BACKEND ?? "sparql",
  endpoint: process.env.SNB_ENDPOINT,
  user: process.env.SNB_USER,
  password: process.env.SNB_PASSWORD,
  queryDir: process.env.SNB_QUERY_DIR,
  workers: process.env.SNB_WORKERS ?? "1",
  connectionTimeoutMs: "30000",
};

// Driver-style keys: ldbc.snb.interactive.LdbcQuery4_enable=true
const ENABLE_KEY = /^ldbc\.snb\.interactive\.Ldbc(Query|ShortQuery|Update)(\d+)\w*_enable$/;

// ============================================================================
// Value Parsers
// ============================================================================

function readString(flat: FlatConfig, key: string): string | undefined {
  const value = flat[key]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

export function parseBoolean(key: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  switch (value.trim().toLowerCase()) {
    case "true":
    case "yes":
    case "1":
      return true;
    case "false":
    case "no":
    case "0":
      return false;
    default:
      throw new ConfigError(key, `expected a boolean, got "${value}"`);
  }
}

export function parsePositiveInt(key: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed < 1) {
    throw new ConfigError(key, `expected a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseBackend(value: string): BackendKind {
  const backend = BACKENDS.find((b) => b === value.toLowerCase());
  if (!backend) {
    throw new ConfigError("backend", `expected one of ${BACKENDS.join(", ")}, got "${value}"`);
  }
  return backend;
}

function parseTag(key: string, value: string): OperationTag {
  if (!isOperationTag(value)) {
    throw new ConfigError(key, `unknown operation "${value}"`);
  }
  return value;
}

/**
 * Enabled operations come from `enabledOperations` ("all" or a comma list of
 * tags) or from driver-style `..._enable` keys. Defaults to every complex read.
 */
function parseEnabledOperations(flat: FlatConfig): OperationTag[] {
  const list = readString(flat, "enabledOperations");
  if (list !== undefined) {
    if (list.toLowerCase() === "all") return [...COMPLEX_QUERY_TAGS];
    return list
      .split(",")
      .map((tag) => tag.trim())
      .filter((tag) => tag !== "")
      .map((tag) => parseTag("enabledOperations", tag));
  }

  const enabled: OperationTag[] = [];
  let sawEnableKey = false;
  for (const [key, value] of Object.entries(flat)) {
    const match = ENABLE_KEY.exec(key);
    if (!match) continue;
    sawEnableKey = true;
    if (parseBoolean(key, value, false)) {
      enabled.push(parseTag(key, `${match[1]}${match[2]}`));
    }
  }
  return sawEnableKey ? enabled : [...COMPLEX_QUERY_TAGS];
}

// ============================================================================
// Entry Point
// ============================================================================

export function parseConfig(flat: FlatConfig): AdapterConfig {
  const backend = parseBackend(readString(flat, "backend") ?? ADAPTER_DEFAULTS.backend);
  const queryDir =
    readString(flat, "queryDir") ??
    ADAPTER_DEFAULTS.queryDir ??
    path.resolve(process.cwd(), "queries", backend === "neo4j" ? "cypher" : backend);

  const policy = readString(flat, "rowFailurePolicy") ?? "skip";
  if (policy !== "skip" && policy !== "fatal") {
    throw new ConfigError("rowFailurePolicy", `expected "skip" or "fatal", got "${policy}"`);
  }

  return {
    backend,
    queryDir,
    endpoint: readString(flat, "endpoint") ?? ADAPTER_DEFAULTS.endpoint ?? DEFAULT_ENDPOINTS[backend],
    user: readString(flat, "user") ?? ADAPTER_DEFAULTS.user,
    password: readString(flat, "password") ?? ADAPTER_DEFAULTS.password,
    database: readString(flat, "database"),
    workers: parsePositiveInt("workers", readString(flat, "workers") ?? ADAPTER_DEFAULTS.workers),
    enabledOperations: parseEnabledOperations(flat),
    rowFailurePolicy: policy,
    connectionTimeoutMs: parsePositiveInt(
      "connectionTimeoutMs",
      readString(flat, "connectionTimeoutMs") ?? ADAPTER_DEFAULTS.connectionTimeoutMs
    ),
    printQueryNames: parseBoolean("printQueryNames", readString(flat, "printQueryNames"), false),
    printQueryStrings: parseBoolean("printQueryStrings", readString(flat, "printQueryStrings"), false),
    printQueryResults: parseBoolean("printQueryResults", readString(flat, "printQueryResults"), false),
  };
}
