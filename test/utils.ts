// Test utilities: in-process backends and a seeded SQLite database

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import Database from "better-sqlite3";
import { sqliteDialect } from "../src/dialects.js";
import type { Backend, BackendConnection, ResultRow } from "../src/types.js";

export const QUERIES_DIR = fileURLToPath(new URL("../queries", import.meta.url));
export const FIXTURES_DIR = fileURLToPath(new URL("./fixtures", import.meta.url));

/** 2012-01-01T00:00:00Z, the origin of every fixture timestamp. */
export const T0 = Date.UTC(2012, 0, 1);
export const DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// Stub Backend
// ============================================================================

export interface RecordedQuery {
  worker: number;
  text: string;
}

type Responder = (text: string, worker: number) => ResultRow[] | Promise<ResultRow[]>;

/**
 * Backend that answers every query through a callback and records what it
 * was asked. Uses the SQLite dialect and the SQLite templates.
 */
export class StubBackend implements Backend {
  readonly kind = "sqlite" as const;
  readonly dialect = sqliteDialect;
  readonly templateExtension = "sql";
  readonly queries: RecordedQuery[] = [];
  readonly closedWorkers: number[] = [];
  connectCount = 0;
  closed = false;
  /** Worker whose connect() rejects, if any. */
  failOnWorker: number | null = null;

  constructor(private readonly respond: Responder = () => []) {}

  async connect(worker: number): Promise<BackendConnection> {
    if (this.failOnWorker === worker) {
      throw Object.assign(new Error(`connect ECONNREFUSED (worker ${worker})`), {
        code: "ECONNREFUSED",
      });
    }
    this.connectCount++;
    const queries = this.queries;
    const closedWorkers = this.closedWorkers;
    const respond = this.respond;
    return {
      async query(text: string): Promise<ResultRow[]> {
        queries.push({ worker, text });
        return respond(text, worker);
      },
      async close(): Promise<void> {
        closedWorkers.push(worker);
      },
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ============================================================================
// SQLite Fixture
// ============================================================================

export interface FixtureDatabase {
  filename: string;
  cleanup(): void;
}

/**
 * Create a file-backed SQLite database with the template schema and the
 * small social network in test/fixtures/sqlite/data.sql.
 */
export function createFixtureDatabase(): FixtureDatabase {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "snb-adapters-"));
  const filename = path.join(dir, "snb.db");
  const db = new Database(filename);
  try {
    db.exec(fs.readFileSync(path.join(QUERIES_DIR, "sqlite", "schema.sql"), "utf-8"));
    db.exec(fs.readFileSync(path.join(FIXTURES_DIR, "sqlite", "data.sql"), "utf-8"));
  } finally {
    db.close();
  }
  return {
    filename,
    cleanup() {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export interface TempDir {
  dir: string;
  cleanup(): void;
}

/**
 * Temporary directory holding the given files, for template loading tests.
 */
export function createTempDir(files: Record<string, string> = {}): TempDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "snb-adapters-"));
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content);
  }
  return {
    dir,
    cleanup() {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
