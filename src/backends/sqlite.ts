// snb-adapters - SQLite Backend

import Database from "better-sqlite3";
import { sqliteDialect } from "../dialects.js";
import { toResultRow } from "../rows.js";
import type { Backend, BackendConnection, ResultRow } from "../types.js";

export interface SqliteBackendOptions {
  /** Path to an existing database file. */
  filename: string;
}

class SqliteConnection implements BackendConnection {
  constructor(private readonly db: Database.Database) {}

  async query(text: string): Promise<ResultRow[]> {
    const stmt = this.db.prepare(text);
    if (!stmt.reader) {
      stmt.run();
      return [];
    }
    return stmt.all().map((row) => toResultRow(row));
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

/**
 * Each worker opens its own handle on the same file.
 */
export function createSqliteBackend(options: SqliteBackendOptions): Backend {
  return {
    kind: "sqlite",
    dialect: sqliteDialect,
    templateExtension: "sql",
    async connect(): Promise<BackendConnection> {
      const db = new Database(options.filename, {
        readonly: true,
        fileMustExist: true,
      });
      return new SqliteConnection(db);
    },
    async close(): Promise<void> {},
  };
}
