// snb-adapters - PostgreSQL Backend

import pg from "pg";
import { postgresDialect } from "../dialects.js";
import { toResultRow } from "../rows.js";
import type { Backend, BackendConnection, ResultRow } from "../types.js";

export interface PostgresBackendOptions {
  connectionString: string;
  user?: string;
  password?: string;
  connectionTimeoutMs?: number;
}

class PostgresConnection implements BackendConnection {
  constructor(private readonly client: pg.Client) {}

  async query(text: string): Promise<ResultRow[]> {
    const result = await this.client.query(text);
    return result.rows.map((row: unknown) => toResultRow(row));
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

/**
 * One pg.Client per worker; no pool, since each worker runs its queries
 * one after another.
 */
export function createPostgresBackend(options: PostgresBackendOptions): Backend {
  return {
    kind: "postgres",
    dialect: postgresDialect,
    templateExtension: "sql",
    async connect(): Promise<BackendConnection> {
      const client = new pg.Client({
        connectionString: options.connectionString,
        user: options.user,
        password: options.password,
        connectionTimeoutMillis: options.connectionTimeoutMs,
      });
      await client.connect();
      return new PostgresConnection(client);
    },
    async close(): Promise<void> {},
  };
}
