// snb-adapters - Neo4j Backend

import neo4j, { type AuthToken, type Config, type Driver, type Session } from "neo4j-driver";
import { parseDateLiteral } from "../coerce.js";
import { cypherDialect } from "../dialects.js";
import { toResultRow, type ValueUnwrapper } from "../rows.js";
import type { Backend, BackendConnection, ResultRow, RowValue } from "../types.js";

export interface Neo4jBackendOptions {
  uri: string;
  user: string;
  password: string;
  database?: string;
  connectionTimeoutMs?: number;
  maxConnectionPoolSize?: number;
  /** Defaults to `neo4j.driver`. */
  createDriver?: DriverFactory;
}

export type Neo4jDriver = Pick<Driver, "verifyConnectivity" | "session" | "close">;

export type DriverFactory = (uri: string, auth: AuthToken, config: Config) => Neo4jDriver;

/**
 * Integers that do not fit a double become bigint; temporal values become Date.
 * Dates and local date-times carry no zone and are read as UTC.
 */
export const unwrapNeo4jValue: ValueUnwrapper = (value): RowValue | undefined => {
  if (neo4j.isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : BigInt(value.toString());
  }
  if (neo4j.isDateTime(value)) {
    return value.toStandardDate();
  }
  if (neo4j.isDate(value) || neo4j.isLocalDateTime(value)) {
    const literal = value.toString();
    const epoch = parseDateLiteral(literal);
    return epoch === null ? literal : new Date(epoch);
  }
  return undefined;
};

class Neo4jConnection implements BackendConnection {
  constructor(private readonly session: Session) {}

  async query(text: string): Promise<ResultRow[]> {
    const result = await this.session.run(text);
    return result.records.map((record) => toResultRow(record.toObject(), unwrapNeo4jValue));
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}

/**
 * One driver for the whole run, one session per worker.
 */
export class Neo4jBackend implements Backend {
  readonly kind = "neo4j" as const;
  readonly dialect = cypherDialect;
  readonly templateExtension = "cypher";
  private driver: Neo4jDriver | null = null;

  constructor(private readonly options: Neo4jBackendOptions) {}

  async connect(): Promise<BackendConnection> {
    if (!this.driver) {
      const createDriver: DriverFactory = this.options.createDriver ?? neo4j.driver;
      const driver = createDriver(
        this.options.uri,
        neo4j.auth.basic(this.options.user, this.options.password),
        {
          maxConnectionPoolSize: this.options.maxConnectionPoolSize ?? 50,
          connectionTimeout: this.options.connectionTimeoutMs ?? 30000,
        }
      );
      try {
        await driver.verifyConnectivity();
      } catch (err) {
        await driver.close();
        throw err;
      }
      this.driver = driver;
    }
    return new Neo4jConnection(this.driver.session({ database: this.options.database }));
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
    }
  }
}
