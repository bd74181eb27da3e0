// snb-adapters - Backend Factory

import type { AdapterConfig } from "../config.js";
import type { Backend } from "../types.js";
import { Neo4jBackend } from "./neo4j.js";
import { createPostgresBackend } from "./postgres.js";
import { createSparqlBackend, type Fetcher } from "./sparql.js";
import { createSqliteBackend } from "./sqlite.js";

export interface BackendFactoryOptions {
  /** Used by the SPARQL backend instead of the global fetch. */
  fetch?: Fetcher;
}

export function createBackend(config: AdapterConfig, options: BackendFactoryOptions = {}): Backend {
  switch (config.backend) {
    case "sparql":
      return createSparqlBackend({
        endpoint: config.endpoint,
        user: config.user,
        password: config.password,
        fetch: options.fetch,
      });
    case "postgres":
      return createPostgresBackend({
        connectionString: config.endpoint,
        user: config.user,
        password: config.password,
        connectionTimeoutMs: config.connectionTimeoutMs,
      });
    case "neo4j":
      return new Neo4jBackend({
        uri: config.endpoint,
        user: config.user ?? "neo4j",
        password: config.password ?? "",
        database: config.database,
        connectionTimeoutMs: config.connectionTimeoutMs,
        maxConnectionPoolSize: Math.max(config.workers, 1),
      });
    case "sqlite":
      return createSqliteBackend({ filename: config.endpoint });
  }
}

export { Neo4jBackend, unwrapNeo4jValue, type DriverFactory, type Neo4jDriver } from "./neo4j.js";
export { createPostgresBackend } from "./postgres.js";
export { createSparqlBackend, parseSparqlResults, type Fetcher } from "./sparql.js";
export { createSqliteBackend } from "./sqlite.js";
