// snb-adapters - SPARQL Backend
// SPARQL 1.1 protocol over HTTP, JSON results.

import { BackendConnectionError, BackendQueryError } from "../errors.js";
import { sparqlDialect } from "../dialects.js";
import type { Backend, BackendConnection, ResultRow, RowValue } from "../types.js";

export type Fetcher = (url: string, init: RequestInit) => Promise<Response>;

export interface SparqlBackendOptions {
  endpoint: string;
  user?: string;
  password?: string;
  /** Replaces the global fetch, e.g. with an in-process app. */
  fetch?: Fetcher;
}

interface SparqlTerm {
  type: string;
  value: string;
  datatype?: string;
}

// ============================================================================
// Result Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTerm(value: unknown): value is SparqlTerm {
  return isRecord(value) && typeof value.type === "string" && typeof value.value === "string";
}

/**
 * Convert an `application/sparql-results+json` document into rows of
 * lexical values. Unbound variables are left out of the row.
 */
export function parseSparqlResults(body: unknown): ResultRow[] {
  if (!isRecord(body)) {
    throw new BackendQueryError(200, "response is not a SPARQL JSON result document");
  }
  // ASK queries
  if (typeof body.boolean === "boolean") {
    return [{ boolean: body.boolean }];
  }
  const results = body.results;
  if (!isRecord(results) || !Array.isArray(results.bindings)) {
    throw new BackendQueryError(200, "SPARQL JSON result has no bindings");
  }

  return results.bindings.map((binding: unknown) => {
    const row: Record<string, RowValue> = {};
    if (!isRecord(binding)) return row;
    for (const [name, term] of Object.entries(binding)) {
      if (isTerm(term)) row[name] = term.value;
    }
    return row;
  });
}

// ============================================================================
// Connection
// ============================================================================

class SparqlConnection implements BackendConnection {
  constructor(
    private readonly endpoint: string,
    private readonly headers: Record<string, string>,
    private readonly fetcher: Fetcher
  ) {}

  async query(text: string): Promise<ResultRow[]> {
    let response: Response;
    try {
      response = await this.fetcher(this.endpoint, {
        method: "POST",
        headers: this.headers,
        body: new URLSearchParams({ query: text }).toString(),
      });
    } catch (err) {
      throw new BackendConnectionError(this.endpoint, err);
    }

    if (!response.ok) {
      const message = await response.text();
      throw new BackendQueryError(response.status, message.slice(0, 500));
    }

    return parseSparqlResults(await response.json());
  }

  async close(): Promise<void> {
    // Stateless over HTTP
  }
}

export function createSparqlBackend(options: SparqlBackendOptions): Backend {
  const headers: Record<string, string> = {
    "Content-Type": "application/x-www-form-urlencoded",
    Accept: "application/sparql-results+json",
  };
  if (options.user) {
    const credentials = Buffer.from(`${options.user}:${options.password ?? ""}`).toString("base64");
    headers["Authorization"] = `Basic ${credentials}`;
  }
  const fetcher: Fetcher = options.fetch ?? ((url, init) => fetch(url, init));

  return {
    kind: "sparql",
    dialect: sparqlDialect,
    templateExtension: "sparql",
    async connect(): Promise<BackendConnection> {
      return new SparqlConnection(options.endpoint, headers, fetcher);
    },
    async close(): Promise<void> {},
  };
}
