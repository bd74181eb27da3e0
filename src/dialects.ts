// snb-adapters - Literal Dialects
// How each query language spells a string, number, boolean or date literal.

import type { BackendKind, LiteralDialect } from "./types.js";

const XSD_DATE_TIME = "http://www.w3.org/2001/XMLSchema#dateTime";

function plainNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(0) : String(value);
}

function quoteSql(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export const sparqlDialect: LiteralDialect = {
  name: "sparql",
  string(value) {
    const escaped = value
      .replace(/\\/g, "\\\\")
      .replace(/"/g, '\\"')
      .replace(/\n/g, "\\n")
      .replace(/\r/g, "\\r")
      .replace(/\t/g, "\\t");
    return `"${escaped}"`;
  },
  number: plainNumber,
  boolean: (value) => String(value),
  date: (value) => `"${value.toISOString()}"^^<${XSD_DATE_TIME}>`,
};

export const postgresDialect: LiteralDialect = {
  name: "postgres",
  string: quoteSql,
  number: plainNumber,
  boolean: (value) => (value ? "TRUE" : "FALSE"),
  date: (value) => `'${value.toISOString()}'::timestamptz`,
};

export const cypherDialect: LiteralDialect = {
  name: "cypher",
  string(value) {
    const escaped = value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
    return `'${escaped}'`;
  },
  number: plainNumber,
  boolean: (value) => String(value),
  // Graph stores keep dates as epoch milliseconds
  date: (value) => value.getTime().toFixed(0),
};

export const sqliteDialect: LiteralDialect = {
  name: "sqlite",
  string: quoteSql,
  number: plainNumber,
  boolean: (value) => (value ? "1" : "0"),
  date: (value) => value.getTime().toFixed(0),
};

export const DIALECTS: Readonly<Record<BackendKind, LiteralDialect>> = {
  sparql: sparqlDialect,
  postgres: postgresDialect,
  neo4j: cypherDialect,
  sqlite: sqliteDialect,
};
