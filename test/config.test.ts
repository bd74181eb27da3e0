import { describe, it, expect } from "vitest";
import * as path from "path";
import { DEFAULT_ENDPOINTS, parseBoolean, parseConfig, parsePositiveInt } from "../src/config.js";
import { COMPLEX_QUERY_TAGS } from "../src/operations.js";
import { ConfigError } from "../src/errors.js";

describe("parseConfig", () => {
  it("should apply defaults for a minimal configuration", () => {
    const config = parseConfig({ backend: "postgres", endpoint: "postgresql://db.test/snb", workers: "1" });
    expect(config).toMatchObject({
      backend: "postgres",
      endpoint: "postgresql://db.test/snb",
      workers: 1,
      rowFailurePolicy: "skip",
      connectionTimeoutMs: 30000,
      printQueryNames: false,
      printQueryStrings: false,
      printQueryResults: false,
    });
    expect(config.enabledOperations).toEqual([...COMPLEX_QUERY_TAGS]);
  });

  it.skipIf(process.env.SNB_QUERY_DIR !== undefined)(
    "should look for neo4j templates in the cypher directory",
    () => {
      const config = parseConfig({ backend: "neo4j", endpoint: "bolt://graph.test:7687", workers: "1" });
      expect(config.queryDir).toBe(path.resolve(process.cwd(), "queries", "cypher"));
    }
  );

  it.skipIf(process.env.SNB_ENDPOINT !== undefined)("should fall back to the backend's default endpoint", () => {
    expect(parseConfig({ backend: "sqlite", workers: "1" }).endpoint).toBe(DEFAULT_ENDPOINTS.sqlite);
  });

  it("should accept the backend name in any case", () => {
    expect(parseConfig({ backend: "SPARQL", workers: "1" }).backend).toBe("sparql");
  });

  it("should reject an unknown backend", () => {
    expect(() => parseConfig({ backend: "mongodb" })).toThrow(ConfigError);
  });

  it("should parse an explicit operation list", () => {
    const config = parseConfig({ backend: "sqlite", workers: "1", enabledOperations: "Query2, Query13,," });
    expect(config.enabledOperations).toEqual(["Query2", "Query13"]);
  });

  it("should accept 'all' as the operation list", () => {
    const config = parseConfig({ backend: "sqlite", workers: "1", enabledOperations: "ALL" });
    expect(config.enabledOperations).toHaveLength(14);
  });

  it("should reject unknown operation names", () => {
    expect(() => parseConfig({ backend: "sqlite", workers: "1", enabledOperations: "Query15" })).toThrow(
      "Invalid configuration 'enabledOperations': unknown operation \"Query15\""
    );
  });

  it("should read driver-style enable keys", () => {
    const config = parseConfig({
      backend: "sqlite",
      workers: "1",
      "ldbc.snb.interactive.LdbcQuery1_enable": "true",
      "ldbc.snb.interactive.LdbcQuery2_enable": "false",
      "ldbc.snb.interactive.LdbcShortQuery3PersonFriends_enable": "true",
      "ldbc.snb.interactive.LdbcUpdate1AddPerson_enable": "false",
    });
    expect(config.enabledOperations).toEqual(["Query1", "ShortQuery3"]);
  });

  it("should parse flags and the row failure policy", () => {
    const config = parseConfig({
      backend: "sqlite",
      workers: "4",
      rowFailurePolicy: "fatal",
      printQueryNames: "yes",
      printQueryStrings: "0",
      printQueryResults: "TRUE",
      connectionTimeoutMs: "500",
    });
    expect(config.workers).toBe(4);
    expect(config.rowFailurePolicy).toBe("fatal");
    expect(config.printQueryNames).toBe(true);
    expect(config.printQueryStrings).toBe(false);
    expect(config.printQueryResults).toBe(true);
    expect(config.connectionTimeoutMs).toBe(500);
  });

  it("should reject an unknown row failure policy", () => {
    expect(() => parseConfig({ backend: "sqlite", workers: "1", rowFailurePolicy: "retry" })).toThrow(ConfigError);
  });

  it("should ignore blank values", () => {
    const config = parseConfig({ backend: "sqlite", workers: "1", user: "  ", database: "" });
    expect(config.database).toBeUndefined();
  });
});

describe("value parsers", () => {
  it("should reject zero and non-numeric worker counts", () => {
    expect(() => parsePositiveInt("workers", "0")).toThrow(ConfigError);
    expect(() => parsePositiveInt("workers", "2x")).toThrow(ConfigError);
    expect(parsePositiveInt("workers", " 8 ")).toBe(8);
  });

  it("should use the fallback for a missing boolean", () => {
    expect(parseBoolean("flag", undefined, true)).toBe(true);
    expect(() => parseBoolean("flag", "maybe", false)).toThrow("Invalid configuration 'flag'");
  });
});
