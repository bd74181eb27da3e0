import { describe, it, expect, afterEach } from "vitest";
import * as path from "path";
import { TemplateStore, loadTemplates, templateFileName } from "../src/templates.js";
import { DIALECTS, cypherDialect, postgresDialect, sparqlDialect, sqliteDialect } from "../src/dialects.js";
import { COMPLEX_QUERY_TAGS, type OperationTag } from "../src/operations.js";
import { TemplateLoadError, TemplateRenderError } from "../src/errors.js";
import { createTempDir, QUERIES_DIR, type TempDir } from "./utils.js";

const JAN_1 = new Date(Date.UTC(2012, 0, 1));

describe("templates", () => {
  let tempDir: TempDir | null = null;

  afterEach(() => {
    tempDir?.cleanup();
    tempDir = null;
  });

  describe("templateFileName", () => {
    it("should name files by operation kind and number", () => {
      expect(templateFileName("Query4", "sql")).toBe("interactive-complex-4.sql");
      expect(templateFileName("Query14", "sparql")).toBe("interactive-complex-14.sparql");
      expect(templateFileName("ShortQuery2", "cypher")).toBe("interactive-short-2.cypher");
      expect(templateFileName("Update8", "sql")).toBe("interactive-update-8.sql");
    });
  });

  describe("loadTemplates", () => {
    it("should load and trim the requested templates", () => {
      tempDir = createTempDir({ "interactive-complex-13.sql": "\n  SELECT $person1Id\n\n" });
      const store = loadTemplates(tempDir.dir, ["Query13"], "sql");
      expect(store.tags()).toEqual(["Query13"]);
      expect(store.get("Query13")).toBe("SELECT $person1Id");
    });

    it("should list every missing file at once", () => {
      tempDir = createTempDir({ "interactive-complex-1.sql": "SELECT 1" });
      const dir = tempDir.dir;
      try {
        loadTemplates(dir, ["Query1", "Query2", "Query3"], "sql");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(TemplateLoadError);
        if (err instanceof TemplateLoadError) {
          expect(err.missing).toEqual(["interactive-complex-2.sql", "interactive-complex-3.sql"]);
          expect(err.directory).toBe(path.resolve(dir));
        }
      }
    });

    it.each([
      ["sqlite", "sql"],
      ["postgres", "sql"],
      ["cypher", "cypher"],
      ["sparql", "sparql"],
    ])("should find all complex read templates for %s", (dir, extension) => {
      const store = loadTemplates(path.join(QUERIES_DIR, dir), COMPLEX_QUERY_TAGS, extension);
      expect(store.tags()).toHaveLength(14);
    });
  });

  describe("TemplateStore.render", () => {
    function store(text: string): TemplateStore {
      return new TemplateStore("/t", "sql", new Map<OperationTag, string>([["Query6", text]]));
    }

    it("should substitute every occurrence", () => {
      const text = store("$personId, $tagName, $personId").render(
        "Query6",
        { personId: 3, tagName: "Jazz" },
        sqliteDialect
      );
      expect(text).toBe("3, 'Jazz', 3");
    });

    it("should leave the stored template unchanged", () => {
      const s = store("LIMIT $limit");
      s.render("Query6", { limit: 5 }, sqliteDialect);
      expect(s.get("Query6")).toBe("LIMIT $limit");
    });

    it("should fail on a placeholder without a parameter", () => {
      expect(() => store("$personId $missing").render("Query6", { personId: 1 }, sqliteDialect)).toThrow(
        TemplateRenderError
      );
    });

    it("should fail on non-finite numbers and invalid dates", () => {
      expect(() => store("$v").render("Query6", { v: Number.POSITIVE_INFINITY }, sqliteDialect)).toThrow(
        TemplateRenderError
      );
      expect(() => store("$v").render("Query6", { v: new Date(Number.NaN) }, sqliteDialect)).toThrow(
        TemplateRenderError
      );
    });

    it("should fail for an unknown tag", () => {
      expect(() => store("x").render("Query7", {}, sqliteDialect)).toThrow(TemplateLoadError);
    });
  });
});

describe("dialects", () => {
  it("should map each backend to its dialect", () => {
    expect(DIALECTS.neo4j).toBe(cypherDialect);
    expect(DIALECTS.sqlite).toBe(sqliteDialect);
  });

  it("should escape SPARQL strings", () => {
    expect(sparqlDialect.string('a "b" \\ c\nd')).toBe('"a \\"b\\" \\\\ c\\nd"');
  });

  it("should type SPARQL dates as xsd:dateTime", () => {
    expect(sparqlDialect.date(JAN_1)).toBe(
      '"2012-01-01T00:00:00.000Z"^^<http://www.w3.org/2001/XMLSchema#dateTime>'
    );
  });

  it("should double single quotes in SQL strings", () => {
    expect(postgresDialect.string("O'Brien")).toBe("'O''Brien'");
    expect(sqliteDialect.string("O'Brien")).toBe("'O''Brien'");
  });

  it("should cast PostgreSQL dates to timestamptz", () => {
    expect(postgresDialect.date(JAN_1)).toBe("'2012-01-01T00:00:00.000Z'::timestamptz");
  });

  it("should write graph and SQLite dates as epoch milliseconds", () => {
    expect(cypherDialect.date(JAN_1)).toBe("1325376000000");
    expect(sqliteDialect.date(JAN_1)).toBe("1325376000000");
  });

  it("should escape Cypher strings with backslashes", () => {
    expect(cypherDialect.string("it's")).toBe("'it\\'s'");
  });

  it("should print whole numbers without a fraction", () => {
    expect(sparqlDialect.number(10995116277918)).toBe("10995116277918");
    expect(postgresDialect.number(0.25)).toBe("0.25");
  });

  it("should spell booleans per language", () => {
    expect(sparqlDialect.boolean(true)).toBe("true");
    expect(postgresDialect.boolean(false)).toBe("FALSE");
    expect(sqliteDialect.boolean(true)).toBe("1");
  });
});
