import { describe, it, expect } from "vitest";
import { INTERACTIVE_MAPPERS, addDays, mapRows, query1, query13, query14, query7 } from "../src/mappers.js";
import { TemplateStore } from "../src/templates.js";
import { cypherDialect, sparqlDialect } from "../src/dialects.js";
import { COMPLEX_QUERY_TAGS, type OperationTag } from "../src/operations.js";
import { RowMappingError, TypeMismatchError, UnexpectedRowCountError } from "../src/errors.js";
import type { ConnectionState } from "../src/types.js";

function stateWith(templates: Record<string, string>, dialect = cypherDialect): ConnectionState {
  const map = new Map<OperationTag, string>();
  for (const tag of COMPLEX_QUERY_TAGS) {
    const text = templates[tag];
    if (text !== undefined) map.set(tag, text);
  }
  return {
    worker: 0,
    connection: {
      query: async () => [],
      close: async () => {},
    },
    templates: new TemplateStore("/templates", "cypher", map),
    dialect,
  };
}

describe("mappers", () => {
  it("should cover every complex read", () => {
    expect(Object.keys(INTERACTIVE_MAPPERS).sort()).toEqual([...COMPLEX_QUERY_TAGS].sort());
    expect(INTERACTIVE_MAPPERS.Query13.mode).toBe("singleton");
    expect(COMPLEX_QUERY_TAGS.filter((tag) => INTERACTIVE_MAPPERS[tag].mode === "list")).toHaveLength(13);
  });

  describe("addDays", () => {
    it("should add whole days in UTC", () => {
      expect(addDays(new Date("2012-02-27T00:00:00Z"), 3).toISOString()).toBe("2012-03-01T00:00:00.000Z");
    });
  });

  describe("buildQuery", () => {
    it("should pass the end of the window for Query4", () => {
      const state = stateWith({ Query4: "$personId $startDate $endDate $durationDays $limit" });
      const text = INTERACTIVE_MAPPERS.Query4.buildQuery(state, {
        type: "Query4",
        personId: 10995116277918,
        startDate: new Date(Date.UTC(2011, 3, 1)),
        durationDays: 30,
        limit: 10,
      });
      expect(text).toBe(`10995116277918 ${Date.UTC(2011, 3, 1)} ${Date.UTC(2011, 4, 1)} 30 10`);
    });

    it("should wrap December to January for Query10", () => {
      const state = stateWith({ Query10: "$month/$nextMonth" });
      const text = INTERACTIVE_MAPPERS.Query10.buildQuery(state, {
        type: "Query10",
        personId: 1,
        month: 12,
        limit: 10,
      });
      expect(text).toBe("12/1");
    });

    it("should quote strings in the state's dialect", () => {
      const state = stateWith({ Query1: "?p :firstName $firstName" }, sparqlDialect);
      const text = query1.buildQuery(state, { type: "Query1", personId: 1, firstName: 'Jo "J"', limit: 20 });
      expect(text).toBe('?p :firstName "Jo \\"J\\""');
    });
  });

  describe("mapRow", () => {
    it("should map a Query7 row with a lexical boolean", () => {
      expect(
        query7.mapRow({
          personId: "42",
          personFirstName: "Ada",
          personLastName: "Lovelace",
          likeCreationDate: "2012-01-01T00:00:00Z",
          messageId: "7",
          messageContent: "hi",
          latency: "15",
          isNew: "true",
        })
      ).toEqual({
        personId: 42,
        personFirstName: "Ada",
        personLastName: "Lovelace",
        likeCreationDate: Date.UTC(2012, 0, 1),
        messageId: 7,
        messageContent: "hi",
        latency: 15,
        isNew: true,
      });
    });

    it("should map a Query14 path and weight", () => {
      expect(query14.mapRow({ personIds: "1, 5, 9", weight: "2.5" })).toEqual({
        personIds: [1, 5, 9],
        weight: 2.5,
      });
    });

    it("should map organisations whose names contain commas", () => {
      const result = query1.mapRow({
        friendId: 1,
        friendLastName: "Brown",
        distanceFromPerson: 1,
        friendBirthday: 0,
        friendCreationDate: 0,
        friendGender: "male",
        friendBrowserUsed: "Chrome",
        friendLocationIp: "10.0.0.1",
        friendEmails: "",
        friendLanguages: "",
        friendCityName: "Paris",
        friendUniversities: "University of Somewhere, North|2004|Springfield;Tech, Inc. Academy|2006|Paris",
        friendCompanies: "",
      });
      expect(result.friendUniversities).toEqual([
        ["University of Somewhere, North", 2004, "Springfield"],
        ["Tech, Inc. Academy", 2006, "Paris"],
      ]);
    });

    it("should reject organisation tuples without a year", () => {
      expect(() =>
        query1.mapRow({
          friendId: 1,
          friendLastName: "Brown",
          distanceFromPerson: 1,
          friendBirthday: 0,
          friendCreationDate: 0,
          friendGender: "male",
          friendBrowserUsed: "Chrome",
          friendLocationIp: "10.0.0.1",
          friendEmails: "",
          friendLanguages: "",
          friendCityName: "Paris",
          friendUniversities: "MIT|Boston",
          friendCompanies: "",
        })
      ).toThrow(TypeMismatchError);
    });
  });

  describe("mapRows", () => {
    it("should keep list results in backend order", () => {
      const outcome = mapRows("Query4", INTERACTIVE_MAPPERS.Query4, [
        { tagName: "b", count: 2 },
        { tagName: "a", count: 5 },
      ]);
      expect(outcome).toEqual({
        tag: "Query4",
        mode: "list",
        results: [
          { tagName: "b", count: 2 },
          { tagName: "a", count: 5 },
        ],
        errors: [],
        rowCount: 2,
      });
    });

    it("should collect row failures with their ordinal", () => {
      const outcome = mapRows("Query4", INTERACTIVE_MAPPERS.Query4, [
        { tagName: "a" },
        { tagName: "b", count: 1 },
      ]);
      expect(outcome.mode).toBe("list");
      if (outcome.mode === "list") {
        expect(outcome.results).toEqual([{ tagName: "b", count: 1 }]);
        expect(outcome.errors).toHaveLength(1);
        expect(outcome.errors[0]).toBeInstanceOf(RowMappingError);
        expect(outcome.errors[0].message).toBe(
          "Query4: row 0 could not be mapped (Field 'count' is missing from the result row)"
        );
      }
    });

    it("should use the empty result when a singleton query returns nothing", () => {
      expect(mapRows("Query13", query13, [])).toEqual({
        tag: "Query13",
        mode: "singleton",
        result: { length: -1 },
        empty: true,
      });
    });

    it("should throw on a bad singleton row", () => {
      expect(() => mapRows("Query13", query13, [{ length: "far" }])).toThrow(RowMappingError);
    });

    it("should throw on several singleton rows", () => {
      expect(() => mapRows("Query13", query13, [{ length: 1 }, { length: 1 }])).toThrow(UnexpectedRowCountError);
    });
  });
});
