// snb-adapters - Result Mappers
// One mapper per complex read: build the backend query, map rows to results.

import {
  coerceBoolean,
  coerceDate,
  coerceDouble,
  coerceInteger,
  coerceLong,
  coerceLongList,
  coerceString,
  coerceStringList,
  coerceTupleList,
} from "./coerce.js";
import {
  RowMappingError,
  TypeMismatchError,
  UnexpectedRowCountError,
  isFieldError,
} from "./errors.js";
import type {
  ComplexQueryTag,
  OperationOf,
  OrganisationTuple,
  Query1,
  Query1Result,
  Query10,
  Query10Result,
  Query11,
  Query11Result,
  Query12,
  Query12Result,
  Query13,
  Query13Result,
  Query14,
  Query14Result,
  Query2,
  Query2Result,
  Query3,
  Query3Result,
  Query4,
  Query4Result,
  Query5,
  Query5Result,
  Query6,
  Query6Result,
  Query7,
  Query7Result,
  Query8,
  Query8Result,
  Query9,
  Query9Result,
  OperationResult,
  ResultShapes,
} from "./operations.js";
import type {
  ConnectionState,
  DispatchOutcome,
  ListMapper,
  ResultMapper,
  ResultRow,
  SingletonMapper,
  TemplateValue,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type MapperTable = {
  readonly [T in ComplexQueryTag]: ResultMapper<OperationOf<T>, ResultShapes[T]>;
};

// ============================================================================
// Helpers
// ============================================================================

function render(
  state: ConnectionState,
  tag: ComplexQueryTag,
  params: Record<string, TemplateValue>
): string {
  return state.templates.render(tag, params, state.dialect);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function organisations(row: ResultRow, name: string): OrganisationTuple[] {
  return coerceTupleList(row, name).map((tuple): OrganisationTuple => {
    const [organisation, year, place] = tuple;
    if (tuple.length !== 3 || typeof year !== "number") {
      throw new TypeMismatchError(name, "[name, year, place] tuple", tuple.join("|"));
    }
    return [String(organisation), year, String(place)];
  });
}

// ============================================================================
// Mappers
// ============================================================================

export const query1: ListMapper<Query1, Query1Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query1", {
      personId: op.personId,
      firstName: op.firstName,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    friendId: coerceLong(row, "friendId"),
    friendLastName: coerceString(row, "friendLastName"),
    distanceFromPerson: coerceInteger(row, "distanceFromPerson"),
    friendBirthday: coerceDate(row, "friendBirthday"),
    friendCreationDate: coerceDate(row, "friendCreationDate"),
    friendGender: coerceString(row, "friendGender"),
    friendBrowserUsed: coerceString(row, "friendBrowserUsed"),
    friendLocationIp: coerceString(row, "friendLocationIp"),
    friendEmails: coerceStringList(row, "friendEmails"),
    friendLanguages: coerceStringList(row, "friendLanguages"),
    friendCityName: coerceString(row, "friendCityName"),
    friendUniversities: organisations(row, "friendUniversities"),
    friendCompanies: organisations(row, "friendCompanies"),
  }),
};

export const query2: ListMapper<Query2, Query2Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query2", {
      personId: op.personId,
      maxDate: op.maxDate,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    messageId: coerceLong(row, "messageId"),
    messageContent: coerceString(row, "messageContent"),
    messageCreationDate: coerceDate(row, "messageCreationDate"),
  }),
};

export const query3: ListMapper<Query3, Query3Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query3", {
      personId: op.personId,
      countryXName: op.countryXName,
      countryYName: op.countryYName,
      startDate: op.startDate,
      endDate: addDays(op.startDate, op.durationDays),
      durationDays: op.durationDays,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    countX: coerceInteger(row, "countX"),
    countY: coerceInteger(row, "countY"),
    count: coerceInteger(row, "count"),
  }),
};

export const query4: ListMapper<Query4, Query4Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query4", {
      personId: op.personId,
      startDate: op.startDate,
      endDate: addDays(op.startDate, op.durationDays),
      durationDays: op.durationDays,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    tagName: coerceString(row, "tagName"),
    count: coerceInteger(row, "count"),
  }),
};

export const query5: ListMapper<Query5, Query5Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query5", {
      personId: op.personId,
      minDate: op.minDate,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    forumTitle: coerceString(row, "forumTitle"),
    count: coerceInteger(row, "count"),
  }),
};

export const query6: ListMapper<Query6, Query6Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query6", {
      personId: op.personId,
      tagName: op.tagName,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    tagName: coerceString(row, "tagName"),
    count: coerceInteger(row, "count"),
  }),
};

export const query7: ListMapper<Query7, Query7Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query7", { personId: op.personId, limit: op.limit }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    likeCreationDate: coerceDate(row, "likeCreationDate"),
    messageId: coerceLong(row, "messageId"),
    messageContent: coerceString(row, "messageContent"),
    latency: coerceInteger(row, "latency"),
    isNew: coerceBoolean(row, "isNew"),
  }),
};

export const query8: ListMapper<Query8, Query8Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query8", { personId: op.personId, limit: op.limit }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    commentCreationDate: coerceDate(row, "commentCreationDate"),
    commentId: coerceLong(row, "commentId"),
    commentContent: coerceString(row, "commentContent"),
  }),
};

export const query9: ListMapper<Query9, Query9Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query9", {
      personId: op.personId,
      maxDate: op.maxDate,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    messageId: coerceLong(row, "messageId"),
    messageContent: coerceString(row, "messageContent"),
    messageCreationDate: coerceDate(row, "messageCreationDate"),
  }),
};

export const query10: ListMapper<Query10, Query10Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query10", {
      personId: op.personId,
      month: op.month,
      nextMonth: (op.month % 12) + 1,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    similarity: coerceInteger(row, "similarity"),
    personGender: coerceString(row, "personGender"),
    placeName: coerceString(row, "placeName"),
  }),
};

export const query11: ListMapper<Query11, Query11Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query11", {
      personId: op.personId,
      countryName: op.countryName,
      workFromYear: op.workFromYear,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    organisationName: coerceString(row, "organisationName"),
    worksFrom: coerceInteger(row, "worksFrom"),
  }),
};

export const query12: ListMapper<Query12, Query12Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query12", {
      personId: op.personId,
      tagClassName: op.tagClassName,
      limit: op.limit,
    }),
  mapRow: (row) => ({
    personId: coerceLong(row, "personId"),
    personFirstName: coerceString(row, "personFirstName"),
    personLastName: coerceString(row, "personLastName"),
    tagNames: coerceStringList(row, "tagNames"),
    count: coerceInteger(row, "count"),
  }),
};

export const query13: SingletonMapper<Query13, Query13Result> = {
  mode: "singleton",
  buildQuery: (state, op) =>
    render(state, "Query13", { person1Id: op.person1Id, person2Id: op.person2Id }),
  mapRow: (row) => ({
    length: coerceInteger(row, "length"),
  }),
  emptyResult: () => ({ length: -1 }),
};

export const query14: ListMapper<Query14, Query14Result> = {
  mode: "list",
  buildQuery: (state, op) =>
    render(state, "Query14", { person1Id: op.person1Id, person2Id: op.person2Id }),
  mapRow: (row) => ({
    personIds: coerceLongList(row, "personIds"),
    weight: coerceDouble(row, "weight"),
  }),
};

/**
 * Every complex read with its mapper. The mapped type keeps the table
 * exhaustive: adding a tag without a mapper does not compile.
 */
export const INTERACTIVE_MAPPERS: MapperTable = {
  Query1: query1,
  Query2: query2,
  Query3: query3,
  Query4: query4,
  Query5: query5,
  Query6: query6,
  Query7: query7,
  Query8: query8,
  Query9: query9,
  Query10: query10,
  Query11: query11,
  Query12: query12,
  Query13: query13,
  Query14: query14,
};

// ============================================================================
// Applying a Mapper
// ============================================================================

function mapOne(
  tag: ComplexQueryTag,
  mapper: ResultMapper,
  row: ResultRow,
  ordinal: number
): OperationResult {
  try {
    return mapper.mapRow(row);
  } catch (err) {
    if (isFieldError(err)) throw new RowMappingError(tag, ordinal, err);
    throw err;
  }
}

/**
 * Map backend rows according to the mapper's mode.
 *
 * List mappers keep going past a bad row and report it in `errors`; a
 * singleton mapper throws on a bad row or on more than one row, and falls
 * back to `emptyResult()` when there is none.
 */
export function mapRows(
  tag: ComplexQueryTag,
  mapper: ResultMapper,
  rows: readonly ResultRow[]
): DispatchOutcome {
  if (mapper.mode === "singleton") {
    if (rows.length === 0) {
      return { tag, mode: "singleton", result: mapper.emptyResult(), empty: true };
    }
    if (rows.length > 1) throw new UnexpectedRowCountError(tag, rows.length);
    return { tag, mode: "singleton", result: mapOne(tag, mapper, rows[0], 0), empty: false };
  }

  const results: OperationResult[] = [];
  const errors: RowMappingError[] = [];
  rows.forEach((row, ordinal) => {
    try {
      results.push(mapOne(tag, mapper, row, ordinal));
    } catch (err) {
      if (!(err instanceof RowMappingError)) throw err;
      errors.push(err);
    }
  });
  return { tag, mode: "list", results, errors, rowCount: rows.length };
}
