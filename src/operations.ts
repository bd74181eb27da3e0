// snb-adapters - Operations and Result Shapes
// Interactive workload: complex reads, short reads and updates.

import type { RowValue } from "./types.js";

// ============================================================================
// Tags
// ============================================================================

export const COMPLEX_QUERY_TAGS = [
  "Query1",
  "Query2",
  "Query3",
  "Query4",
  "Query5",
  "Query6",
  "Query7",
  "Query8",
  "Query9",
  "Query10",
  "Query11",
  "Query12",
  "Query13",
  "Query14",
] as const;

export const SHORT_QUERY_TAGS = [
  "ShortQuery1",
  "ShortQuery2",
  "ShortQuery3",
  "ShortQuery4",
  "ShortQuery5",
  "ShortQuery6",
  "ShortQuery7",
] as const;

export const UPDATE_TAGS = [
  "Update1",
  "Update2",
  "Update3",
  "Update4",
  "Update5",
  "Update6",
  "Update7",
  "Update8",
] as const;

export type ComplexQueryTag = (typeof COMPLEX_QUERY_TAGS)[number];
export type ShortQueryTag = (typeof SHORT_QUERY_TAGS)[number];
export type UpdateTag = (typeof UPDATE_TAGS)[number];
export type OperationTag = ComplexQueryTag | ShortQueryTag | UpdateTag;

const ALL_TAGS: ReadonlySet<string> = new Set<string>([
  ...COMPLEX_QUERY_TAGS,
  ...SHORT_QUERY_TAGS,
  ...UPDATE_TAGS,
]);

export function isOperationTag(value: string): value is OperationTag {
  return ALL_TAGS.has(value);
}

export function isComplexQueryTag(value: string): value is ComplexQueryTag {
  return (COMPLEX_QUERY_TAGS as readonly string[]).includes(value);
}

/** "Query4" -> 4, "ShortQuery2" -> 2, "Update8" -> 8 */
export function operationNumber(tag: OperationTag): number {
  const match = /(\d+)$/.exec(tag);
  return match ? parseInt(match[1], 10) : 0;
}

// ============================================================================
// Complex Read Operations
// ============================================================================

export interface Query1 {
  readonly type: "Query1";
  readonly personId: number;
  readonly firstName: string;
  readonly limit: number;
}

export interface Query2 {
  readonly type: "Query2";
  readonly personId: number;
  readonly maxDate: Date;
  readonly limit: number;
}

export interface Query3 {
  readonly type: "Query3";
  readonly personId: number;
  readonly countryXName: string;
  readonly countryYName: string;
  readonly startDate: Date;
  readonly durationDays: number;
  readonly limit: number;
}

export interface Query4 {
  readonly type: "Query4";
  readonly personId: number;
  readonly startDate: Date;
  readonly durationDays: number;
  readonly limit: number;
}

export interface Query5 {
  readonly type: "Query5";
  readonly personId: number;
  readonly minDate: Date;
  readonly limit: number;
}

export interface Query6 {
  readonly type: "Query6";
  readonly personId: number;
  readonly tagName: string;
  readonly limit: number;
}

export interface Query7 {
  readonly type: "Query7";
  readonly personId: number;
  readonly limit: number;
}

export interface Query8 {
  readonly type: "Query8";
  readonly personId: number;
  readonly limit: number;
}

export interface Query9 {
  readonly type: "Query9";
  readonly personId: number;
  readonly maxDate: Date;
  readonly limit: number;
}

export interface Query10 {
  readonly type: "Query10";
  readonly personId: number;
  /** 1-12 */
  readonly month: number;
  readonly limit: number;
}

export interface Query11 {
  readonly type: "Query11";
  readonly personId: number;
  readonly countryName: string;
  readonly workFromYear: number;
  readonly limit: number;
}

export interface Query12 {
  readonly type: "Query12";
  readonly personId: number;
  readonly tagClassName: string;
  readonly limit: number;
}

export interface Query13 {
  readonly type: "Query13";
  readonly person1Id: number;
  readonly person2Id: number;
}

export interface Query14 {
  readonly type: "Query14";
  readonly person1Id: number;
  readonly person2Id: number;
}

// ============================================================================
// Short Reads and Updates
// These exist so workloads can name them; no backend handles them yet.
// ============================================================================

export interface ShortQuery {
  readonly type: ShortQueryTag;
  /** Person id for 1-3, message id for 4-7. */
  readonly id: number;
}

export interface Update {
  readonly type: UpdateTag;
  readonly parameters: Readonly<Record<string, RowValue>>;
}

export type ComplexOperation =
  | Query1
  | Query2
  | Query3
  | Query4
  | Query5
  | Query6
  | Query7
  | Query8
  | Query9
  | Query10
  | Query11
  | Query12
  | Query13
  | Query14;

export type Operation = ComplexOperation | ShortQuery | Update;

export type OperationOf<T extends ComplexQueryTag> = Extract<ComplexOperation, { type: T }>;

/** Result limits used when a parameter file does not carry one. */
export const DEFAULT_LIMITS: Readonly<Record<Exclude<ComplexQueryTag, "Query13" | "Query14">, number>> = {
  Query1: 20,
  Query2: 20,
  Query3: 20,
  Query4: 10,
  Query5: 20,
  Query6: 10,
  Query7: 20,
  Query8: 20,
  Query9: 20,
  Query10: 10,
  Query11: 10,
  Query12: 20,
};

// ============================================================================
// Results
// ============================================================================

/** [organisation name, year, place name] */
export type OrganisationTuple = readonly [string, number, string];

export interface Query1Result {
  readonly friendId: number;
  readonly friendLastName: string;
  readonly distanceFromPerson: number;
  readonly friendBirthday: number;
  readonly friendCreationDate: number;
  readonly friendGender: string;
  readonly friendBrowserUsed: string;
  readonly friendLocationIp: string;
  readonly friendEmails: readonly string[];
  readonly friendLanguages: readonly string[];
  readonly friendCityName: string;
  readonly friendUniversities: readonly OrganisationTuple[];
  readonly friendCompanies: readonly OrganisationTuple[];
}

export interface Query2Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly messageId: number;
  readonly messageContent: string;
  readonly messageCreationDate: number;
}

export interface Query3Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly countX: number;
  readonly countY: number;
  readonly count: number;
}

export interface Query4Result {
  readonly tagName: string;
  readonly count: number;
}

export interface Query5Result {
  readonly forumTitle: string;
  readonly count: number;
}

export interface Query6Result {
  readonly tagName: string;
  readonly count: number;
}

export interface Query7Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly likeCreationDate: number;
  readonly messageId: number;
  readonly messageContent: string;
  /** Minutes between the message and the like. */
  readonly latency: number;
  readonly isNew: boolean;
}

export interface Query8Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly commentCreationDate: number;
  readonly commentId: number;
  readonly commentContent: string;
}

export interface Query9Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly messageId: number;
  readonly messageContent: string;
  readonly messageCreationDate: number;
}

export interface Query10Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly similarity: number;
  readonly personGender: string;
  readonly placeName: string;
}

export interface Query11Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly organisationName: string;
  readonly worksFrom: number;
}

export interface Query12Result {
  readonly personId: number;
  readonly personFirstName: string;
  readonly personLastName: string;
  readonly tagNames: readonly string[];
  readonly count: number;
}

export interface Query13Result {
  /** -1 when the two persons are not connected. */
  readonly length: number;
}

export interface Query14Result {
  readonly personIds: readonly number[];
  readonly weight: number;
}

export interface ResultShapes {
  Query1: Query1Result;
  Query2: Query2Result;
  Query3: Query3Result;
  Query4: Query4Result;
  Query5: Query5Result;
  Query6: Query6Result;
  Query7: Query7Result;
  Query8: Query8Result;
  Query9: Query9Result;
  Query10: Query10Result;
  Query11: Query11Result;
  Query12: Query12Result;
  Query13: Query13Result;
  Query14: Query14Result;
}

export type OperationResult = ResultShapes[ComplexQueryTag];
