// snb-adapters - Public API
// Adapter layer for the social-network interactive workload over SPARQL,
// PostgreSQL, Neo4j and SQLite backends.

// ============================================================================
// Registry
// ============================================================================

export { OperationRegistry } from "./registry.js";
export type { RegistryOptions, RegistryStatus } from "./registry.js";

// ============================================================================
// Operations and Results
// ============================================================================

export {
  COMPLEX_QUERY_TAGS,
  SHORT_QUERY_TAGS,
  UPDATE_TAGS,
  DEFAULT_LIMITS,
  isOperationTag,
  isComplexQueryTag,
  operationNumber,
} from "./operations.js";
export type {
  ComplexQueryTag,
  ShortQueryTag,
  UpdateTag,
  OperationTag,
  Operation,
  ComplexOperation,
  OperationOf,
  OperationResult,
  ResultShapes,
  OrganisationTuple,
  Query1,
  Query2,
  Query3,
  Query4,
  Query5,
  Query6,
  Query7,
  Query8,
  Query9,
  Query10,
  Query11,
  Query12,
  Query13,
  Query14,
  ShortQuery,
  Update,
  Query1Result,
  Query2Result,
  Query3Result,
  Query4Result,
  Query5Result,
  Query6Result,
  Query7Result,
  Query8Result,
  Query9Result,
  Query10Result,
  Query11Result,
  Query12Result,
  Query13Result,
  Query14Result,
} from "./operations.js";

// ============================================================================
// Mappers, Coercion, Templates
// ============================================================================

export { INTERACTIVE_MAPPERS, mapRows, addDays } from "./mappers.js";
export type { MapperTable } from "./mappers.js";

export {
  LIST_SEPARATOR,
  TUPLE_SEPARATOR,
  TUPLE_LIST_SEPARATOR,
  coerceLong,
  coerceInteger,
  coerceDouble,
  coerceBoolean,
  coerceString,
  coerceDate,
  coerceStringList,
  coerceLongList,
  coerceTupleList,
  parseDateLiteral,
} from "./coerce.js";

export { TemplateStore, loadTemplates, templateFileName } from "./templates.js";
export { DIALECTS, sparqlDialect, postgresDialect, cypherDialect, sqliteDialect } from "./dialects.js";
export { toRowValue, toResultRow } from "./rows.js";

// ============================================================================
// Configuration and Backends
// ============================================================================

export { parseConfig, DEFAULT_ENDPOINTS } from "./config.js";
export type { AdapterConfig, FlatConfig, RowFailurePolicy } from "./config.js";

export {
  createBackend,
  createSparqlBackend,
  createPostgresBackend,
  createSqliteBackend,
  Neo4jBackend,
  parseSparqlResults,
} from "./backends/index.js";
export type { BackendFactoryOptions, DriverFactory, Fetcher, Neo4jDriver } from "./backends/index.js";

export type {
  RowValue,
  ResultRow,
  TemplateValue,
  BackendKind,
  LiteralDialect,
  BackendConnection,
  Backend,
  ConnectionState,
  ListMapper,
  SingletonMapper,
  ResultMapper,
  ListOutcome,
  SingletonOutcome,
  DispatchOutcome,
} from "./types.js";

// ============================================================================
// Errors
// ============================================================================

export {
  AdapterError,
  MissingFieldError,
  TypeMismatchError,
  DateParseError,
  RowMappingError,
  UnexpectedRowCountError,
  UnregisteredOperationError,
  DuplicateRegistrationError,
  IllegalStateError,
  TemplateLoadError,
  TemplateRenderError,
  ConfigError,
  BackendConnectionError,
  BackendQueryError,
  isFieldError,
  isConnectionFailure,
} from "./errors.js";
export type { FieldError } from "./errors.js";
