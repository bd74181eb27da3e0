// snb-adapters - Operation Handler Registry
// Plug-in surface for the benchmark driver: onInit -> execute* -> onClose.

import { createBackend } from "./backends/index.js";
import { parseConfig, type AdapterConfig, type FlatConfig } from "./config.js";
import {
  DuplicateRegistrationError,
  IllegalStateError,
  UnregisteredOperationError,
} from "./errors.js";
import { INTERACTIVE_MAPPERS, mapRows, type MapperTable } from "./mappers.js";
import {
  COMPLEX_QUERY_TAGS,
  isComplexQueryTag,
  type ComplexQueryTag,
  type Operation,
  type OperationOf,
  type ResultShapes,
} from "./operations.js";
import { loadTemplates } from "./templates.js";
import type {
  Backend,
  ConnectionState,
  DispatchOutcome,
  ResultMapper,
} from "./types.js";

export type RegistryStatus = "Uninitialized" | "Initialized" | "Closed";

export interface RegistryOptions {
  /** Builds the backend for a parsed config. Defaults to the built-in connectors. */
  createBackend?: (config: AdapterConfig) => Backend;
  /** Mappers registered by onInit. Defaults to all fourteen complex reads. */
  mappers?: Partial<MapperTable>;
  log?: (msg: string) => void;
}

export class OperationRegistry {
  private status: RegistryStatus = "Uninitialized";
  private readonly handlers = new Map<ComplexQueryTag, ResultMapper>();
  private readonly supported: Partial<MapperTable>;
  private readonly backendFactory: (config: AdapterConfig) => Backend;
  private readonly log: (msg: string) => void;
  private backend: Backend | null = null;
  private states: ConnectionState[] = [];
  private config: AdapterConfig | null = null;

  constructor(options: RegistryOptions = {}) {
    this.supported = options.mappers ?? INTERACTIVE_MAPPERS;
    this.backendFactory = options.createBackend ?? ((config) => createBackend(config));
    this.log = options.log ?? console.log;
  }

  get state(): RegistryStatus {
    return this.status;
  }

  get workerCount(): number {
    return this.states.length;
  }

  get configuration(): AdapterConfig {
    if (!this.config) throw new IllegalStateError(this.status, "read the configuration");
    return this.config;
  }

  registeredTags(): ComplexQueryTag[] {
    return COMPLEX_QUERY_TAGS.filter((tag) => this.handlers.has(tag));
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  register<T extends ComplexQueryTag>(
    tag: T,
    mapper: ResultMapper<OperationOf<T>, ResultShapes[T]>
  ): void {
    if (this.status !== "Uninitialized") {
      throw new IllegalStateError(this.status, `register ${tag}`);
    }
    if (this.handlers.has(tag)) {
      throw new DuplicateRegistrationError(tag);
    }
    this.handlers.set(tag, mapper);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async onInit(flat: FlatConfig): Promise<void> {
    if (this.status !== "Uninitialized") {
      throw new IllegalStateError(this.status, "initialize");
    }

    const config = parseConfig(flat);
    const added: ComplexQueryTag[] = [];
    let backend: Backend | null = null;
    const states: ConnectionState[] = [];

    try {
      for (const tag of COMPLEX_QUERY_TAGS) {
        const mapper = this.supported[tag];
        if (!mapper) continue;
        this.register(tag, mapper);
        added.push(tag);
      }

      for (const tag of config.enabledOperations) {
        if (!isComplexQueryTag(tag) || !this.handlers.has(tag)) {
          throw new UnregisteredOperationError(tag);
        }
      }

      backend = this.backendFactory(config);
      const templates = loadTemplates(config.queryDir, this.registeredTags(), backend.templateExtension);

      for (let worker = 0; worker < config.workers; worker++) {
        const connection = await backend.connect(worker);
        states.push({ worker, connection, templates, dialect: backend.dialect });
      }
    } catch (err) {
      for (const tag of added) this.handlers.delete(tag);
      try {
        await releaseAll(states, backend);
      } catch (closeErr) {
        console.error(`Cleanup after failed initialization: ${String(closeErr)}`);
      }
      throw err;
    }

    this.backend = backend;
    this.states = states;
    this.config = config;
    this.status = "Initialized";
    this.log(
      `Initialized ${config.backend} adapter: ${this.handlers.size} operations, ${states.length} worker(s)`
    );
  }

  async onClose(): Promise<void> {
    if (this.status === "Closed") return;
    const states = this.states;
    const backend = this.backend;
    this.states = [];
    this.backend = null;
    this.status = "Closed";
    await releaseAll(states, backend);
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Run one operation on the given connection state and map its rows.
   * Backend errors reach the caller unchanged.
   */
  async dispatch(state: ConnectionState, operation: Operation): Promise<DispatchOutcome> {
    const tag = operation.type;
    if (this.status !== "Initialized") {
      throw new IllegalStateError(this.status, `dispatch ${tag}`);
    }
    if (!isComplexQueryTag(tag)) throw new UnregisteredOperationError(tag);
    const mapper = this.handlers.get(tag);
    if (!mapper) throw new UnregisteredOperationError(tag);
    const config = this.configuration;

    const query = mapper.buildQuery(state, operation);
    if (config.printQueryNames) this.log(`[worker ${state.worker}] ${tag}`);
    if (config.printQueryStrings) this.log(query);

    const rows = await state.connection.query(query);
    const outcome = mapRows(tag, mapper, rows);

    if (outcome.mode === "list" && outcome.errors.length > 0 && config.rowFailurePolicy === "fatal") {
      throw outcome.errors[0];
    }
    if (config.printQueryResults) {
      const results = outcome.mode === "list" ? outcome.results : outcome.result;
      this.log(JSON.stringify(results));
    }
    return outcome;
  }

  /**
   * Entry point for the driver: dispatch on the worker's own connection.
   */
  async execute(operation: Operation, worker = 0): Promise<DispatchOutcome> {
    if (this.status !== "Initialized") {
      throw new IllegalStateError(this.status, `execute ${operation.type}`);
    }
    const state = this.states[worker];
    if (!state) {
      throw new RangeError(`No connection for worker ${worker} (have ${this.states.length})`);
    }
    return this.dispatch(state, operation);
  }
}

/**
 * Close every connection, then the backend. The first failure is rethrown
 * once everything has been attempted.
 */
async function releaseAll(states: ConnectionState[], backend: Backend | null): Promise<void> {
  const results = await Promise.allSettled(states.map((state) => state.connection.close()));
  if (backend) results.push(...(await Promise.allSettled([backend.close()])));
  const failure = results.find((result) => result.status === "rejected");
  if (failure && failure.status === "rejected") throw failure.reason;
}
