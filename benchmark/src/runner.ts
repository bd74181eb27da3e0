// Runs a workload on every worker of an initialized registry.

import {
  isConnectionFailure,
  operationNumber,
  type ComplexOperation,
  type ComplexQueryTag,
  type OperationRegistry,
} from "../../src/index.js";
import { LatencyTally, formatMs } from "./measure.js";
import type { OperationStats, RunResult } from "./types.js";

export interface RunOptions {
  /** Leading operations executed once on worker 0 before measuring. */
  warmup?: readonly ComplexOperation[];
  log?: (msg: string) => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Dispatch `operations` across the registry's workers. Each worker pulls the
 * next operation from a shared cursor and runs it on its own connection.
 * A connection-level failure stops every worker and rejects.
 */
export async function runWorkload(
  registry: OperationRegistry,
  operations: readonly ComplexOperation[],
  options: RunOptions = {}
): Promise<RunResult> {
  const log = options.log ?? console.log;
  const config = registry.configuration;
  const warmup = options.warmup ?? [];

  if (warmup.length > 0) {
    log(`Warming up (${warmup.length} operations)...`);
    for (const operation of warmup) {
      try {
        await registry.execute(operation, 0);
      } catch (err) {
        if (isConnectionFailure(err)) throw err;
        log(`  Warmup ${operation.type} failed: ${errorMessage(err)}`);
      }
    }
  }

  const tallies = new Map<ComplexQueryTag, LatencyTally>();
  const tallyFor = (tag: ComplexQueryTag): LatencyTally => {
    let tally = tallies.get(tag);
    if (!tally) {
      tally = new LatencyTally(tag);
      tallies.set(tag, tally);
    }
    return tally;
  };

  let next = 0;
  let aborted = false;

  const work = async (worker: number): Promise<void> => {
    while (!aborted && next < operations.length) {
      const operation = operations[next++];
      const tally = tallyFor(operation.type);
      const start = performance.now();
      try {
        const outcome = await registry.execute(operation, worker);
        tally.succeed(performance.now() - start, outcome);
      } catch (err) {
        const failures = tally.fail();
        if (isConnectionFailure(err)) {
          aborted = true;
          throw err;
        }
        if (failures === 1) {
          log(`  ${operation.type} failed on worker ${worker}: ${errorMessage(err)}`);
        }
      }
    }
  };

  log(`Running ${operations.length} operations on ${registry.workerCount} worker(s)...`);
  const runStart = performance.now();
  const workers = Array.from({ length: registry.workerCount }, (_, worker) => work(worker));
  await Promise.all(workers);
  const totalDurationSeconds = (performance.now() - runStart) / 1000;

  const stats: OperationStats[] = [...tallies.values()]
    .map((tally) => tally.summarize())
    .sort((a, b) => operationNumber(a.tag) - operationNumber(b.tag));

  for (const op of stats) {
    log(`  ${op.tag}: p50=${formatMs(op.timing.p50)}, p95=${formatMs(op.timing.p95)} (${op.timing.samples} runs)`);
  }

  return {
    timestamp: new Date().toISOString(),
    backend: config.backend,
    endpoint: config.endpoint,
    workers: registry.workerCount,
    operationCount: operations.length,
    warmupCount: warmup.length,
    totalDurationSeconds,
    throughput: totalDurationSeconds > 0 ? operations.length / totalDurationSeconds : 0,
    operations: stats,
  };
}
