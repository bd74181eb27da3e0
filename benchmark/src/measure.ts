// Latency bookkeeping for a run, kept per operation tag.

import type { ComplexQueryTag, DispatchOutcome } from "../../src/index.js";
import type { OperationStats, TimingStats } from "./types.js";

const NO_SAMPLES: TimingStats = { min: 0, max: 0, mean: 0, p50: 0, p95: 0, p99: 0, samples: 0 };

/**
 * Linear interpolation between the two closest ranks of an ascending list.
 */
export function percentile(ascending: readonly number[], p: number): number {
  const rank = ((ascending.length - 1) * p) / 100;
  const below = ascending[Math.floor(rank)];
  const above = ascending[Math.ceil(rank)];
  return below + (above - below) * (rank - Math.floor(rank));
}

export function summarizeLatencies(samples: readonly number[]): TimingStats {
  if (samples.length === 0) return { ...NO_SAMPLES };
  const ascending = [...samples].sort((a, b) => a - b);
  let total = 0;
  for (const ms of ascending) total += ms;
  return {
    min: ascending[0],
    max: ascending[ascending.length - 1],
    mean: total / ascending.length,
    p50: percentile(ascending, 50),
    p95: percentile(ascending, 95),
    p99: percentile(ascending, 99),
    samples: ascending.length,
  };
}

/** Everything recorded for one tag while the workers run. */
export class LatencyTally {
  private readonly latencies: number[] = [];
  private rows = 0;
  private rowErrors = 0;
  private failures = 0;

  constructor(readonly tag: ComplexQueryTag) {}

  /** Returns the failure count so far, this one included. */
  fail(): number {
    return ++this.failures;
  }

  succeed(ms: number, outcome: DispatchOutcome): void {
    this.latencies.push(ms);
    if (outcome.mode === "list") {
      this.rows += outcome.rowCount;
      this.rowErrors += outcome.errors.length;
    } else if (!outcome.empty) {
      this.rows++;
    }
  }

  summarize(): OperationStats {
    return {
      tag: this.tag,
      timing: summarizeLatencies(this.latencies),
      rows: this.rows,
      rowErrors: this.rowErrors,
      failures: this.failures,
    };
  }
}

export function formatMs(ms: number): string {
  if (ms >= 1000) return `${(ms / 1000).toFixed(2)}s`;
  return ms >= 1 ? `${ms.toFixed(1)}ms` : `${(ms * 1000).toFixed(0)}µs`;
}

export function formatSeconds(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  return `${Math.floor(seconds / 60)}m ${(seconds % 60).toFixed(0)}s`;
}
