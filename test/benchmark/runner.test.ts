import { describe, it, expect, vi } from "vitest";
import * as path from "path";
import { runWorkload } from "../../benchmark/src/runner.js";
import { BackendQueryError, OperationRegistry, type ComplexOperation, type ResultRow } from "../../src/index.js";
import { StubBackend, QUERIES_DIR } from "../utils.js";

const Q8: ComplexOperation = { type: "Query8", personId: 1, limit: 20 };
const Q13: ComplexOperation = { type: "Query13", person1Id: 1, person2Id: 4 };

const COMMENT_ROW: ResultRow = {
  personId: 2,
  personFirstName: "Bob",
  personLastName: "Brown",
  commentCreationDate: 0,
  commentId: 1004,
  commentContent: "Nice post",
};

async function setup(respond: (text: string) => ResultRow[], workers = 2) {
  const backend = new StubBackend(respond);
  const registry = new OperationRegistry({ createBackend: () => backend, log: () => {} });
  await registry.onInit({
    backend: "sqlite",
    endpoint: "stub.db",
    queryDir: path.join(QUERIES_DIR, "sqlite"),
    workers: String(workers),
  });
  return { backend, registry };
}

// The SQLite shortest-path template walks a recursive CTE named walk
const isPathQuery = (text: string): boolean => text.includes("WITH RECURSIVE walk");

describe("runWorkload", () => {
  it("should tally rows, row errors and timings per operation", async () => {
    const { backend, registry } = await setup((text) =>
      isPathQuery(text) ? [{ length: 2 }] : [COMMENT_ROW, { personId: 3 }]
    );

    const result = await runWorkload(registry, [Q8, Q13, Q8, Q13, Q13], { log: () => {} });
    await registry.onClose();

    expect(backend.queries).toHaveLength(5);
    expect(result).toMatchObject({
      backend: "sqlite",
      endpoint: "stub.db",
      workers: 2,
      operationCount: 5,
      warmupCount: 0,
    });
    expect(result.operations.map(({ tag, rows, rowErrors, failures, timing }) => ({
      tag,
      rows,
      rowErrors,
      failures,
      samples: timing.samples,
    }))).toEqual([
      { tag: "Query8", rows: 4, rowErrors: 2, failures: 0, samples: 2 },
      { tag: "Query13", rows: 3, rowErrors: 0, failures: 0, samples: 3 },
    ]);
  });

  it("should count failed operations and keep going", async () => {
    const log = vi.fn();
    const { registry } = await setup((text) => {
      if (isPathQuery(text)) throw new BackendQueryError(500, "timeout");
      return [COMMENT_ROW];
    }, 1);

    const result = await runWorkload(registry, [Q13, Q8, Q13], { log });
    await registry.onClose();

    expect(result.operations).toEqual([
      expect.objectContaining({ tag: "Query8", rows: 1, failures: 0 }),
      expect.objectContaining({ tag: "Query13", rows: 0, failures: 2 }),
    ]);
    expect(log).toHaveBeenCalledWith(
      "  Query13 failed on worker 0: Backend rejected the query (HTTP 500): timeout"
    );
  });

  it("should abort on a lost connection", async () => {
    const { registry } = await setup(() => {
      throw Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    }, 1);

    await expect(runWorkload(registry, [Q8, Q8], { log: () => {} })).rejects.toThrow("socket hang up");
    await registry.onClose();
  });

  it("should run the warmup before measuring, outside the tallies", async () => {
    const log = vi.fn();
    const { backend, registry } = await setup(() => [{ length: 1 }], 1);

    const result = await runWorkload(registry, [Q13], { warmup: [Q13, Q13], log });
    await registry.onClose();

    expect(backend.queries).toHaveLength(3);
    expect(result.warmupCount).toBe(2);
    expect(result.operations[0].timing.samples).toBe(1);
    expect(log).toHaveBeenCalledWith("Warming up (2 operations)...");
  });
});
