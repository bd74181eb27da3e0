#!/usr/bin/env node

import { Command } from "commander";
import * as fs from "fs";
import * as path from "path";
import {
  OperationRegistry,
  isComplexQueryTag,
  type ComplexQueryTag,
  type FlatConfig,
} from "../../src/index.js";
import { BENCHMARK_CONFIG, mergeDriverConfig, readPropertiesFile } from "./config.js";
import { formatSeconds } from "./measure.js";
import { formatTimestamp, writeReports } from "./report-generators.js";
import { runWorkload } from "./runner.js";
import {
  createValidationSet,
  formatValidationFile,
  readValidationFile,
  validate,
} from "./validation.js";
import { loadWorkload } from "./workload.js";

interface CommonOptions {
  properties?: string;
  backend?: string;
  endpoint?: string;
  queries?: string;
  workers?: string;
  params: string;
}

function driverConfig(options: CommonOptions): FlatConfig {
  const properties = options.properties ? readPropertiesFile(path.resolve(options.properties)) : {};
  return mergeDriverConfig(properties, process.env, {
    backend: options.backend,
    endpoint: options.endpoint,
    queryDir: options.queries,
    workers: options.workers,
  });
}

function enabledComplexTags(registry: OperationRegistry): ComplexQueryTag[] {
  return registry.configuration.enabledOperations.filter(isComplexQueryTag);
}

/**
 * Initialize a registry, run `body`, and close the registry whatever happens.
 */
async function withRegistry(
  options: CommonOptions,
  body: (registry: OperationRegistry) => Promise<void>
): Promise<void> {
  const registry = new OperationRegistry();
  await registry.onInit(driverConfig(options));
  try {
    await body(registry);
  } finally {
    await registry.onClose();
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .option("-P, --properties <file>", "Driver configuration (.properties)")
    .option("-b, --backend <kind>", "Backend: sparql, postgres, neo4j, sqlite")
    .option("-e, --endpoint <url>", "Endpoint URL, connection string or database file")
    .option("-q, --queries <dir>", "Query template directory")
    .option("-w, --workers <n>", "Number of workers")
    .option("-p, --params <dir>", "Substitution parameter directory", BENCHMARK_CONFIG.paramDir);
}

const program = new Command();

program
  .name("snb-bench")
  .description("Run the social-network interactive workload against a backend");

// ============================================================================
// run - Measure latency
// ============================================================================

addCommonOptions(program.command("run"))
  .description("Run the workload and write JSON and Markdown reports")
  .option("-n, --operations <count>", "Measured operations", String(BENCHMARK_CONFIG.operationCount))
  .option("--warmup <count>", "Warmup operations", String(BENCHMARK_CONFIG.warmupCount))
  .option("-o, --output <prefix>", "Output file prefix")
  .action(async (options: CommonOptions & { operations: string; warmup: string; output?: string }) => {
    const start = performance.now();
    await withRegistry(options, async (registry) => {
      const count = parseInt(options.operations, 10);
      const warmupCount = parseInt(options.warmup, 10);
      const operations = loadWorkload(options.params, enabledComplexTags(registry), count + warmupCount);

      const result = await runWorkload(registry, operations.slice(warmupCount), {
        warmup: operations.slice(0, warmupCount),
      });

      const prefix =
        options.output ?? path.join(BENCHMARK_CONFIG.resultsDir, `${result.backend}-${formatTimestamp()}`);
      for (const file of writeReports(result, prefix)) {
        console.log(`Wrote ${file}`);
      }
    });
    console.log(`Done in ${formatSeconds((performance.now() - start) / 1000)}`);
  });

// ============================================================================
// create-validation - Record results
// ============================================================================

addCommonOptions(program.command("create-validation"))
  .description("Run each operation once and record its results")
  .option("-n, --operations <count>", "Operations to record", "100")
  .option("-o, --output <file>", "Validation file", BENCHMARK_CONFIG.validationFile)
  .action(async (options: CommonOptions & { operations: string; output: string }) => {
    await withRegistry(options, async (registry) => {
      const operations = loadWorkload(
        options.params,
        enabledComplexTags(registry),
        parseInt(options.operations, 10)
      );
      const entries = await createValidationSet(registry, operations);
      fs.writeFileSync(options.output, formatValidationFile(entries));
      console.log(`Recorded ${entries.length} operations in ${options.output}`);
    });
  });

// ============================================================================
// validate - Compare against recorded results
// ============================================================================

addCommonOptions(program.command("validate"))
  .description("Re-run recorded operations and compare results")
  .option("-i, --input <file>", "Validation file", BENCHMARK_CONFIG.validationFile)
  .action(async (options: CommonOptions & { input: string }) => {
    await withRegistry(options, async (registry) => {
      const report = await validate(registry, readValidationFile(options.input));
      for (const mismatch of report.mismatches) {
        console.log(`Mismatch in entry ${mismatch.index} (${mismatch.tag})`);
        console.log(`  expected: ${JSON.stringify(mismatch.expected)}`);
        console.log(`  actual:   ${JSON.stringify(mismatch.actual)}`);
      }
      console.log(`Checked ${report.checked} operations`);
      console.log(`Validation Result: ${report.mismatches.length === 0 ? "PASS" : "FAIL"}`);
      if (report.mismatches.length > 0) process.exitCode = 1;
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
