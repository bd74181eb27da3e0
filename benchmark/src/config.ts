import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { ConfigError, type FlatConfig } from "../../src/index.js";

// Get benchmark directory path (works regardless of CWD)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const BENCHMARK_DIR = path.resolve(__dirname, "..");

export const BENCHMARK_CONFIG = {
  // Operations dispatched in a measured run
  operationCount: parseInt(process.env.SNB_OPERATION_COUNT ?? "1000", 10),

  // Operations dispatched before measuring
  warmupCount: parseInt(process.env.SNB_WARMUP_COUNT ?? "100", 10),

  // Substitution parameter files (interactive_<n>_param.txt)
  paramDir: process.env.SNB_PARAM_DIR ?? path.join(BENCHMARK_DIR, "substitution_parameters"),

  resultsDir: path.join(BENCHMARK_DIR, "results"),

  validationFile: path.join(BENCHMARK_DIR, "validation_params.jsonl"),
};

// Flat keys accepted from the environment, e.g. SNB_ENDPOINT -> endpoint
const ENV_KEYS: Readonly<Record<string, string>> = {
  SNB_BACKEND: "backend",
  SNB_ENDPOINT: "endpoint",
  SNB_USER: "user",
  SNB_PASSWORD: "password",
  SNB_DATABASE: "database",
  SNB_QUERY_DIR: "queryDir",
  SNB_WORKERS: "workers",
  SNB_ENABLED_OPERATIONS: "enabledOperations",
  SNB_ROW_FAILURE_POLICY: "rowFailurePolicy",
};

/**
 * Parse a `.properties` file: `key=value` or `key: value` lines, `#` and `!`
 * comments, trailing backslash continues a line.
 */
export function parseProperties(text: string): Record<string, string> {
  const properties: Record<string, string> = {};
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    let line = lines[i].trim();
    if (line === "" || line.startsWith("#") || line.startsWith("!")) continue;

    while (line.endsWith("\\") && i + 1 < lines.length) {
      i++;
      line = line.slice(0, -1) + lines[i].trim();
    }

    const match = /^([^=:\s]+)\s*[=:\s]\s*(.*)$/.exec(line);
    if (!match) {
      throw new ConfigError(line, `malformed property on line ${i + 1}`);
    }
    properties[match[1]] = match[2];
  }

  return properties;
}

export function readPropertiesFile(file: string): Record<string, string> {
  if (!fs.existsSync(file)) {
    throw new ConfigError("properties", `file not found: ${file}`);
  }
  return parseProperties(fs.readFileSync(file, "utf-8"));
}

/**
 * Merge the driver configuration. Later sources win:
 * properties file, then SNB_* environment variables, then CLI overrides.
 */
export function mergeDriverConfig(
  properties: Record<string, string>,
  env: Readonly<Record<string, string | undefined>>,
  overrides: Readonly<Record<string, string | undefined>>
): FlatConfig {
  const merged: Record<string, string> = { ...properties };

  for (const [envKey, key] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") merged[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  return merged;
}
