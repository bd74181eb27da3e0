import * as fs from "fs";
import * as path from "path";
import type { RunResult } from "./types.js";
import { formatMs, formatSeconds } from "./measure.js";

/**
 * Generate Markdown report
 */
export function generateMarkdown(result: RunResult): string {
  const lines: string[] = [];

  lines.push("# Interactive Workload Results");
  lines.push("");
  lines.push(`**Date:** ${result.timestamp}`);
  lines.push(`**Backend:** ${result.backend} (${result.endpoint})`);
  lines.push(
    `**Operations:** ${result.operationCount} on ${result.workers} worker(s), ${result.warmupCount} warmup`
  );
  lines.push(
    `**Duration:** ${formatSeconds(result.totalDurationSeconds)} (${result.throughput.toFixed(1)} ops/s)`
  );
  lines.push("");

  lines.push("| Operation | Count | Mean | p50 | p95 | p99 | Max | Rows | Row errors | Failures |");
  lines.push("|-----------|-------|------|-----|-----|-----|-----|------|------------|----------|");
  for (const op of result.operations) {
    const t = op.timing;
    lines.push(
      `| ${op.tag} | ${t.samples} | ${formatMs(t.mean)} | ${formatMs(t.p50)} | ${formatMs(t.p95)} | ` +
        `${formatMs(t.p99)} | ${formatMs(t.max)} | ${op.rows} | ${op.rowErrors} | ${op.failures} |`
    );
  }
  lines.push("");

  return lines.join("\n");
}

/**
 * Write all reports to disk
 */
export function writeReports(
  result: RunResult,
  outputPrefix: string,
  options: { json?: boolean; markdown?: boolean } = {}
): string[] {
  const { json = true, markdown = true } = options;
  const written: string[] = [];

  const dir = path.dirname(outputPrefix);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (json) {
    const jsonPath = `${outputPrefix}.json`;
    fs.writeFileSync(jsonPath, JSON.stringify(result, null, 2));
    written.push(jsonPath);
  }

  if (markdown) {
    const mdPath = `${outputPrefix}.md`;
    fs.writeFileSync(mdPath, generateMarkdown(result));
    written.push(mdPath);
  }

  return written;
}

/**
 * Generate timestamp string for filenames: YYYYMMDDHHmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}${pad(date.getHours())}${pad(date.getMinutes())}`;
}
