/**
 * pg-maint - Run report rendering
 */

import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { KIND_LABELS } from "../maintenance/Operation.js";
import type { OperationOutcome, RunSummary } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { formatDuration } from "../utils/size.js";

const log = logger.forModule("REPORT");

function renderOutcome(outcome: OperationOutcome): string[] {
  const ran = outcome.state === "succeeded" || outcome.state === "failed";
  const duration = ran ? ` in ${formatDuration(outcome.durationMs)}` : "";
  const lines = [
    `[${String(outcome.id)}] ${outcome.state} ${KIND_LABELS[outcome.kind]} ${outcome.target} (tier ${String(outcome.tier)}, ${outcome.tag})${duration}`,
    `    reason: ${outcome.reason}`,
  ];
  if (outcome.error !== "") {
    lines.push(`    error: ${outcome.error}`);
  }
  for (const note of outcome.notes) {
    lines.push(`    note: ${note}`);
  }
  return lines;
}

/**
 * Plain-text report: a header, then one block per operation in plan order
 */
export function renderTextReport(summary: RunSummary): string {
  const { counts } = summary;
  const lines = [
    `Maintenance run: ${summary.mode}${summary.dryRun ? " (dry run)" : ""}`,
    `Started ${summary.startedAt.toISOString()}, elapsed ${formatDuration(summary.elapsedMs)}`,
    `Succeeded: ${String(counts.succeeded)}  Failed: ${String(counts.failed)}  Skipped: ${String(counts.skipped)}  Dry run: ${String(counts.dry_run_reported)}`,
    "",
  ];
  if (summary.outcomes.length === 0) {
    lines.push("No maintenance needed.");
  }
  for (const outcome of summary.outcomes) {
    lines.push(...renderOutcome(outcome));
  }
  return `${lines.join("\n")}\n`;
}

export function renderJsonReport(summary: RunSummary): string {
  return `${JSON.stringify(summary, null, 2)}\n`;
}

/**
 * Write the report to `path`: JSON for `.json` files, text otherwise
 */
export async function writeReport(
  path: string,
  summary: RunSummary,
): Promise<void> {
  const json = extname(path).toLowerCase() === ".json";
  const content = json ? renderJsonReport(summary) : renderTextReport(summary);
  await writeFile(path, content, "utf8");
  log.info("Report written", { path, format: json ? "json" : "text" });
}
