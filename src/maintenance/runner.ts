/**
 * pg-maint - Maintenance run
 *
 * One invocation: collect → evaluate and rank → safety filter → execute → record.
 */

import type { MaintenanceConfig } from "../config/index.js";
import type { RunSummary } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { CandidateCollector, type StatisticsSource } from "./CandidateCollector.js";
import {
  ExecutionScheduler,
  type MaintenanceExecutor,
} from "./ExecutionScheduler.js";
import { OutcomeRecorder } from "./OutcomeRecorder.js";
import { buildPlan } from "./planner.js";
import { applySafetyFilter, type DestructiveConfirmer } from "./SafetyFilter.js";

export interface RunDependencies {
  source: StatisticsSource;
  executor: MaintenanceExecutor;
  confirm?: DestructiveConfirmer | undefined;
  signal?: AbortSignal | undefined;
  /** Monotonic-enough millisecond clock for operation durations */
  clock?: (() => number) | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Run maintenance once. Collection errors propagate (nothing has run yet);
 * operation failures end up in the summary.
 */
export async function runMaintenance(
  config: MaintenanceConfig,
  deps: RunDependencies,
): Promise<RunSummary> {
  const recorder = new OutcomeRecorder({
    mode: config.mode,
    dryRun: config.dryRun,
    now: deps.now,
  });

  if (config.dryRun) {
    logger.warn("DRY RUN MODE - no maintenance statement will be sent");
  }

  const collector = new CandidateCollector(deps.source, {
    allowPartial: config.allowPartial,
    now: deps.now,
  });
  const candidates = await collector.collect(config.scope);

  const operations = buildPlan(candidates, config.mode, config.thresholds);

  const { plan, skipped } = await applySafetyFilter(operations, {
    ...config.safety,
    dryRun: config.dryRun,
    confirm: deps.confirm,
  });
  recorder.recordAll(skipped);

  const scheduler = new ExecutionScheduler(deps.executor, {
    concurrency: config.concurrency,
    dryRun: config.dryRun,
    signal: deps.signal,
    clock: deps.clock,
  });
  await scheduler.run(plan, recorder);

  const summary = recorder.summarize();
  logger.info("Maintenance run finished", {
    mode: summary.mode,
    dryRun: summary.dryRun,
    elapsedMs: summary.elapsedMs,
    ...summary.counts,
  });
  return summary;
}
