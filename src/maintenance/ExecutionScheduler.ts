/**
 * pg-maint - Execution Scheduler
 *
 * Runs the plan on a bounded worker pool. Operations enter the pool in plan
 * order and a freed slot immediately takes the next one; completion order is
 * free. Operations on the same table are serialized by a per-table token, so
 * a slot may wait for its table while holding its place in line.
 */

import pLimit from "p-limit";
import { ValidationError } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { formatDuration } from "../utils/size.js";
import { KIND_LABELS, type Operation } from "./Operation.js";
import type { OutcomeRecorder } from "./OutcomeRecorder.js";
import { TableLocks } from "./TableLocks.js";

const log = logger.forModule("SCHEDULER");

export const SKIP_CANCELLED = "skipped: cancelled before dispatch";

/**
 * Runs one maintenance statement for an operation. Rejects on failure.
 */
export interface MaintenanceExecutor {
  execute(operation: Operation, signal: AbortSignal): Promise<void>;
}

export interface SchedulerOptions {
  /** Hard cap on simultaneously running operations (>= 1) */
  concurrency: number;
  dryRun: boolean;
  /** Stops dispatch of operations that have not started yet */
  signal?: AbortSignal | undefined;
  clock?: (() => number) | undefined;
}

export class ExecutionScheduler {
  private readonly locks = new TableLocks();
  private readonly clock: () => number;
  private readonly signal: AbortSignal;
  private running = 0;
  private peak = 0;

  constructor(
    private readonly executor: MaintenanceExecutor,
    private readonly options: SchedulerOptions,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ValidationError("Concurrency must be an integer >= 1", {
        concurrency: options.concurrency,
      });
    }
    this.clock = options.clock ?? Date.now;
    this.signal = options.signal ?? new AbortController().signal;
  }

  /** Operations in the running state right now */
  get runningCount(): number {
    return this.running;
  }

  /** Highest runningCount observed */
  get peakRunning(): number {
    return this.peak;
  }

  /**
   * Drive every operation of the plan to a terminal state and record it
   */
  async run(plan: readonly Operation[], recorder: OutcomeRecorder): Promise<void> {
    if (this.options.dryRun) {
      for (const operation of plan) {
        operation.reportDryRun();
        log.info(`DRY RUN: would execute ${operation.describe()}`, {
          entityId: operation.target,
        });
        recorder.record(operation);
      }
      return;
    }

    log.info("Dispatching plan", {
      operations: plan.length,
      concurrency: this.options.concurrency,
    });

    const limit = pLimit(this.options.concurrency);
    await Promise.all(
      plan.map((operation) => limit(() => this.dispatch(operation, recorder))),
    );
  }

  private async dispatch(
    operation: Operation,
    recorder: OutcomeRecorder,
  ): Promise<void> {
    if (this.signal.aborted) {
      operation.skip(SKIP_CANCELLED);
      recorder.record(operation);
      return;
    }

    const release = await this.locks.acquire(operation.target);
    try {
      if (this.signal.aborted) {
        operation.skip(SKIP_CANCELLED);
        return;
      }
      await this.execute(operation);
    } finally {
      release();
      recorder.record(operation);
    }
  }

  private async execute(operation: Operation): Promise<void> {
    const label = KIND_LABELS[operation.kind];
    operation.start(this.clock());
    this.running++;
    this.peak = Math.max(this.peak, this.running);
    log.info(`Starting ${operation.describe()}`, { entityId: operation.target });

    try {
      await this.executor.execute(operation, this.signal);
      operation.succeed(this.clock());
      log.info(
        `${label} completed on ${operation.target} (${formatDuration(operation.durationMs)})`,
        { entityId: operation.target, durationMs: operation.durationMs },
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      operation.fail(this.clock(), message);
      log.error(`${label} failed on ${operation.target}`, {
        code: "OP_FAILED",
        entityId: operation.target,
        error: message,
      });
    } finally {
      this.running--;
    }
  }
}
