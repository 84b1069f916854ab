/**
 * pg-maint - Outcome Recorder
 *
 * Collects finished operations into a RunSummary. A failed operation is
 * recorded like any other; only exitCodeFor() turns failures into a status.
 */

import type {
  MaintenanceMode,
  OperationOutcome,
  OperationState,
  RunSummary,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import type { Operation } from "./Operation.js";

const log = logger.forModule("REPORT");

export function emptyCounts(): Record<OperationState, number> {
  return {
    pending: 0,
    skipped: 0,
    dry_run_reported: 0,
    running: 0,
    succeeded: 0,
    failed: 0,
  };
}

export interface RecorderOptions {
  mode: MaintenanceMode;
  dryRun: boolean;
  now?: (() => Date) | undefined;
}

export class OutcomeRecorder {
  private readonly outcomes = new Map<number, OperationOutcome>();
  private readonly now: () => Date;
  private readonly startedAt: Date;

  constructor(private readonly options: RecorderOptions) {
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
  }

  /**
   * Capture an operation's final state. Non-terminal operations are
   * reported as they are, so a summary taken mid-run stays truthful.
   */
  record(operation: Operation): void {
    if (!operation.isTerminal) {
      log.warn("Recording an operation that has not finished", {
        entityId: operation.target,
        state: operation.state,
      });
    }
    this.outcomes.set(operation.id, operation.toOutcome());
  }

  recordAll(operations: Iterable<Operation>): void {
    for (const operation of operations) {
      this.record(operation);
    }
  }

  get size(): number {
    return this.outcomes.size;
  }

  summarize(): RunSummary {
    const finishedAt = this.now();
    const outcomes = [...this.outcomes.values()].sort((a, b) => a.id - b.id);
    const counts = emptyCounts();
    for (const outcome of outcomes) {
      counts[outcome.state]++;
    }
    return {
      mode: this.options.mode,
      dryRun: this.options.dryRun,
      startedAt: this.startedAt,
      finishedAt,
      elapsedMs: finishedAt.getTime() - this.startedAt.getTime(),
      counts,
      outcomes,
    };
  }
}

/**
 * 0 when nothing failed, 1 when at least one operation failed
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.counts.failed > 0 ? 1 : 0;
}
