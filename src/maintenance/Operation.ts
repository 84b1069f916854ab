/**
 * pg-maint - Operation
 *
 * One planned unit of work against one table. The kind, target and reason are
 * fixed at planning time; only the state moves, along
 *
 *   pending -> skipped | dry_run_reported | running
 *   running -> succeeded | failed
 */

import type {
  Candidate,
  OperationKind,
  OperationOutcome,
  OperationState,
  PriorityTier,
  TriggerReason,
} from "../types/index.js";
import {
  DESTRUCTIVE_KINDS,
  InvalidTransitionError,
  TERMINAL_STATES,
} from "../types/index.js";

const TRANSITIONS: Record<OperationState, readonly OperationState[]> = {
  pending: ["skipped", "dry_run_reported", "running"],
  running: ["succeeded", "failed"],
  skipped: [],
  dry_run_reported: [],
  succeeded: [],
  failed: [],
};

/**
 * Statement label used in logs and reports
 */
export const KIND_LABELS: Record<OperationKind, string> = {
  analyze: "ANALYZE",
  vacuum: "VACUUM",
  vacuum_full: "VACUUM FULL",
  reindex: "REINDEX",
};

export interface OperationInit {
  id: number;
  candidate: Candidate;
  kind: OperationKind;
  tier: PriorityTier;
  reason: TriggerReason;
}

export class Operation {
  readonly id: number;
  readonly candidate: Candidate;
  readonly kind: OperationKind;
  readonly tier: PriorityTier;
  readonly reason: TriggerReason;

  private current: OperationState = "pending";
  private readonly noteList: string[] = [];
  private startedAtMs: number | null = null;
  private finishedAtMs: number | null = null;
  private errorText = "";

  constructor(init: OperationInit) {
    this.id = init.id;
    this.candidate = init.candidate;
    this.kind = init.kind;
    this.tier = init.tier;
    this.reason = init.reason;
  }

  get state(): OperationState {
    return this.current;
  }

  get target(): string {
    return this.candidate.qualifiedName;
  }

  get notes(): readonly string[] {
    return this.noteList;
  }

  get error(): string {
    return this.errorText;
  }

  /** Takes an ACCESS EXCLUSIVE lock for its whole duration */
  get isDestructive(): boolean {
    return DESTRUCTIVE_KINDS.has(this.kind);
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.current);
  }

  /** Zero unless the operation actually ran */
  get durationMs(): number {
    if (this.startedAtMs === null || this.finishedAtMs === null) {
      return 0;
    }
    return this.finishedAtMs - this.startedAtMs;
  }

  annotate(note: string): void {
    this.noteList.push(note);
  }

  skip(note: string): void {
    this.transition("skipped");
    this.annotate(note);
  }

  reportDryRun(): void {
    this.transition("dry_run_reported");
  }

  start(nowMs: number): void {
    this.transition("running");
    this.startedAtMs = nowMs;
  }

  succeed(nowMs: number): void {
    this.transition("succeeded");
    this.finishedAtMs = nowMs;
  }

  fail(nowMs: number, message: string): void {
    this.transition("failed");
    this.finishedAtMs = nowMs;
    this.errorText = message;
  }

  /**
   * Human-readable description, e.g. `VACUUM public.orders (Urgent: ...)`
   */
  describe(): string {
    return `${KIND_LABELS[this.kind]} ${this.target} (${this.reason.tag}: ${this.reason.description})`;
  }

  toOutcome(): OperationOutcome {
    return {
      id: this.id,
      target: this.target,
      kind: this.kind,
      tier: this.tier,
      tag: this.reason.tag,
      reason: this.reason.description,
      state: this.current,
      durationMs: this.durationMs,
      error: this.errorText,
      notes: [...this.noteList],
    };
  }

  private transition(next: OperationState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InvalidTransitionError(this.current, next, {
        operationId: this.id,
        target: this.target,
      });
    }
    this.current = next;
  }
}
