/**
 * pg-maint - Maintenance Types
 *
 * Candidates, policies and run summaries exchanged between the
 * collector, evaluator, safety filter, scheduler and recorder.
 */

/**
 * Invocation mode, as accepted by `--operation`
 */
export type MaintenanceMode =
  | "vacuum"
  | "analyze"
  | "auto"
  | "full-vacuum"
  | "reindex";

export const MAINTENANCE_MODES = [
  "vacuum",
  "analyze",
  "auto",
  "full-vacuum",
  "reindex",
] as const satisfies readonly MaintenanceMode[];

/**
 * Kind of statement an operation runs. Immutable once planned.
 */
export type OperationKind = "analyze" | "vacuum" | "vacuum_full" | "reindex";

/**
 * Kinds that hold an ACCESS EXCLUSIVE lock for their whole duration
 */
export const DESTRUCTIVE_KINDS: ReadonlySet<OperationKind> = new Set([
  "vacuum_full",
  "reindex",
]);

export type OperationState =
  | "pending"
  | "skipped"
  | "dry_run_reported"
  | "running"
  | "succeeded"
  | "failed";

export const TERMINAL_STATES: ReadonlySet<OperationState> = new Set([
  "skipped",
  "dry_run_reported",
  "succeeded",
  "failed",
]);

/** 1 is the most urgent tier */
export type PriorityTier = 1 | 2 | 3;

export type TriggerTag =
  | "Urgent"
  | "High"
  | "Never-analyzed"
  | "Stale"
  | "High-churn"
  | "Bloated";

/**
 * Why an operation was proposed
 */
export interface TriggerReason {
  tag: TriggerTag;
  /** Human-readable justification */
  description: string;
  /** The metric that crossed its threshold */
  metric: {
    name: "dead_tuple_ratio" | "staleness_ms" | "modification_ratio" | "live_tuples";
    value: number;
  };
}

/**
 * One table under consideration, recomputed on every invocation
 */
export interface Candidate {
  schema: string;
  table: string;
  /** schema.table, the unique key */
  qualifiedName: string;
  liveTuples: number;
  deadTuples: number;
  /** Rows changed since the last ANALYZE */
  modificationsSinceAnalyze: number;
  inserts: number;
  updates: number;
  deletes: number;
  sizeBytes: number;
  lastVacuum: Date | null;
  lastAutovacuum: Date | null;
  lastAnalyze: Date | null;
  lastAutoanalyze: Date | null;
  /** dead / (live + dead), within [0, 1] */
  deadTupleRatio: number;
  /** Milliseconds since the latest (auto)analyze, null when never analyzed */
  stalenessMs: number | null;
}

/**
 * Target scope for the collector
 */
export interface CollectorScope {
  /** Schema name pattern (`*` and `?` wildcards) */
  schema?: string | undefined;
  /** Table name globs; empty means every table */
  tables: readonly string[];
}

/**
 * Thresholds used by the evaluator
 */
export interface ThresholdPolicy {
  /** Dead-tuple ratio that triggers VACUUM (0..1) */
  deadTupleRatio: number;
  /** Staleness that makes statistics outdated */
  stalenessMs: number;
  /** Modifications / live rows that triggers ANALYZE (0..1) */
  modificationRatio: number;
  /** Dead-tuple ratio that triggers REINDEX (0..1) */
  bloatRatio: number;
  /** Never-analyzed tables below this row count are ignored */
  minLiveTuplesForAnalyze: number;
  /** Stale tables need more modifications than this */
  minModificationsForStale: number;
}

export const DEFAULT_THRESHOLDS: ThresholdPolicy = {
  deadTupleRatio: 0.2,
  stalenessMs: 7 * 24 * 60 * 60 * 1000,
  modificationRatio: 0.1,
  bloatRatio: 0.3,
  minLiveTuplesForAnalyze: 1000,
  minModificationsForStale: 1000,
};

/**
 * Operational safety policy
 */
export interface SafetyPolicy {
  skipLarge: boolean;
  largeTableSizeBytes: number;
  /** Non-interactive override for VACUUM FULL / REINDEX */
  confirmDestructive: boolean;
}

/**
 * What happens to running statements when the run is interrupted
 */
export type InterruptPolicy = "wait" | "cancel";

/**
 * One row per operation, consumed by report renderers
 */
export interface OperationOutcome {
  id: number;
  target: string;
  kind: OperationKind;
  tier: PriorityTier;
  tag: TriggerTag;
  reason: string;
  state: OperationState;
  durationMs: number;
  /** Empty string when the operation did not fail */
  error: string;
  notes: string[];
}

export interface RunSummary {
  mode: MaintenanceMode;
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
  elapsedMs: number;
  counts: Record<OperationState, number>;
  outcomes: OperationOutcome[];
}
