/**
 * pg-maint - PostgreSQL maintenance scheduler
 *
 * Finds tables whose statistics call for VACUUM, ANALYZE or REINDEX and runs
 * those operations through a bounded worker pool.
 *
 * @module pg-maint
 */

// Export types
export * from "./types/index.js";

// Export configuration
export * from "./config/index.js";

// Export the maintenance pipeline
export {
  CandidateCollector,
  CANDIDATE_SQL,
  toCandidate,
  type CollectorOptions,
  type StatisticsSource,
} from "./maintenance/CandidateCollector.js";
export {
  evaluateAnalyze,
  evaluateCandidate,
  evaluateReindex,
  evaluateVacuum,
  type ProposedOperation,
} from "./maintenance/ThresholdEvaluator.js";
export { buildPlan, compareProposals } from "./maintenance/planner.js";
export {
  applySafetyFilter,
  type DestructiveConfirmer,
  type SafetyFilterOptions,
  type SafetyFilterResult,
} from "./maintenance/SafetyFilter.js";
export {
  ExecutionScheduler,
  type MaintenanceExecutor,
  type SchedulerOptions,
} from "./maintenance/ExecutionScheduler.js";
export { OutcomeRecorder, exitCodeFor } from "./maintenance/OutcomeRecorder.js";
export { Operation, KIND_LABELS } from "./maintenance/Operation.js";
export { TableLocks } from "./maintenance/TableLocks.js";
export { PgMaintenanceExecutor } from "./maintenance/PgMaintenanceExecutor.js";
export { buildMaintenanceStatement } from "./maintenance/statements.js";
export { runMaintenance, type RunDependencies } from "./maintenance/runner.js";

// Export reporting and scheduling
export {
  renderJsonReport,
  renderTextReport,
  writeReport,
} from "./report/ReportWriter.js";
export { SystemCrontab, type CrontabStore } from "./schedule/crontab.js";
export {
  diffCrontab,
  removeSchedule,
  renderEntry,
  scheduleStatus,
  syncSchedule,
} from "./schedule/sync.js";

// Export utilities
export { ConnectionPool } from "./pool/ConnectionPool.js";
export { logger } from "./utils/logger.js";
