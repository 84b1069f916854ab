/**
 * pg-maint - Threshold Evaluator
 *
 * Classifies one candidate against the threshold policy and proposes at most
 * one operation per family (vacuum, analyze, reindex), each with its priority
 * tier and the metric that triggered it.
 */

import type {
  Candidate,
  MaintenanceMode,
  OperationKind,
  PriorityTier,
  ThresholdPolicy,
  TriggerReason,
} from "../types/index.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ProposedOperation {
  kind: OperationKind;
  tier: PriorityTier;
  reason: TriggerReason;
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function evaluateDeadTuples(
  candidate: Candidate,
  threshold: number,
): { tier: PriorityTier; tag: "Urgent" | "High"; bound: number } | null {
  const ratio = candidate.deadTupleRatio;
  if (ratio >= 2 * threshold) {
    return { tier: 1, tag: "Urgent", bound: 2 * threshold };
  }
  if (ratio >= threshold) {
    return { tier: 2, tag: "High", bound: threshold };
  }
  return null;
}

/**
 * VACUUM (or VACUUM FULL) when the dead-tuple ratio crosses θ_d or 2·θ_d
 */
export function evaluateVacuum(
  candidate: Candidate,
  policy: ThresholdPolicy,
  kind: "vacuum" | "vacuum_full" = "vacuum",
): ProposedOperation | null {
  const hit = evaluateDeadTuples(candidate, policy.deadTupleRatio);
  if (hit === null) {
    return null;
  }
  return {
    kind,
    tier: hit.tier,
    reason: {
      tag: hit.tag,
      description:
        `dead tuples ${percent(candidate.deadTupleRatio)} ` +
        `(${String(candidate.deadTuples)} dead, ${String(candidate.liveTuples)} live) ` +
        `>= ${percent(hit.bound)}`,
      metric: { name: "dead_tuple_ratio", value: candidate.deadTupleRatio },
    },
  };
}

/**
 * ANALYZE when statistics are missing, stale or outrun by modifications.
 * The first matching rule wins.
 */
export function evaluateAnalyze(
  candidate: Candidate,
  policy: ThresholdPolicy,
): ProposedOperation | null {
  const { liveTuples, modificationsSinceAnalyze: changes, stalenessMs } =
    candidate;

  if (stalenessMs === null && liveTuples > policy.minLiveTuplesForAnalyze) {
    return {
      kind: "analyze",
      tier: 1,
      reason: {
        tag: "Never-analyzed",
        description: `never analyzed (${String(liveTuples)} live rows)`,
        metric: { name: "live_tuples", value: liveTuples },
      },
    };
  }

  if (
    stalenessMs !== null &&
    stalenessMs >= policy.stalenessMs &&
    changes > policy.minModificationsForStale
  ) {
    return {
      kind: "analyze",
      tier: 2,
      reason: {
        tag: "Stale",
        description:
          `statistics ${(stalenessMs / DAY_MS).toFixed(1)} days old, ` +
          `${String(changes)} changes since last analyze`,
        metric: { name: "staleness_ms", value: stalenessMs },
      },
    };
  }

  const changeRatio = changes / Math.max(liveTuples, 1);
  if (changes > 0 && changes >= policy.modificationRatio * liveTuples) {
    return {
      kind: "analyze",
      tier: 3,
      reason: {
        tag: "High-churn",
        description:
          `${String(changes)} changes since last analyze ` +
          `(${percent(changeRatio)} of live rows)`,
        metric: { name: "modification_ratio", value: changeRatio },
      },
    };
  }

  return null;
}

/**
 * REINDEX when the dead-tuple ratio crosses the bloat threshold θ_b
 */
export function evaluateReindex(
  candidate: Candidate,
  policy: ThresholdPolicy,
): ProposedOperation | null {
  const hit = evaluateDeadTuples(candidate, policy.bloatRatio);
  if (hit === null) {
    return null;
  }
  return {
    kind: "reindex",
    tier: hit.tier,
    reason: {
      tag: "Bloated",
      description:
        `dead tuples ${percent(candidate.deadTupleRatio)} >= bloat threshold ${percent(hit.bound)}`,
      metric: { name: "dead_tuple_ratio", value: candidate.deadTupleRatio },
    },
  };
}

/**
 * Propose the operations the mode allows for one candidate
 */
export function evaluateCandidate(
  candidate: Candidate,
  mode: MaintenanceMode,
  policy: ThresholdPolicy,
): ProposedOperation[] {
  const proposals: (ProposedOperation | null)[] = [];

  switch (mode) {
    case "vacuum":
      proposals.push(evaluateVacuum(candidate, policy));
      break;
    case "analyze":
      proposals.push(evaluateAnalyze(candidate, policy));
      break;
    case "auto":
      proposals.push(
        evaluateVacuum(candidate, policy),
        evaluateAnalyze(candidate, policy),
      );
      break;
    case "full-vacuum":
      proposals.push(evaluateVacuum(candidate, policy, "vacuum_full"));
      break;
    case "reindex":
      proposals.push(evaluateReindex(candidate, policy));
      break;
  }

  return proposals.filter((p): p is ProposedOperation => p !== null);
}
