/**
 * pg-maint - Planner
 *
 * Turns candidates into ranked operations. Ranking is tier first, then the
 * estimated impact (dead tuples, staleness), then table size.
 */

import type {
  Candidate,
  MaintenanceMode,
  OperationKind,
  ThresholdPolicy,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import { Operation } from "./Operation.js";
import { evaluateCandidate, type ProposedOperation } from "./ThresholdEvaluator.js";

const log = logger.forModule("PLANNER");

const KIND_ORDER: Record<OperationKind, number> = {
  vacuum_full: 0,
  vacuum: 1,
  reindex: 2,
  analyze: 3,
};

export interface RankedProposal {
  candidate: Candidate;
  proposal: ProposedOperation;
}

function compareDescending(a: number, b: number): number {
  if (a === b) {
    return 0;
  }
  return a > b ? -1 : 1;
}

/** Never analyzed sorts as the most stale */
function stalenessRank(candidate: Candidate): number {
  return candidate.stalenessMs ?? Number.POSITIVE_INFINITY;
}

/**
 * Priority order for two proposed operations
 */
export function compareProposals(a: RankedProposal, b: RankedProposal): number {
  return (
    a.proposal.tier - b.proposal.tier ||
    compareDescending(a.candidate.deadTuples, b.candidate.deadTuples) ||
    compareDescending(stalenessRank(a.candidate), stalenessRank(b.candidate)) ||
    compareDescending(a.candidate.sizeBytes, b.candidate.sizeBytes) ||
    a.candidate.qualifiedName.localeCompare(b.candidate.qualifiedName) ||
    KIND_ORDER[a.proposal.kind] - KIND_ORDER[b.proposal.kind]
  );
}

/**
 * Evaluate every candidate and return operations in priority order.
 * Operation ids follow that order, starting at 1.
 */
export function buildPlan(
  candidates: readonly Candidate[],
  mode: MaintenanceMode,
  policy: ThresholdPolicy,
): Operation[] {
  const ranked: RankedProposal[] = [];
  for (const candidate of candidates) {
    for (const proposal of evaluateCandidate(candidate, mode, policy)) {
      ranked.push({ candidate, proposal });
    }
  }

  ranked.sort(compareProposals);

  const operations = ranked.map(
    ({ candidate, proposal }, index) =>
      new Operation({
        id: index + 1,
        candidate,
        kind: proposal.kind,
        tier: proposal.tier,
        reason: proposal.reason,
      }),
  );

  log.info("Plan built", {
    mode,
    candidates: candidates.length,
    operations: operations.length,
  });
  for (const operation of operations) {
    log.debug(`Planned ${operation.describe()}`, {
      entityId: operation.target,
      tier: operation.tier,
    });
  }

  return operations;
}
