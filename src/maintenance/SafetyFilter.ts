/**
 * pg-maint - Safety Filter
 *
 * Removes operations that violate the safety policy. Removed operations are
 * moved to `skipped` with a note; survivors keep their relative order.
 */

import type { SafetyPolicy } from "../types/index.js";
import { formatBytes } from "../utils/size.js";
import { logger } from "../utils/logger.js";
import type { Operation } from "./Operation.js";

const log = logger.forModule("SAFETY");

/**
 * Asks the operator once whether the listed exclusive-lock operations may run.
 * Resolves false when nobody can be asked.
 */
export type DestructiveConfirmer = (
  operations: readonly Operation[],
) => Promise<boolean>;

export interface SafetyFilterOptions extends SafetyPolicy {
  dryRun: boolean;
  confirm?: DestructiveConfirmer | undefined;
}

export interface SafetyFilterResult {
  plan: Operation[];
  skipped: Operation[];
}

export const SKIP_LARGE_TABLE = "skipped: large table";
export const SKIP_NOT_CONFIRMED = "skipped: destructive operation not confirmed";
export const NOTE_NEEDS_CONFIRMATION = "requires confirmation before execution";

export async function applySafetyFilter(
  operations: readonly Operation[],
  options: SafetyFilterOptions,
): Promise<SafetyFilterResult> {
  const skipped: Operation[] = [];
  let survivors: Operation[] = [];

  for (const operation of operations) {
    const size = operation.candidate.sizeBytes;
    if (options.skipLarge && size >= options.largeTableSizeBytes) {
      operation.skip(
        `${SKIP_LARGE_TABLE} (${formatBytes(size)} >= ${formatBytes(options.largeTableSizeBytes)})`,
      );
      log.warn(`Skipping large table ${operation.target}`, {
        kind: operation.kind,
        sizeBytes: size,
      });
      skipped.push(operation);
    } else {
      survivors.push(operation);
    }
  }

  const destructive = survivors.filter((op) => op.isDestructive);
  if (destructive.length > 0 && !options.confirmDestructive) {
    if (options.dryRun) {
      for (const operation of destructive) {
        operation.annotate(NOTE_NEEDS_CONFIRMATION);
      }
    } else {
      const confirmed =
        options.confirm !== undefined && (await options.confirm(destructive));
      if (!confirmed) {
        for (const operation of destructive) {
          operation.skip(SKIP_NOT_CONFIRMED);
          skipped.push(operation);
        }
        log.warn("Exclusive-lock operations were not confirmed", {
          count: destructive.length,
        });
        survivors = survivors.filter((op) => !op.isDestructive);
      }
    }
  }

  skipped.sort((a, b) => a.id - b.id);
  return { plan: survivors, skipped };
}
