/**
 * pg-maint - Candidate Collector
 *
 * Takes one snapshot of pg_stat_user_tables and normalizes it into
 * candidates. The figures are approximate and refreshed asynchronously by
 * the server; they are used as read, never retried or reconciled.
 */

import { z } from "zod";
import type { Candidate, CollectorScope } from "../types/index.js";
import { CollectionError } from "../types/index.js";
import { globToLikePattern } from "../utils/identifiers.js";
import { logger } from "../utils/logger.js";

const log = logger.forModule("COLLECTOR");

/**
 * Anything that can run a read-only query. ConnectionPool satisfies it.
 */
export interface StatisticsSource {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const CANDIDATE_SQL = `
SELECT
    s.schemaname AS schema_name,
    s.relname AS table_name,
    s.n_live_tup AS live_tuples,
    s.n_dead_tup AS dead_tuples,
    s.n_tup_ins AS inserts,
    s.n_tup_upd AS updates,
    s.n_tup_del AS deletes,
    s.n_mod_since_analyze AS modifications_since_analyze,
    s.last_vacuum,
    s.last_autovacuum,
    s.last_analyze,
    s.last_autoanalyze,
    pg_total_relation_size(s.relid) AS size_bytes
FROM pg_stat_user_tables s
WHERE s.n_live_tup + s.n_dead_tup > 0
    AND ($1::text IS NULL OR s.schemaname LIKE $1)
    AND ($2::text[] IS NULL OR s.relname LIKE ANY ($2::text[]))
ORDER BY s.schemaname, s.relname`;

// bigint columns arrive as strings from pg
const count = z.coerce.number().int().nonnegative();
const timestamp = z.coerce.date().nullable();

const StatisticsRowSchema = z.object({
  schema_name: z.string().min(1),
  table_name: z.string().min(1),
  live_tuples: count,
  dead_tuples: count,
  inserts: count,
  updates: count,
  deletes: count,
  modifications_since_analyze: count.nullable(),
  last_vacuum: timestamp,
  last_autovacuum: timestamp,
  last_analyze: timestamp,
  last_autoanalyze: timestamp,
  size_bytes: count,
});

export type StatisticsRow = z.infer<typeof StatisticsRowSchema>;

export interface CollectorOptions {
  /** Drop malformed rows with a warning instead of aborting */
  allowPartial?: boolean | undefined;
  now?: (() => Date) | undefined;
}

function latest(a: Date | null, b: Date | null): Date | null {
  if (a === null) return b;
  if (b === null) return a;
  return a.getTime() >= b.getTime() ? a : b;
}

/**
 * Derive ratio and staleness from one validated row.
 * Returns null for tables without any tuples.
 */
export function toCandidate(row: StatisticsRow, now: Date): Candidate | null {
  const total = row.live_tuples + row.dead_tuples;
  if (total === 0) {
    return null;
  }
  const lastAnalyzed = latest(row.last_analyze, row.last_autoanalyze);
  return {
    schema: row.schema_name,
    table: row.table_name,
    qualifiedName: `${row.schema_name}.${row.table_name}`,
    liveTuples: row.live_tuples,
    deadTuples: row.dead_tuples,
    modificationsSinceAnalyze:
      row.modifications_since_analyze ??
      row.inserts + row.updates + row.deletes,
    inserts: row.inserts,
    updates: row.updates,
    deletes: row.deletes,
    sizeBytes: row.size_bytes,
    lastVacuum: row.last_vacuum,
    lastAutovacuum: row.last_autovacuum,
    lastAnalyze: row.last_analyze,
    lastAutoanalyze: row.last_autoanalyze,
    deadTupleRatio: row.dead_tuples / total,
    stalenessMs:
      lastAnalyzed === null
        ? null
        : Math.max(0, now.getTime() - lastAnalyzed.getTime()),
  };
}

export class CandidateCollector {
  private readonly now: () => Date;

  constructor(
    private readonly source: StatisticsSource,
    private readonly options: CollectorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read the candidates in scope
   *
   * @throws CollectionError when the query fails, or a row is malformed and
   * partial results are not allowed
   */
  async collect(scope: CollectorScope): Promise<Candidate[]> {
    const schemaPattern =
      scope.schema !== undefined ? globToLikePattern(scope.schema) : null;
    const tablePatterns =
      scope.tables.length > 0 ? scope.tables.map(globToLikePattern) : null;

    let rows: unknown[];
    try {
      const result = await this.source.query(CANDIDATE_SQL, [
        schemaPattern,
        tablePatterns,
      ]);
      rows = result.rows;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CollectionError(`Failed to read table statistics: ${message}`, {
        schema: scope.schema,
        tables: scope.tables,
      });
    }

    const now = this.now();
    const candidates: Candidate[] = [];
    let dropped = 0;

    for (const [index, raw] of rows.entries()) {
      const parsed = StatisticsRowSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const detail = issue
          ? `${issue.path.join(".")}: ${issue.message}`
          : "unknown";
        if (this.options.allowPartial !== true) {
          throw new CollectionError(`Malformed statistics row ${String(index)}: ${detail}`);
        }
        dropped++;
        log.warn("Dropping malformed statistics row", { row: index, issue: detail });
        continue;
      }
      const candidate = toCandidate(parsed.data, now);
      if (candidate !== null) {
        candidates.push(candidate);
      }
    }

    log.info("Collected maintenance candidates", {
      candidates: candidates.length,
      dropped,
    });
    return candidates;
  }
}
