/**
 * pg-maint - PostgreSQL executor
 *
 * Runs each operation in its own pooled session. VACUUM cannot run inside a
 * transaction block, so statements are sent one at a time in autocommit.
 */

import type { InterruptPolicy } from "../types/index.js";
import { QueryError } from "../types/index.js";
import { logger } from "../utils/logger.js";
import type { MaintenanceExecutor } from "./ExecutionScheduler.js";
import type { Operation } from "./Operation.js";
import { buildMaintenanceStatement } from "./statements.js";

const log = logger.forModule("EXECUTOR");

/**
 * One server session. pg's PoolClient satisfies it.
 */
export interface MaintenanceSession {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

/**
 * Hands out sessions and cancels statements running in them.
 * ConnectionPool satisfies it.
 */
export interface SessionPool {
  getConnection(): Promise<MaintenanceSession>;
  releaseConnection(session: MaintenanceSession): void;
  cancelBackend(pid: number): Promise<boolean>;
}

function backendPid(rows: unknown[]): number | undefined {
  const row = rows[0];
  if (typeof row === "object" && row !== null && "pid" in row) {
    return typeof row.pid === "number" ? row.pid : undefined;
  }
  return undefined;
}

export interface PgExecutorOptions {
  /** `cancel` sends pg_cancel_backend to running sessions on interrupt */
  interruptPolicy: InterruptPolicy;
  /** statement_timeout for each session; 0 disables it */
  statementTimeoutMs: number;
}

export class PgMaintenanceExecutor implements MaintenanceExecutor {
  constructor(
    private readonly pool: SessionPool,
    private readonly options: PgExecutorOptions,
  ) {}

  async execute(operation: Operation, signal: AbortSignal): Promise<void> {
    const { schema, table } = operation.candidate;
    const sql = buildMaintenanceStatement(operation.kind, schema, table);
    const client = await this.pool.getConnection();
    let onAbort: (() => void) | undefined;

    try {
      await client.query("SELECT set_config('statement_timeout', $1, false)", [
        String(this.options.statementTimeoutMs),
      ]);

      if (this.options.interruptPolicy === "cancel") {
        const result = await client.query("SELECT pg_backend_pid() AS pid");
        const pid = backendPid(result.rows);
        if (pid !== undefined) {
          onAbort = () => {
            void this.cancel(pid, operation);
          };
          signal.addEventListener("abort", onAbort, { once: true });
        }
        // Interrupted during checkout or setup: nothing to cancel yet
        if (signal.aborted) {
          throw new Error("Interrupted before the statement was sent");
        }
      }

      log.debug("Executing statement", { entityId: operation.target, sql });
      await client.query(sql);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueryError(message, { sql, target: operation.target });
    } finally {
      if (onAbort !== undefined) {
        signal.removeEventListener("abort", onAbort);
      }
      this.pool.releaseConnection(client);
    }
  }

  private async cancel(pid: number, operation: Operation): Promise<void> {
    try {
      const cancelled = await this.pool.cancelBackend(pid);
      log.warn(`Cancel requested for ${operation.target}`, {
        entityId: operation.target,
        pid,
        cancelled,
      });
    } catch (error) {
      log.error(`Could not cancel ${operation.target}`, {
        entityId: operation.target,
        pid,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
