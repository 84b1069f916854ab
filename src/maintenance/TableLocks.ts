/**
 * pg-maint - Per-table mutual exclusion
 *
 * One token per table. A second operation on a held table waits in a FIFO
 * queue until the holder releases; the token is handed straight to the next
 * waiter so nobody can jump the queue.
 */

export type ReleaseLock = () => void;

export class TableLocks {
  private readonly held = new Set<string>();
  private readonly waiters = new Map<string, (() => void)[]>();

  /**
   * Wait for the table's token
   *
   * @returns a release function; calling it more than once is a no-op
   */
  async acquire(table: string): Promise<ReleaseLock> {
    if (this.held.has(table)) {
      await new Promise<void>((resolve) => {
        const queue = this.waiters.get(table) ?? [];
        queue.push(resolve);
        this.waiters.set(table, queue);
      });
    } else {
      this.held.add(table);
    }

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.release(table);
    };
  }

  isHeld(table: string): boolean {
    return this.held.has(table);
  }

  /** Number of tables currently locked */
  get size(): number {
    return this.held.size;
  }

  private release(table: string): void {
    const queue = this.waiters.get(table);
    const next = queue?.shift();
    if (queue !== undefined && queue.length === 0) {
      this.waiters.delete(table);
    }
    if (next !== undefined) {
      // token stays held and passes to the waiter
      next();
    } else {
      this.held.delete(table);
    }
  }
}
