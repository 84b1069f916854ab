/**
 * pg-maint - Declarative schedule sync
 *
 * Managed crontab lines carry a trailing `# pg-maint:<name>` marker. Sync
 * replaces exactly the managed lines and leaves every other line as it was.
 */

import type { ScheduleEntry } from "../config/index.js";
import { logger } from "../utils/logger.js";
import type { CrontabStore } from "./crontab.js";

const log = logger.forModule("CRON");

export const MANAGED_MARKER = "# pg-maint:";

const MANAGED_LINE = /\s# pg-maint:[A-Za-z0-9_.-]+$/;
const SAFE_ARG = /^[A-Za-z0-9_@+=:,./-]+$/;

export interface CrontabDiff {
  added: string[];
  removed: string[];
  unchanged: string[];
  /** Complete crontab after applying the diff */
  next: string[];
}

export interface SyncResult extends CrontabDiff {
  written: boolean;
}

export interface SyncOptions {
  dryRun?: boolean | undefined;
}

export function isManagedLine(line: string): boolean {
  return MANAGED_LINE.test(line);
}

/**
 * Quote one argument for /bin/sh. `%` is escaped for cron, which would
 * otherwise turn it into a newline.
 */
export function quoteArgument(arg: string): string {
  const quoted = SAFE_ARG.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;
  return quoted.replace(/%/g, "\\%");
}

/**
 * @example
 * renderEntry({ name: 'nightly', cron: '0 2 * * *', args: ['--operation', 'auto'] }, 'pg-maint')
 * // 0 2 * * * pg-maint --operation auto # pg-maint:nightly
 */
export function renderEntry(entry: ScheduleEntry, command: string): string {
  const parts = [command, ...entry.args.map(quoteArgument)];
  return `${entry.cron} ${parts.join(" ")} ${MANAGED_MARKER}${entry.name}`;
}

export function diffCrontab(
  current: readonly string[],
  desired: readonly string[],
): CrontabDiff {
  const managed = current.filter(isManagedLine);
  const unmanaged = current.filter((line) => !isManagedLine(line));

  // Counted, so a repeated managed line keeps one copy and drops the rest
  const available = new Map<string, number>();
  for (const line of managed) {
    available.set(line, (available.get(line) ?? 0) + 1);
  }
  const added: string[] = [];
  const unchanged: string[] = [];
  for (const line of desired) {
    const count = available.get(line) ?? 0;
    if (count > 0) {
      available.set(line, count - 1);
      unchanged.push(line);
    } else {
      added.push(line);
    }
  }
  const removed: string[] = [];
  for (const line of managed) {
    const count = available.get(line) ?? 0;
    if (count > 0) {
      available.set(line, count - 1);
      removed.push(line);
    }
  }

  return { added, removed, unchanged, next: [...unmanaged, ...desired] };
}

/**
 * Bring the managed crontab lines in line with `entries`. The crontab is
 * written only when something was added or removed.
 */
export async function syncSchedule(
  store: CrontabStore,
  entries: readonly ScheduleEntry[],
  command: string,
  options: SyncOptions = {},
): Promise<SyncResult> {
  const current = await store.read();
  const desired = entries.map((entry) => renderEntry(entry, command));
  const diff = diffCrontab(current, desired);
  const changed = diff.added.length > 0 || diff.removed.length > 0;

  if (!changed) {
    log.info("Crontab already up to date", { entries: desired.length });
    return { ...diff, written: false };
  }
  if (options.dryRun === true) {
    log.info("Dry run: crontab not written", {
      added: diff.added.length,
      removed: diff.removed.length,
    });
    return { ...diff, written: false };
  }

  await store.write(diff.next);
  log.notice("Crontab updated", {
    added: diff.added.length,
    removed: diff.removed.length,
  });
  return { ...diff, written: true };
}

/**
 * Remove every managed line
 */
export function removeSchedule(
  store: CrontabStore,
  options: SyncOptions = {},
): Promise<SyncResult> {
  return syncSchedule(store, [], "", options);
}

export async function scheduleStatus(store: CrontabStore): Promise<string[]> {
  const current = await store.read();
  return current.filter(isManagedLine);
}
