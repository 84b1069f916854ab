/**
 * pg-maint - Size parsing and formatting
 */

const UNITS: Record<string, number> = {
  "": 1,
  B: 1,
  K: 1024,
  KB: 1024,
  M: 1024 ** 2,
  MB: 1024 ** 2,
  G: 1024 ** 3,
  GB: 1024 ** 3,
  T: 1024 ** 4,
  TB: 1024 ** 4,
};

const SIZE_PATTERN = /^(\d+)\s*([KMGT]?B?)$/i;

/**
 * Parse a human size ("10GB", "512MB", "1048576") into bytes.
 * Units are binary (1 KB = 1024 bytes) like pg_size_pretty.
 *
 * @returns the size in bytes, or null when the text is not a size
 */
export function parseSize(text: string): number | null {
  const match = SIZE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, digits = "", unit = ""] = match;
  const multiplier = UNITS[unit.toUpperCase()];
  if (multiplier === undefined) {
    return null;
  }
  return Number.parseInt(digits, 10) * multiplier;
}

/**
 * Format bytes the way pg_size_pretty does (integer bytes, one decimal above)
 */
export function formatBytes(bytes: number): string {
  const units = ["bytes", "kB", "MB", "GB", "TB"];
  let value = bytes;
  let index = 0;
  while (value >= 1024 && index < units.length - 1) {
    value /= 1024;
    index++;
  }
  return index === 0
    ? `${String(bytes)} bytes`
    : `${value.toFixed(1)} ${units[index] ?? ""}`;
}

/**
 * Format a millisecond duration as "850ms", "12.3s" or "4m 05s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${String(Math.round(ms))}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${String(minutes)}m ${String(seconds).padStart(2, "0")}s`;
}
