/**
 * pg-maint - Configuration Schemas
 *
 * Every configuration layer (flags, environment, file) is normalized into the
 * same flat Settings shape before layering. Flag and environment values arrive
 * as strings, so the schema coerces them.
 */

import { z } from "zod";
import { MAINTENANCE_MODES } from "../types/index.js";
import { LOG_LEVELS } from "../utils/logger.js";

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off", ""]);

function toBoolean(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return value;
}

function toList(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const booleanish = z.preprocess(toBoolean, z.boolean());
const percent = z.coerce.number().gt(0).max(100);
const nonEmpty = z.string().trim().min(1);

/**
 * Five space-separated cron fields, or one of the @ shortcuts
 */
const CRON_PATTERN =
  /^(@(reboot|yearly|annually|monthly|weekly|daily|midnight|hourly)|([\d*,/\-A-Za-z]+\s+){4}[\d*,/\-A-Za-z]+)$/;

export const ScheduleEntrySchema = z
  .object({
    name: z
      .string()
      .regex(/^[A-Za-z0-9_.-]+$/, "Use letters, digits, '.', '_' or '-'"),
    cron: z.string().trim().regex(CRON_PATTERN, "Invalid cron expression"),
    args: z.array(z.string()).default([]),
  })
  .strict();

export type ScheduleEntry = z.infer<typeof ScheduleEntrySchema>;

export const SettingsSchema = z.object({
  operation: z.enum(MAINTENANCE_MODES).optional(),
  schema: nonEmpty.optional(),
  tables: z.preprocess(toList, z.array(nonEmpty)).optional(),
  parallel: z.coerce.number().int().min(1).max(64).optional(),
  dryRun: booleanish.optional(),
  deadThreshold: percent.optional(),
  staleDays: z.coerce.number().gt(0).optional(),
  changeThreshold: percent.optional(),
  bloatThreshold: percent.optional(),
  minLiveTuples: z.coerce.number().int().nonnegative().optional(),
  minChanges: z.coerce.number().int().nonnegative().optional(),
  skipLarge: booleanish.optional(),
  largeSize: nonEmpty.optional(),
  confirmDestructive: booleanish.optional(),
  onInterrupt: z.enum(["wait", "cancel"]).optional(),
  statementTimeout: z.coerce.number().int().nonnegative().optional(),
  allowPartial: booleanish.optional(),
  output: nonEmpty.optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  postgres: z.string().url().optional(),
  host: nonEmpty.optional(),
  pgPort: z.coerce.number().int().min(1).max(65535).optional(),
  user: nonEmpty.optional(),
  password: z.string().optional(),
  database: nonEmpty.optional(),
  ssl: booleanish.optional(),
  scheduleCommand: nonEmpty.optional(),
  schedule: z.array(ScheduleEntrySchema).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * JSON configuration file. Nested for readability, flattened before layering.
 */
export const ConfigFileSchema = z
  .object({
    operation: z.string().optional(),
    schema: z.string().optional(),
    tables: z.array(z.string()).optional(),
    parallel: z.number().optional(),
    dryRun: z.boolean().optional(),
    thresholds: z
      .object({
        deadTuplePercent: z.number().optional(),
        staleDays: z.number().optional(),
        changePercent: z.number().optional(),
        bloatPercent: z.number().optional(),
        minLiveTuples: z.number().optional(),
        minChanges: z.number().optional(),
      })
      .strict()
      .optional(),
    safety: z
      .object({
        skipLarge: z.boolean().optional(),
        largeSize: z.union([z.string(), z.number()]).optional(),
        confirmDestructive: z.boolean().optional(),
      })
      .strict()
      .optional(),
    onInterrupt: z.string().optional(),
    statementTimeoutMs: z.number().optional(),
    allowPartial: z.boolean().optional(),
    output: z.string().optional(),
    logLevel: z.string().optional(),
    database: z
      .object({
        url: z.string().optional(),
        host: z.string().optional(),
        port: z.number().optional(),
        user: z.string().optional(),
        password: z.string().optional(),
        name: z.string().optional(),
        ssl: z.boolean().optional(),
      })
      .strict()
      .optional(),
    schedule: z
      .object({
        command: z.string().optional(),
        entries: z.array(z.unknown()).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
