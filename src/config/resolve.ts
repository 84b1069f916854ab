/**
 * pg-maint - Configuration resolution
 *
 * Precedence: flag > environment > config file > default. The result is
 * frozen and passed explicitly through the pipeline.
 */

import { readFile } from "node:fs/promises";
import type { ZodError } from "zod";
import type {
  CollectorScope,
  DatabaseConfig,
  InterruptPolicy,
  MaintenanceMode,
  SafetyPolicy,
  ThresholdPolicy,
} from "../types/index.js";
import { ConfigurationError, DEFAULT_THRESHOLDS } from "../types/index.js";
import type { LogLevel } from "../utils/logger.js";
import { logger } from "../utils/logger.js";
import { parseSize } from "../utils/size.js";
import {
  ConfigFileSchema,
  SettingsSchema,
  type ScheduleEntry,
  type Settings,
} from "./schema.js";

const log = logger.forModule("CONFIG");

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceConfig {
  readonly mode: MaintenanceMode;
  readonly scope: CollectorScope;
  readonly concurrency: number;
  readonly dryRun: boolean;
  readonly thresholds: ThresholdPolicy;
  readonly safety: SafetyPolicy;
  readonly interruptPolicy: InterruptPolicy;
  readonly statementTimeoutMs: number;
  readonly allowPartial: boolean;
  readonly output?: string | undefined;
  readonly logLevel: LogLevel;
  readonly database: DatabaseConfig;
  readonly schedule: {
    readonly command: string;
    readonly entries: readonly ScheduleEntry[];
  };
}

export const DEFAULT_SETTINGS = {
  operation: "auto",
  parallel: 1,
  dryRun: false,
  deadThreshold: 20,
  staleDays: 7,
  changeThreshold: 10,
  bloatThreshold: 30,
  minLiveTuples: DEFAULT_THRESHOLDS.minLiveTuplesForAnalyze,
  minChanges: DEFAULT_THRESHOLDS.minModificationsForStale,
  skipLarge: false,
  largeSize: "10GB",
  confirmDestructive: false,
  onInterrupt: "wait",
  statementTimeout: 0,
  allowPartial: false,
  logLevel: "info",
  host: "localhost",
  pgPort: 5432,
  user: "postgres",
  password: "",
  database: "postgres",
  ssl: false,
  scheduleCommand: "pg-maint",
} as const satisfies Settings;

/**
 * Environment variable for each setting
 */
export const ENV_VARIABLES = {
  operation: "PGMAINT_MODE",
  schema: "PGMAINT_SCHEMA",
  tables: "PGMAINT_TABLES",
  parallel: "PGMAINT_PARALLEL",
  dryRun: "PGMAINT_DRY_RUN",
  deadThreshold: "PGMAINT_DEAD_THRESHOLD",
  staleDays: "PGMAINT_STALE_DAYS",
  changeThreshold: "PGMAINT_CHANGE_THRESHOLD",
  bloatThreshold: "PGMAINT_BLOAT_THRESHOLD",
  skipLarge: "PGMAINT_SKIP_LARGE",
  largeSize: "PGMAINT_LARGE_SIZE",
  confirmDestructive: "PGMAINT_CONFIRM_DESTRUCTIVE",
  onInterrupt: "PGMAINT_ON_INTERRUPT",
  statementTimeout: "PGMAINT_STATEMENT_TIMEOUT",
  allowPartial: "PGMAINT_ALLOW_PARTIAL",
  output: "PGMAINT_OUTPUT",
  logLevel: "LOG_LEVEL",
  postgres: "PGMAINT_POSTGRES_URL",
  host: "PGHOST",
  pgPort: "PGPORT",
  user: "PGUSER",
  password: "PGPASSWORD",
  database: "PGDATABASE",
  scheduleCommand: "PGMAINT_SCHEDULE_COMMAND",
} as const satisfies Partial<Record<keyof Settings, string>>;

export const CONFIG_PATH_VARIABLE = "PGMAINT_CONFIG";

function describeIssues(source: string, error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${source} ${path}: ${issue.message}`;
    })
    .join("; ");
}

function parseLayer(source: string, raw: Record<string, unknown>): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${describeIssues(source, result.error)}`,
      { source },
    );
  }
  return result.data;
}

/**
 * Settings given on the command line. Commander leaves unset options
 * undefined, so they do not shadow lower layers.
 */
export function fromFlags(flags: Record<string, unknown>): Settings {
  const raw: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(flags)) {
    if (key !== "config" && value !== undefined) {
      raw[key] = value;
    }
  }
  return parseLayer("flag", raw);
}

/**
 * Settings read from environment variables. Empty strings count as unset.
 */
export function fromEnv(env: NodeJS.ProcessEnv): Settings {
  const raw: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_VARIABLES)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }
  return parseLayer("environment", raw);
}

/**
 * Settings from a parsed JSON configuration file
 */
export function fromFile(content: unknown, path = "config file"): Settings {
  const parsed = ConfigFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${describeIssues(path, parsed.error)}`,
      { source: path },
    );
  }
  const file = parsed.data;
  const raw: Record<string, unknown> = {
    operation: file.operation,
    schema: file.schema,
    tables: file.tables,
    parallel: file.parallel,
    dryRun: file.dryRun,
    deadThreshold: file.thresholds?.deadTuplePercent,
    staleDays: file.thresholds?.staleDays,
    changeThreshold: file.thresholds?.changePercent,
    bloatThreshold: file.thresholds?.bloatPercent,
    minLiveTuples: file.thresholds?.minLiveTuples,
    minChanges: file.thresholds?.minChanges,
    skipLarge: file.safety?.skipLarge,
    largeSize:
      typeof file.safety?.largeSize === "number"
        ? String(file.safety.largeSize)
        : file.safety?.largeSize,
    confirmDestructive: file.safety?.confirmDestructive,
    onInterrupt: file.onInterrupt,
    statementTimeout: file.statementTimeoutMs,
    allowPartial: file.allowPartial,
    output: file.output,
    logLevel: file.logLevel,
    postgres: file.database?.url,
    host: file.database?.host,
    pgPort: file.database?.port,
    user: file.database?.user,
    password: file.database?.password,
    database: file.database?.name,
    ssl: file.database?.ssl,
    scheduleCommand: file.schedule?.command,
    schedule: file.schedule?.entries,
  };
  for (const key of Object.keys(raw)) {
    if (raw[key] === undefined) {
      delete raw[key];
    }
  }
  return parseLayer(path, raw);
}

/**
 * Read and parse a JSON configuration file
 *
 * @throws ConfigurationError when the file is missing, unreadable or not JSON
 */
export async function loadConfigFile(path: string): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config file: ${message}`, {
      path,
    });
  }
  let content: unknown;
  try {
    content = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file is not valid JSON: ${message}`, {
      path,
    });
  }
  return fromFile(content, path);
}

/**
 * Later layers win; undefined values never override
 */
export function mergeSettings(...layers: Settings[]): Settings {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return parseLayer("merged", merged);
}

function buildDatabaseConfig(settings: Settings): DatabaseConfig {
  const database: DatabaseConfig = {
    connectionString: settings.postgres,
    host: settings.host ?? DEFAULT_SETTINGS.host,
    port: settings.pgPort ?? DEFAULT_SETTINGS.pgPort,
    database: settings.database ?? DEFAULT_SETTINGS.database,
    username: settings.user ?? DEFAULT_SETTINGS.user,
    password: settings.password ?? DEFAULT_SETTINGS.password,
    ssl: settings.ssl ?? DEFAULT_SETTINGS.ssl,
  };

  if (settings.postgres !== undefined) {
    // Keep the individual fields in step with the URL for log output
    const url = new URL(settings.postgres);
    if (url.hostname !== "") database.host = url.hostname;
    if (url.port !== "") database.port = Number(url.port);
    if (url.username !== "") database.username = decodeURIComponent(url.username);
    const name = url.pathname.replace(/^\//, "");
    if (name !== "") database.database = decodeURIComponent(name);
    if (url.searchParams.get("sslmode") === "require") database.ssl = true;
  }
  return database;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Turn layered settings into the immutable run configuration
 *
 * @throws ConfigurationError for values that parse but cannot be used
 */
export function buildConfig(settings: Settings): MaintenanceConfig {
  const largeSize = settings.largeSize ?? DEFAULT_SETTINGS.largeSize;
  const largeTableSizeBytes = parseSize(largeSize);
  if (largeTableSizeBytes === null || largeTableSizeBytes === 0) {
    throw new ConfigurationError(
      `Invalid large table size "${largeSize}": use a number with B, KB, MB, GB or TB`,
      { largeSize },
    );
  }

  const entries = settings.schedule ?? [];
  const names = new Set<string>();
  for (const entry of entries) {
    if (names.has(entry.name)) {
      throw new ConfigurationError(`Duplicate schedule entry "${entry.name}"`, {
        name: entry.name,
      });
    }
    names.add(entry.name);
  }

  const config: MaintenanceConfig = {
    mode: settings.operation ?? DEFAULT_SETTINGS.operation,
    scope: {
      schema: settings.schema,
      tables: settings.tables ?? [],
    },
    concurrency: settings.parallel ?? DEFAULT_SETTINGS.parallel,
    dryRun: settings.dryRun ?? DEFAULT_SETTINGS.dryRun,
    thresholds: {
      deadTupleRatio:
        (settings.deadThreshold ?? DEFAULT_SETTINGS.deadThreshold) / 100,
      stalenessMs: (settings.staleDays ?? DEFAULT_SETTINGS.staleDays) * DAY_MS,
      modificationRatio:
        (settings.changeThreshold ?? DEFAULT_SETTINGS.changeThreshold) / 100,
      bloatRatio:
        (settings.bloatThreshold ?? DEFAULT_SETTINGS.bloatThreshold) / 100,
      minLiveTuplesForAnalyze:
        settings.minLiveTuples ?? DEFAULT_SETTINGS.minLiveTuples,
      minModificationsForStale:
        settings.minChanges ?? DEFAULT_SETTINGS.minChanges,
    },
    safety: {
      skipLarge: settings.skipLarge ?? DEFAULT_SETTINGS.skipLarge,
      largeTableSizeBytes,
      confirmDestructive:
        settings.confirmDestructive ?? DEFAULT_SETTINGS.confirmDestructive,
    },
    interruptPolicy: settings.onInterrupt ?? DEFAULT_SETTINGS.onInterrupt,
    statementTimeoutMs:
      settings.statementTimeout ?? DEFAULT_SETTINGS.statementTimeout,
    allowPartial: settings.allowPartial ?? DEFAULT_SETTINGS.allowPartial,
    output: settings.output,
    logLevel: settings.logLevel ?? DEFAULT_SETTINGS.logLevel,
    database: buildDatabaseConfig(settings),
    schedule: {
      command: settings.scheduleCommand ?? DEFAULT_SETTINGS.scheduleCommand,
      entries,
    },
  };

  return deepFreeze(config);
}

export interface ResolveSources {
  flags?: Record<string, unknown> | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the run configuration from all layers. The config file path comes
 * from `--config` or PGMAINT_CONFIG.
 */
export async function resolveConfig(
  sources: ResolveSources = {},
): Promise<MaintenanceConfig> {
  const flags = sources.flags ?? {};
  const env = sources.env ?? {};

  const flagSettings = fromFlags(flags);
  const envSettings = fromEnv(env);

  const flagPath = flags["config"];
  const configPath =
    typeof flagPath === "string" && flagPath !== ""
      ? flagPath
      : env[CONFIG_PATH_VARIABLE];
  const fileSettings =
    configPath !== undefined && configPath !== ""
      ? await loadConfigFile(configPath)
      : {};

  const config = buildConfig(
    mergeSettings(fileSettings, envSettings, flagSettings),
  );

  log.debug("Configuration resolved", {
    configFile: configPath,
    mode: config.mode,
    concurrency: config.concurrency,
    dryRun: config.dryRun,
    database: config.database,
  });
  return config;
}
