/**
 * pg-maint - Error Types
 *
 * Error classes shared by the maintenance pipeline. Each carries a stable
 * code so the CLI can map it to an exit status and a log line.
 */

/**
 * Base error class for pg-maint
 */
export class MaintenanceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MaintenanceError";
  }
}

/**
 * Invalid or conflicting configuration (flags, environment or file)
 */
export class ConfigurationError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONNECTION_ERROR", details);
    this.name = "ConnectionError";
  }
}

/**
 * Connection pool error
 */
export class PoolError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "POOL_ERROR", details);
    this.name = "PoolError";
  }
}

/**
 * The statistics snapshot could not be read or parsed
 */
export class CollectionError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "COLLECTION_ERROR", details);
    this.name = "CollectionError";
  }
}

/**
 * Query execution error
 */
export class QueryError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "QUERY_ERROR", details);
    this.name = "QueryError";
  }
}

/**
 * Validation error for input values
 */
export class ValidationError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * An operation was moved to a state its current state does not lead to
 */
export class InvalidTransitionError extends MaintenanceError {
  constructor(from: string, to: string, details?: Record<string, unknown>) {
    super(`Invalid operation transition: ${from} -> ${to}`, "INVALID_TRANSITION", {
      from,
      to,
      ...details,
    });
    this.name = "InvalidTransitionError";
  }
}

/**
 * Reading or installing the crontab failed
 */
export class CrontabError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CRONTAB_ERROR", details);
    this.name = "CrontabError";
  }
}
