/**
 * pg-maint - Structured Logger
 *
 * Centralized logging utility with RFC 5424 severity levels and structured output.
 * Everything goes to stderr; stdout carries the run summary only.
 *
 * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 * Example: [2025-12-18T01:30:00Z] [ERROR] [EXECUTOR] [OP_FAILED] VACUUM failed {"target":"public.orders"}
 */

/**
 * RFC 5424 syslog severity levels
 * @see https://datatracker.ietf.org/doc/html/rfc5424#section-6.2.1
 */
export type LogLevel =
    | 'debug'       // 7 - Debug-level messages
    | 'info'        // 6 - Informational messages
    | 'notice'      // 5 - Normal but significant condition
    | 'warning'     // 4 - Warning conditions
    | 'error'       // 3 - Error conditions
    | 'critical'    // 2 - Critical conditions
    | 'alert'       // 1 - Action must be taken immediately
    | 'emergency';  // 0 - System is unusable

export const LOG_LEVELS = [
    'debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'
] as const satisfies readonly LogLevel[];

/**
 * Module identifiers for log categorization
 */
export type LogModule =
    | 'CLI'         // Command line interface
    | 'CONFIG'      // Configuration resolution
    | 'POOL'        // Connection pool
    | 'COLLECTOR'   // Statistics snapshot
    | 'PLANNER'     // Threshold evaluation and ranking
    | 'SAFETY'      // Safety filter
    | 'SCHEDULER'   // Worker pool dispatch
    | 'EXECUTOR'    // Maintenance statements
    | 'REPORT'      // Run summary output
    | 'CRON';       // Crontab sync

/**
 * Structured log context
 */
export interface LogContext {
    /** Module identifier */
    module?: LogModule;
    /** Module-prefixed error/event code (e.g., PG_CONNECT_FAILED) */
    code?: string;
    /** Operation being performed (e.g., collect, execute) */
    operation?: string;
    /** Entity identifier (e.g., table name, operation id) */
    entityId?: string;
    /** Error stack trace */
    stack?: string;
    /** Additional context fields */
    [key: string]: unknown;
}

interface LogEntry {
    level: LogLevel;
    module?: LogModule | undefined;
    code?: string | undefined;
    message: string;
    timestamp: string;
    context?: LogContext | undefined;
}

// C0 controls except tab/newline/carriage return, DEL, and C1 controls
const CONTROL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g;

/**
 * Structured logger writing to stderr
 *
 * - Module-prefixed codes (e.g., PG_CONNECT_FAILED, OP_FAILED)
 * - Severity: RFC 5424 levels
 * - Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 */
export class Logger {
    private minLevel: LogLevel = 'info';

    /**
     * RFC 5424 severity priority (lower number = higher severity)
     */
    private readonly levelPriority: Record<LogLevel, number> = {
        emergency: 0,
        alert: 1,
        critical: 2,
        error: 3,
        warning: 4,
        notice: 5,
        info: 6,
        debug: 7
    };

    /**
     * Set the minimum log level
     */
    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    private shouldLog(level: LogLevel): boolean {
        return this.levelPriority[level] <= this.levelPriority[this.minLevel];
    }

    /**
     * Keys that contain sensitive data and should be redacted
     */
    private readonly sensitiveKeys: ReadonlySet<string> = new Set([
        'password',
        'secret',
        'token',
        'key',
        'apikey',
        'api_key',
        'authorization',
        'credential',
        'credentials',
        'connectionstring',
        'connection_string'
    ]);

    /**
     * Sanitize context object by redacting sensitive values
     */
    private sanitizeContext(context: LogContext): LogContext {
        const sanitized: LogContext = {};

        for (const [key, value] of Object.entries(context)) {
            const lowerKey = key.toLowerCase();

            const isSensitive = this.sensitiveKeys.has(lowerKey) ||
                [...this.sensitiveKeys].some(sk => lowerKey.includes(sk));

            if (isSensitive && value !== undefined && value !== null) {
                sanitized[key] = '[REDACTED]';
            } else if (isPlainObject(value)) {
                sanitized[key] = this.sanitizeContext(value);
            } else {
                sanitized[key] = value;
            }
        }

        return sanitized;
    }

    /**
     * Strip control characters that could forge log lines or drive the terminal
     */
    private sanitizeMessage(message: string): string {
        return message.replace(CONTROL_CHARACTERS, '');
    }

    /**
     * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
     */
    private formatEntry(entry: LogEntry): string {
        const parts: string[] = [
            `[${entry.timestamp}]`,
            `[${entry.level.toUpperCase()}]`
        ];

        if (entry.module) {
            parts.push(`[${entry.module}]`);
        }

        if (entry.code) {
            parts.push(`[${entry.code}]`);
        }

        parts.push(this.sanitizeMessage(entry.message));

        if (entry.context) {
            // module and code are already part of the line
            const { module, code, ...restContext } = entry.context;
            void module; void code;
            if (Object.keys(restContext).length > 0) {
                const sanitizedContext = this.sanitizeContext(restContext);
                parts.push(JSON.stringify(sanitizedContext));
            }
        }

        return parts.join(' ');
    }

    /**
     * Core logging method
     */
    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            module: context?.module ?? 'CLI',
            code: context?.code,
            message,
            timestamp: new Date().toISOString(),
            context
        };

        console.error(this.formatEntry(entry));
    }

    // =========================================================================
    // Convenience methods for each log level
    // =========================================================================

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    notice(message: string, context?: LogContext): void {
        this.log('notice', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    warning(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    critical(message: string, context?: LogContext): void {
        this.log('critical', message, context);
    }

    alert(message: string, context?: LogContext): void {
        this.log('alert', message, context);
    }

    emergency(message: string, context?: LogContext): void {
        this.log('emergency', message, context);
    }

    /**
     * Create a child logger scoped to a specific module
     */
    forModule(module: LogModule): ModuleLogger {
        return new ModuleLogger(this, module);
    }
}

function isPlainObject(value: unknown): value is LogContext {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Module-scoped logger for cleaner code in specific modules
 */
export class ModuleLogger {
    constructor(
        private parent: Logger,
        private module: LogModule
    ) { }

    private withModule(context?: LogContext): LogContext {
        return { ...context, module: this.module };
    }

    debug(message: string, context?: LogContext): void {
        this.parent.debug(message, this.withModule(context));
    }

    info(message: string, context?: LogContext): void {
        this.parent.info(message, this.withModule(context));
    }

    notice(message: string, context?: LogContext): void {
        this.parent.notice(message, this.withModule(context));
    }

    warn(message: string, context?: LogContext): void {
        this.parent.warn(message, this.withModule(context));
    }

    warning(message: string, context?: LogContext): void {
        this.parent.warning(message, this.withModule(context));
    }

    error(message: string, context?: LogContext): void {
        this.parent.error(message, this.withModule(context));
    }

    critical(message: string, context?: LogContext): void {
        this.parent.critical(message, this.withModule(context));
    }

    alert(message: string, context?: LogContext): void {
        this.parent.alert(message, this.withModule(context));
    }

    emergency(message: string, context?: LogContext): void {
        this.parent.emergency(message, this.withModule(context));
    }
}

export const logger = new Logger();
