/**
 * @module core/logging
 * @description Diagnostic logging for simulation runs
 *
 * Every entry carries a fixed schema (version, task, seed, simulated time) so
 * that diagnostics from different runs can be compared side by side. The
 * simulation event log proper lives in `fog/event-log`; this module only
 * covers human-facing progress and warning output.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured fields attached to a log line
 */
export type LogFields = Record<string, unknown>;

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface LogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Task identifier */
    task: string;
    /** Random seed for reproducibility */
    seed: number;
    level: LogLevel;
    message: string;
    /** Simulated time, when the caller supplied one */
    time?: number;
    fields?: LogFields;
}

/**
 * Logger interface
 */
export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Task name */
    task: string;
    /** Random seed */
    seed: number;
    /** Minimum level that is recorded */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Whether `level` passes the `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Shared plumbing for the concrete loggers: level filtering and entry creation.
 */
abstract class BaseLogger implements Logger {
    protected readonly config: { task: string; seed: number; schemaVersion: string; level: LogLevel };

    constructor(config: LoggerConfig) {
        this.config = {
            task: config.task,
            seed: config.seed,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
            level: config.level ?? 'info',
        };
    }

    debug(message: string, fields?: LogFields): void {
        this.record('debug', message, fields);
    }

    info(message: string, fields?: LogFields): void {
        this.record('info', message, fields);
    }

    warn(message: string, fields?: LogFields): void {
        this.record('warn', message, fields);
    }

    error(message: string, fields?: LogFields): void {
        this.record('error', message, fields);
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }

    protected abstract write(entry: LogEntry): void;

    private record(level: LogLevel, message: string, fields?: LogFields): void {
        if (!isLevelEnabled(level, this.config.level)) {
            return;
        }
        const entry: LogEntry = {
            schemaVersion: this.config.schemaVersion,
            task: this.config.task,
            seed: this.config.seed,
            level,
            message,
        };
        if (fields !== undefined) {
            const { time, ...rest } = fields;
            if (typeof time === 'number') {
                entry.time = time;
            }
            if (Object.keys(rest).length > 0) {
                entry.fields = rest;
            }
        }
        this.write(entry);
    }
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console
 */
export class ConsoleLogger extends BaseLogger {
    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        super(typeof levelOrConfig === 'string'
            ? { task: 'unknown', seed: 0, level: levelOrConfig }
            : levelOrConfig);
    }

    protected write(entry: LogEntry): void {
        const prefix = entry.time !== undefined ? `TIME: ${entry.time.toFixed(2)} - ` : '';
        const line = `${prefix}${entry.message}`;
        switch (entry.level) {
            case 'error':
                console.error(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for dashboards that render diagnostics.
 */
export class MemoryLogger extends BaseLogger {
    public entries: LogEntry[] = [];

    constructor(config: LoggerConfig) {
        super({ level: 'debug', ...config });
    }

    protected write(entry: LogEntry): void {
        this.entries.push(entry);
    }

    /** Entries at exactly the given level */
    byLevel(level: LogLevel): LogEntry[] {
        return this.entries.filter(entry => entry.level === level);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.entries.map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.entries = [];
    }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    debug(message: string, fields?: LogFields): void {
        for (const logger of this.loggers) {
            logger.debug(message, fields);
        }
    }

    info(message: string, fields?: LogFields): void {
        for (const logger of this.loggers) {
            logger.info(message, fields);
        }
    }

    warn(message: string, fields?: LogFields): void {
        for (const logger of this.loggers) {
            logger.warn(message, fields);
        }
    }

    error(message: string, fields?: LogFields): void {
        for (const logger of this.loggers) {
            logger.error(message, fields);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Silent Logger ====================

/**
 * Discards everything. Default for library callers that pass no logger.
 */
export class SilentLogger implements Logger {
    debug(): void { /* no-op */ }
    info(): void { /* no-op */ }
    warn(): void { /* no-op */ }
    error(): void { /* no-op */ }
    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory' | 'silent',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
        case 'silent':
            return new SilentLogger();
    }
}
