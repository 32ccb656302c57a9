/**
 * Returns the current timestamp in ISO format.
 * @returns string - Current ISO timestamp
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

// Numeric severity per level (higher is more severe)
const LEVEL_SEVERITY: Record<LogLevel, number> = {
    [LogLevel.Debug]: 0,
    [LogLevel.Info]: 1,
    [LogLevel.Warning]: 2,
    [LogLevel.Error]: 3,
    [LogLevel.Critical]: 4,
};

/** Config spelling of log levels, as accepted in `logLevel`. */
export type ConfigLogLevel = `debug` | `info` | `warn` | `error`;

const CONFIG_LEVELS: Record<ConfigLogLevel, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warning,
    error: LogLevel.Error,
};

function IsConfigLevel(level: string): level is ConfigLogLevel {
    return Object.prototype.hasOwnProperty.call(CONFIG_LEVELS, level);
}

let threshold: LogLevel = LogLevel.Info; // messages below this level are dropped

/**
 * Sets the minimum level that reaches the console.
 * @param level LogLevel | ConfigLogLevel - Level enum or its config spelling ('debug'|'info'|'warn'|'error')
 * @example
 * SetLogThreshold('warn');
 */
export function SetLogThreshold(level: LogLevel | ConfigLogLevel): void {
    threshold = IsConfigLevel(level) ? CONFIG_LEVELS[level] : level;
}

/** Current minimum level. */
export function GetLogThreshold(): LogLevel {
    return threshold;
}

/**
 * Logs a message at the specified log level, prepending a timestamp and the source.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier (class or module name)
 * @param context string - Optional context (project id, operation)
 * @example
 * log(LogLevel.Info, 'Project HAM_1 created', 'ProjectStore');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (LEVEL_SEVERITY[level] < LEVEL_SEVERITY[threshold]) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

/**
 * Shorthand helpers per level.
 */
export namespace log {
    /**
     * Logs a critical level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /** Logs an error level message. */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /** Logs a warning level message. */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /** Logs an informational level message. */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /** Logs a debug level message. */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
