/**
 * Logger Contract
 *
 * Minimal structured logger used across the core. Components accept a
 * logger in their config and fall back to {@link consoleLogger}.
 */

/**
 * Logger interface.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Log levels, most verbose first.
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Type guard for log levels read from config or the environment.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Default console logger.
 */
export const consoleLogger: Logger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Wrap a logger so messages below `minLevel` are dropped.
 *
 * @param minLevel - Least severe level to keep
 * @param target - Logger receiving the kept messages
 */
export function createLevelLogger(minLevel: LogLevel, target: Logger = consoleLogger): Logger {
    const threshold = LOG_LEVELS.indexOf(minLevel);
    const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

    return {
        debug: (msg, data) => {
            if (enabled("debug")) {
                target.debug(msg, data);
            }
        },
        info : (msg, data) => {
            if (enabled("info")) {
                target.info(msg, data);
            }
        },
        warn : (msg, data) => {
            if (enabled("warn")) {
                target.warn(msg, data);
            }
        },
        error: (msg, data) => {
            if (enabled("error")) {
                target.error(msg, data);
            }
        },
    };
}

/**
 * Prefix every message of a logger, e.g. with a step and runner id.
 */
export function createScopedLogger(scope: string, target: Logger, extra: Record<string, unknown> = {}): Logger {
    return {
        debug: (msg, data) => target.debug(`[${scope}] ${msg}`, { ...data, ...extra }),
        info : (msg, data) => target.info(`[${scope}] ${msg}`, { ...data, ...extra }),
        warn : (msg, data) => target.warn(`[${scope}] ${msg}`, { ...data, ...extra }),
        error: (msg, data) => target.error(`[${scope}] ${msg}`, { ...data, ...extra }),
    };
}
