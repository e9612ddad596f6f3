/**
 * Logger Contract
 *
 * Every component takes an optional logger through its config and falls
 * back to the console-backed default.
 */

/**
 * Logger interface shared by the engine and its domains.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Log levels in increasing severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const kLEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info : 1,
    warn : 2,
    error: 3,
};

/**
 * Type guard for log level strings (config and env input).
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && value in kLEVEL_ORDER;
}

/**
 * Create a console logger that drops messages below `minLevel`.
 *
 * @param minLevel - Lowest level that is printed
 */
export function createConsoleLogger(minLevel: LogLevel = "info"): EngineLogger {
    const enabled = (level: LogLevel): boolean => kLEVEL_ORDER[level] >= kLEVEL_ORDER[minLevel];

    return {
        debug: (msg, data) => enabled("debug") && console.debug(`[DEBUG] ${msg}`, data ?? ""),
        info : (msg, data) => enabled("info") && console.info(`[INFO] ${msg}`, data ?? ""),
        warn : (msg, data) => enabled("warn") && console.warn(`[WARN] ${msg}`, data ?? ""),
        error: (msg, data) => enabled("error") && console.error(`[ERROR] ${msg}`, data ?? ""),
    };
}

/**
 * Default console logger.
 */
export const defaultLogger: EngineLogger = createConsoleLogger("debug");

/**
 * Wrap a logger so every message carries a `[prefix]` tag.
 *
 * @param logger - Underlying logger
 * @param prefix - Component identifier, e.g. a task or source id
 */
export function createPrefixedLogger(logger: EngineLogger, prefix: string): EngineLogger {
    return {
        debug: (msg, data) => logger.debug(`[${prefix}] ${msg}`, data),
        info : (msg, data) => logger.info(`[${prefix}] ${msg}`, data),
        warn : (msg, data) => logger.warn(`[${prefix}] ${msg}`, data),
        error: (msg, data) => logger.error(`[${prefix}] ${msg}`, data),
    };
}
