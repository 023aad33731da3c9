/**
 * @fileoverview Logger Contract
 *
 * Structured logger used by the engine and by every pipeline stage.
 * Stages never call `console` directly; they receive a scoped logger
 * through their StageContext.
 *
 * @module @papertriage/engine/contracts/Logger
 */

/**
 * Severity levels, lowest first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const kLEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info : 20,
    warn : 30,
    error: 40,
};

/**
 * Logger interface shared by the engine and stages.
 */
export interface PipelineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Narrow an arbitrary string (usually from the environment) to a LogLevel.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && Object.prototype.hasOwnProperty.call(kLEVEL_ORDER, value);
}

/**
 * Create a console logger that drops messages below `minLevel`.
 *
 * With `stderrOnly`, every level goes to stderr so that stdout stays free
 * for a command's own output.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("warn");
 * logger.info("ignored");
 * logger.warn("Candidate dropped", { disciplineId: 4 });
 * // [WARN] Candidate dropped { disciplineId: 4 }
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = "info", stderrOnly = false): PipelineLogger {
    const threshold = kLEVEL_ORDER[minLevel];
    const enabled = (level: LogLevel): boolean => kLEVEL_ORDER[level] >= threshold;
    const out = (fallback: (...args: unknown[]) => void) => (stderrOnly ? console.error : fallback);

    return Object.freeze({
        debug: (msg: string, data?: Record<string, unknown>) => {
            if (enabled("debug")) out(console.debug)(`[DEBUG] ${msg}`, data ?? "");
        },
        info : (msg: string, data?: Record<string, unknown>) => {
            if (enabled("info")) out(console.info)(`[INFO] ${msg}`, data ?? "");
        },
        warn : (msg: string, data?: Record<string, unknown>) => {
            if (enabled("warn")) out(console.warn)(`[WARN] ${msg}`, data ?? "");
        },
        error: (msg: string, data?: Record<string, unknown>) => {
            if (enabled("error")) console.error(`[ERROR] ${msg}`, data ?? "");
        },
    });
}

/**
 * Logger that discards everything. Handy as a default in tests and tools.
 */
export const silentLogger: PipelineLogger = Object.freeze({
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
});

/**
 * Wrap a logger so every line carries a `[scope]` prefix and fixed fields.
 *
 * @param base - Logger to write to
 * @param scope - Prefix such as `classify:parser`
 * @param fields - Fields merged into every entry (e.g. the trace id)
 */
export function scopeLogger(
    base: PipelineLogger,
    scope: string,
    fields: Record<string, unknown> = {}
): PipelineLogger {
    return {
        debug: (msg, data) => base.debug(`[${scope}] ${msg}`, { ...data, ...fields }),
        info : (msg, data) => base.info(`[${scope}] ${msg}`, { ...data, ...fields }),
        warn : (msg, data) => base.warn(`[${scope}] ${msg}`, { ...data, ...fields }),
        error: (msg, data) => base.error(`[${scope}] ${msg}`, { ...data, ...fields }),
    };
}
