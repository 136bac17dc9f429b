/**
 * Logger Contract
 *
 * A single logging capability injected into the engine, its plugins and
 * the domain components. Nothing in the engine reaches for a global logger.
 */

/**
 * Structured logger with one method per level.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Log levels ordered from most to least verbose.
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
    debug: () => {},
    info : () => {},
    warn : () => {},
    error: () => {},
};

/**
 * Extract a printable message from anything that was thrown.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
