/**
 * @fileoverview Console logger
 *
 * Logger implementation for the app. Writes `[LEVEL] message` to the
 * console method of the same level and drops entries below the
 * configured level.
 *
 * @module logging/consoleLogger
 */

import { LOG_LEVELS, type Logger, type LogLevel } from "@daybreak/engine";

/**
 * Minimal console surface, so tests can pass a fake.
 */
export type ConsoleLike = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface ConsoleLoggerOptions {
    /** Lowest level written (default "info") */
    readonly level?: LogLevel;

    /** Text placed between the level tag and the message, e.g. "[cli]" */
    readonly prefix?: string;

    readonly console?: ConsoleLike;
}

/**
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.info("Contact store built", { contacts: 3 });
 * // [INFO] Contact store built { contacts: 3 }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
    const target: ConsoleLike = options.console ?? console;
    const prefix = options.prefix ? `${options.prefix} ` : "";

    const write = (level: LogLevel) => (message: string, data?: Record<string, unknown>): void => {
        if (LOG_LEVELS.indexOf(level) < threshold) {
            return;
        }

        const line = `[${level.toUpperCase()}] ${prefix}${message}`;
        if (data === undefined) {
            target[level](line);
        }
        else {
            target[level](line, data);
        }
    };

    return {
        debug: write("debug"),
        info : write("info"),
        warn : write("warn"),
        error: write("error"),
    };
}
