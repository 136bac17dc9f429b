/**
 * @fileoverview Logging barrel exports
 *
 * @module logging
 */

export {
    createConsoleLogger,
    type ConsoleLike,
    type ConsoleLoggerOptions,
} from "./consoleLogger.js";
