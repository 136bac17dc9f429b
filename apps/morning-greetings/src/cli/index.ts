/**
 * @fileoverview CLI barrel exports
 *
 * @module cli
 */

export {
    createProgram,
    parseCliOptions,
    modesFromCli,
    sourcesFromCli,
    type CliOptions,
} from "./program.js";
