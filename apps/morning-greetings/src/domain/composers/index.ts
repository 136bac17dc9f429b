/**
 * @fileoverview Composer barrel exports
 *
 * @module domain/composers
 */

export { GreetingComposerPlugin, type GreetingComposerConfig } from "./GreetingComposer.js";
