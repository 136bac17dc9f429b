/**
 * @fileoverview Domain barrel exports
 *
 * All domain-specific implementations for the morning greetings app.
 *
 * @module domain
 */

export * from "./errors.js";
export * from "./validation/contactValidator.js";
export * from "./entities/index.js";
export * from "./contacts/index.js";
export * from "./greetings/index.js";
export * from "./delivery/index.js";
export * from "./providers/index.js";
export * from "./composers/index.js";
export * from "./actions/index.js";
