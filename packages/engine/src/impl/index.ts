/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @daybreak/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
