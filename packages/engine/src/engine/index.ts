/**
 * @fileoverview Engine barrel exports
 *
 * @module @daybreak/engine/engine
 */

export {
    DispatchEngine,
    type DomainRegistration,
    type EngineConfig,
    type DispatchSummary,
} from "./DispatchEngine.js";
