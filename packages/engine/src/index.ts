/**
 * @fileoverview Daybreak dispatch engine
 *
 * Domain-agnostic compose-and-deliver engine.
 *
 * The engine provides:
 * - Pull-based recipient listing from providers
 * - Composer plugins asked in order, first message wins
 * - Delivery plugins fed in send order, with optional pacing
 * - Events for every stage of a run
 *
 * @module @daybreak/engine
 * @example
 * ```typescript
 * import {
 *     type RecipientProvider,
 *     type ComposerPlugin,
 *     type DeliveryPlugin,
 *     DispatchEngine,
 * } from "@daybreak/engine";
 *
 * const engine = new DispatchEngine({ sendInterval: 3000, logger });
 * engine.registerDomain({ id, name, provider, composers, deliveries });
 * const summaries = await engine.run();
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    Recipient,
    RecipientProvider,
    Logger,
    LogLevel,
    ComposerPlugin,
    ComposeContext,
    ComposedMessage,
    DeliveryPlugin,
    DeliveryContext,
    DeliveryResult,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    DispatchEventType,
    RecipientEventType,
    Subscription,
} from "./contracts/index.js";
export {
    LOG_LEVELS,
    silentLogger,
    describeError,
    isComposerPlugin,
    isDeliveryPlugin,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    DispatchEngine,
    type DomainRegistration,
    type EngineConfig,
    type DispatchSummary,
} from "./engine/index.js";

// ============================================================================
// Plugin loader exports
// ============================================================================

export {
    PluginLoader,
    createComposerFromYaml,
    isYamlComposerDefinition,
    type YamlComposerDefinition,
    type LoadedPlugins,
    type PluginLoaderConfig,
} from "./plugins/index.js";
