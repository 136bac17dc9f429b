/**
 * @fileoverview Contract barrel exports
 *
 * All domain-agnostic interfaces and types that define
 * the dispatch engine contract.
 *
 * @module @daybreak/engine/contracts
 */

// Recipient contract
export type { Recipient } from "./Recipient.js";

// Logger contract
export type { Logger, LogLevel } from "./Logger.js";
export { LOG_LEVELS, silentLogger, describeError } from "./Logger.js";

// Composer plugin contract
export type {
    ComposerPlugin,
    ComposeContext,
    ComposedMessage,
} from "./ComposerPlugin.js";
export { isComposerPlugin } from "./ComposerPlugin.js";

// Delivery plugin contract
export type {
    DeliveryPlugin,
    DeliveryContext,
    DeliveryResult,
} from "./DeliveryPlugin.js";
export { isDeliveryPlugin } from "./DeliveryPlugin.js";

// RecipientProvider contract
export type { RecipientProvider } from "./RecipientProvider.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    DispatchEventType,
    RecipientEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
