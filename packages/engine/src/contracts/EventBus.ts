/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for observing a dispatch run. The engine emits an
 * event at each stage; the CLI and tests subscribe to them.
 *
 * - Synchronous dispatch, in-memory only
 * - Ordering is preserved within a single event type
 *
 * @module @daybreak/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID of the dispatch run */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Run-level events.
 */
export type DispatchEventType =
    | "dispatch:starting"
    | "dispatch:completed"
    | "dispatch:error";

/**
 * Per-recipient events.
 */
export type RecipientEventType =
    | "recipient:composed"
    | "recipient:uncomposed"
    | "recipient:composeFailed"
    | "recipient:waiting"
    | "recipient:delivered"
    | "recipient:deliveryFailed";

/**
 * All known event types. Custom string types are allowed for plugins.
 */
export type EventType = DispatchEventType | RecipientEventType | (string & {});

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("recipient:delivered", (event) => {
 *     console.log("Delivered:", event.data);
 * });
 *
 * bus.emit(createEvent("recipient:delivered", { recipientId: "Ada" }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type, or "*" for all events.
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to the next event of a type only.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a type ("*" removes only wildcard handlers),
     * or every subscription when omitted.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Build an event payload stamped with the current time.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional trace ID
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
