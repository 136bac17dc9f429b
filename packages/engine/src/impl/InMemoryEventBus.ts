/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-memory event bus for single-process runs.
 *
 * @module @daybreak/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { describeError, silentLogger, type Logger } from "../contracts/Logger.js";

/**
 * In-memory EventBus implementation.
 *
 * Handlers for the exact type run first, then "*" handlers. A handler that
 * throws is reported to the logger and does not stop the others.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus({ logger });
 *
 * bus.subscribe("recipient:delivered", (event) => {
 *     console.log("Delivered:", event.data);
 * });
 *
 * bus.emit(createEvent("recipient:delivered", { recipientId: "Ada" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: Logger;

    constructor(options: { logger?: Logger } = {}) {
        this.logger = options.logger ?? silentLogger;
    }

    emit(event: EventPayload): void {
        this.dispatch(event.type, event);
        this.dispatch("*", event);
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }

        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });

        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined) {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers registered for a type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(key: string, event: EventPayload): void {
        const handlers = this.handlers.get(key);
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe mid-iteration
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("EventBus handler error", {
                    eventType: event.type,
                    key,
                    error    : describeError(error),
                });
            }
        }
    }
}
