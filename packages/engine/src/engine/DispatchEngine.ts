/**
 * @fileoverview DispatchEngine
 *
 * The orchestration engine: turns a provider's recipients into composed
 * messages and hands them to delivery plugins in send order.
 *
 * Pipeline flow for one domain:
 * 1. Provider initialized, recipients fetched
 * 2. Composers asked in order, first non-null message wins
 * 3. Composed messages sorted by recipient sendAt
 * 4. Every delivery plugin receives every message, paced by sendInterval
 *
 * A failure for one recipient is logged and emitted; the run continues
 * with the next recipient.
 *
 * @module @daybreak/engine/engine/DispatchEngine
 */

import type { Recipient } from "../contracts/Recipient.js";
import type { RecipientProvider } from "../contracts/RecipientProvider.js";
import type {
    ComposerPlugin,
    ComposeContext,
    ComposedMessage,
} from "../contracts/ComposerPlugin.js";
import type {
    DeliveryPlugin,
    DeliveryContext,
    DeliveryResult,
} from "../contracts/DeliveryPlugin.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { describeError, type Logger } from "../contracts/Logger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * Domain registration - all components needed for a domain.
 */
export interface DomainRegistration {
    /** Unique identifier for this domain */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Recipient provider for this domain */
    readonly provider: RecipientProvider<Recipient<object>>;

    /** Composer plugins, asked in order */
    readonly composers: readonly ComposerPlugin[];

    /** Delivery plugins, each receives every composed message */
    readonly deliveries: readonly DeliveryPlugin[];

    /** Optional domain-specific configuration passed to plugins */
    readonly config?: Record<string, unknown>;
}

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /**
     * Delay in milliseconds before a message whose sendAt is later than the
     * previous one's (default: 0, no pacing)
     */
    readonly sendInterval?: number;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: Logger;
}

/**
 * Outcome of one dispatch run for one domain.
 */
export interface DispatchSummary {
    readonly domainId: string;
    readonly traceId: string;

    /** Recipients returned by the provider */
    readonly recipients: number;

    /** Recipients a composer produced a message for */
    readonly composed: number;

    /** Recipients no composer had an opinion about */
    readonly skipped: number;

    /** Recipients every delivery plugin accepted */
    readonly delivered: number;

    /** Recipients that failed to compose or to deliver */
    readonly failed: number;
}

/**
 * Default console logger.
 */
const defaultLogger: Logger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Generate a unique trace ID for a dispatch run.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `dr_${timestamp}_${random}`;
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * A recipient paired with the message composed for it.
 */
interface PendingMessage {
    readonly recipient: Recipient<object>;
    readonly message: ComposedMessage;
    readonly composerId: string;
}

/**
 * DispatchEngine - composes and delivers one message per recipient.
 *
 * @example
 * ```typescript
 * const engine = new DispatchEngine({ sendInterval: 3000 });
 *
 * engine.registerDomain({
 *     id: "greetings",
 *     name: "Morning Greetings",
 *     provider: new ContactStoreProvider(store),
 *     composers: [new TemplateGreetingComposer()],
 *     deliveries: [new SendGreetingDelivery({ sender })],
 * });
 *
 * engine.eventBus.subscribe("recipient:delivered", (event) => {
 *     console.log("Delivered:", event.data);
 * });
 *
 * const [summary] = await engine.run();
 * ```
 */
export class DispatchEngine {
    private readonly sendInterval: number;
    private readonly logger: Logger;
    private readonly domains: Map<string, DomainRegistration> = new Map();

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        this.logger       = config.logger ?? defaultLogger;
        this.eventBus     = config.eventBus ?? new InMemoryEventBus({ logger: this.logger });
        this.sendInterval = Math.max(0, config.sendInterval ?? 0);
    }

    /**
     * Register a domain with the engine.
     *
     * @throws Error if a domain with the same ID is already registered
     */
    registerDomain(domain: DomainRegistration): void {
        if (this.domains.has(domain.id)) {
            throw new Error(`Domain already registered: ${domain.id}`);
        }

        this.domains.set(domain.id, domain);
        this.logger.info("Domain registered", {
            domainId  : domain.id,
            name      : domain.name,
            composers : domain.composers.length,
            deliveries: domain.deliveries.length,
        });

        if (domain.deliveries.length === 0) {
            this.logger.warn("Domain has no delivery plugins; messages will be composed only", {
                domainId: domain.id,
            });
        }
    }

    /**
     * Unregister a domain from the engine.
     */
    unregisterDomain(domainId: string): void {
        if (this.domains.delete(domainId)) {
            this.logger.info("Domain unregistered", { domainId });
        }
    }

    /**
     * Run every registered domain once, in registration order.
     */
    async run(): Promise<DispatchSummary[]> {
        const summaries: DispatchSummary[] = [];

        for (const domainId of this.domains.keys()) {
            summaries.push(await this.runDomain(domainId));
        }

        return summaries;
    }

    /**
     * Run a single domain once.
     *
     * @throws Error if the domain is unknown, or if its provider fails to
     *   initialize or to list recipients
     */
    async runDomain(domainId: string): Promise<DispatchSummary> {
        const domain = this.domains.get(domainId);
        if (!domain) {
            throw new Error(`Domain not registered: ${domainId}`);
        }

        const traceId = generateTraceId();

        this.emit(createEvent("dispatch:starting", { domainId }, traceId));

        let recipients: readonly Recipient<object>[];
        try {
            if (domain.provider.initialize) {
                await domain.provider.initialize();
            }
            recipients = await domain.provider.getRecipients();
        }
        catch (error) {
            this.logger.error("Recipient provider failed", {
                domainId,
                providerId: domain.provider.id,
                error     : describeError(error),
            });
            this.emit(createEvent("dispatch:error", {
                domainId,
                error: describeError(error),
            }, traceId));
            await this.shutdownProvider(domain);
            throw error;
        }

        this.logger.debug("Fetched recipients", { domainId, count: recipients.length });

        const pending: PendingMessage[] = [];
        let skipped = 0;
        let failed  = 0;

        for (const recipient of recipients) {
            try {
                const composed = await this.compose(domain, recipient, traceId);
                if (composed) {
                    pending.push(composed);
                }
                else {
                    skipped++;
                }
            }
            catch (error) {
                failed++;
                this.logger.error("Failed to compose message", {
                    domainId,
                    recipientId: recipient.id,
                    error      : describeError(error),
                });
                this.emit(createEvent("recipient:composeFailed", {
                    domainId,
                    recipientId: recipient.id,
                    error      : describeError(error),
                }, traceId));
            }
        }

        // Array.prototype.sort is stable, so equal send times keep provider order
        pending.sort((a, b) => compareSendAt(a.recipient.sendAt, b.recipient.sendAt));

        let delivered = 0;
        let previousSendAt: string | null = null;

        for (const item of pending) {
            if (previousSendAt !== null && this.sendInterval > 0 &&
                compareSendAt(item.recipient.sendAt, previousSendAt) > 0) {
                this.logger.info("Too early to deliver, waiting", {
                    domainId,
                    recipientId: item.recipient.id,
                    sendAt     : item.recipient.sendAt,
                    waitMs     : this.sendInterval,
                });
                this.emit(createEvent("recipient:waiting", {
                    domainId,
                    recipientId: item.recipient.id,
                    waitMs     : this.sendInterval,
                }, traceId));
                await delay(this.sendInterval);
            }
            previousSendAt = item.recipient.sendAt;

            if (await this.deliver(domain, item, traceId)) {
                delivered++;
            }
            else {
                failed++;
            }
        }

        await this.shutdownProvider(domain);

        const summary: DispatchSummary = {
            domainId,
            traceId,
            recipients: recipients.length,
            composed  : pending.length,
            skipped,
            delivered,
            failed,
        };

        this.emit(createEvent("dispatch:completed", { ...summary }, traceId));
        this.logger.info("Dispatch completed", { ...summary });

        return summary;
    }

    /**
     * Ask composers in order until one returns a message.
     */
    private async compose(
        domain: DomainRegistration,
        recipient: Recipient<object>,
        traceId: string
    ): Promise<PendingMessage | null> {
        for (const composer of domain.composers) {
            const context: ComposeContext = {
                config: domain.config ?? {},
                logger: this.createPluginLogger(domain.id, composer.id, traceId),
                traceId,
            };

            const message = await composer.compose(recipient, context);
            if (message) {
                this.emit(createEvent("recipient:composed", {
                    domainId   : domain.id,
                    recipientId: recipient.id,
                    composerId : composer.id,
                    templateId : message.templateId,
                }, traceId));

                return { recipient, message, composerId: composer.id };
            }
        }

        this.emit(createEvent("recipient:uncomposed", {
            domainId   : domain.id,
            recipientId: recipient.id,
        }, traceId));
        this.logger.debug("No composer produced a message", {
            domainId   : domain.id,
            recipientId: recipient.id,
        });

        return null;
    }

    /**
     * Hand a message to every delivery plugin.
     *
     * @returns true when every plugin reported success
     */
    private async deliver(
        domain: DomainRegistration,
        item: PendingMessage,
        traceId: string
    ): Promise<boolean> {
        let allSucceeded = true;

        for (const delivery of domain.deliveries) {
            const context: DeliveryContext = {
                recipient: item.recipient,
                message  : item.message,
                config   : domain.config ?? {},
                logger   : this.createPluginLogger(domain.id, delivery.id, traceId),
                traceId,
            };

            let result: DeliveryResult;
            try {
                result = await delivery.deliver(context);
            }
            catch (error) {
                result = { deliveryId: delivery.id, success: false, error: describeError(error) };
            }

            if (result.success) {
                this.emit(createEvent("recipient:delivered", {
                    domainId   : domain.id,
                    recipientId: item.recipient.id,
                    deliveryId : delivery.id,
                }, traceId));
                continue;
            }

            allSucceeded = false;
            this.logger.error("Failed to deliver message", {
                domainId   : domain.id,
                recipientId: item.recipient.id,
                deliveryId : delivery.id,
                error      : result.error,
            });
            this.emit(createEvent("recipient:deliveryFailed", {
                domainId   : domain.id,
                recipientId: item.recipient.id,
                deliveryId : delivery.id,
                error      : result.error,
            }, traceId));
        }

        return allSucceeded;
    }

    private async shutdownProvider(domain: DomainRegistration): Promise<void> {
        if (!domain.provider.shutdown) {
            return;
        }

        try {
            await domain.provider.shutdown();
        }
        catch (error) {
            this.logger.error("Provider shutdown error", {
                domainId: domain.id,
                error   : describeError(error),
            });
        }
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Create a logger for a plugin (composer or delivery).
     */
    private createPluginLogger(domainId: string, pluginId: string, traceId: string): Logger {
        return {
            debug: (msg, data) => this.logger.debug(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
            info : (msg, data) => this.logger.info(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
            warn : (msg, data) => this.logger.warn(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
            error: (msg, data) => this.logger.error(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
        };
    }
}

function compareSendAt(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}
