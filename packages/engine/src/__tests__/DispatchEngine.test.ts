/**
 * @fileoverview Unit tests for DispatchEngine
 *
 * Tests cover:
 * - Domain registration
 * - Send order by recipient sendAt
 * - Composer ordering (first message wins)
 * - Per-recipient failure isolation
 * - Pacing between send times
 * - Event emission and provider lifecycle
 *
 * @module @daybreak/engine/__tests__/DispatchEngine
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DispatchEngine, type DomainRegistration } from "../engine/DispatchEngine.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { Recipient } from "../contracts/Recipient.js";
import type { RecipientProvider } from "../contracts/RecipientProvider.js";
import type { ComposerPlugin, ComposedMessage } from "../contracts/ComposerPlugin.js";
import type { DeliveryPlugin, DeliveryContext, DeliveryResult } from "../contracts/DeliveryPlugin.js";
import type { EventPayload } from "../contracts/EventBus.js";

/**
 * Create a recipient for testing
 */
function createRecipient(name: string, sendAt: string): Recipient<object> {
    return {
        id      : name,
        name,
        address : `${name.toLowerCase()}@example.com`,
        sendAt,
        metadata: {},
    };
}

/**
 * Create a mock provider returning a fixed recipient list
 */
function createMockProvider(recipients: Recipient<object>[] = []) {
    return {
        id           : "mock-provider",
        name         : "Mock Provider",
        initialize   : vi.fn().mockResolvedValue(undefined),
        shutdown     : vi.fn().mockResolvedValue(undefined),
        getRecipients: vi.fn().mockResolvedValue(recipients),
    } satisfies RecipientProvider<Recipient<object>>;
}

/**
 * Create a composer that greets every recipient by name
 */
function createGreetingComposer(id = "greeter"): ComposerPlugin {
    return {
        id,
        compose: vi.fn((recipient: Recipient<object>): ComposedMessage => ({
            body      : `Hello ${recipient.name}`,
            templateId: "hello",
        })),
    };
}

/**
 * Create a delivery plugin that records the recipient order
 */
function createRecordingDelivery(id = "recorder") {
    const delivered: string[] = [];
    const plugin: DeliveryPlugin = {
        id,
        deliver: vi.fn(async (context: DeliveryContext): Promise<DeliveryResult> => {
            delivered.push(context.recipient.id);
            return { deliveryId: id, success: true };
        }),
    };
    return { plugin, delivered };
}

function createDomain(overrides: Partial<DomainRegistration> = {}): DomainRegistration {
    return {
        id        : "test-domain",
        name      : "Test Domain",
        provider  : createMockProvider(),
        composers : [],
        deliveries: [],
        ...overrides,
    };
}

describe("DispatchEngine", () => {
    let engine: DispatchEngine;
    let eventBus: InMemoryEventBus;
    let logger: {
        debug: ReturnType<typeof vi.fn>;
        info : ReturnType<typeof vi.fn>;
        warn : ReturnType<typeof vi.fn>;
        error: ReturnType<typeof vi.fn>;
    };

    beforeEach(() => {
        eventBus = new InMemoryEventBus();
        logger = {
            debug: vi.fn(),
            info : vi.fn(),
            warn : vi.fn(),
            error: vi.fn(),
        };
        engine = new DispatchEngine({ eventBus, logger });
    });

    describe("domain registration", () => {
        // Scenario: Duplicate domain registration throws
        it("should throw when registering duplicate domain ID", () => {
            const domain = createDomain();

            engine.registerDomain(domain);

            expect(() => engine.registerDomain(domain)).toThrow("Domain already registered: test-domain");
        });

        // Scenario: Unregister allows re-registration
        it("should allow registering again after unregister", () => {
            const domain = createDomain();

            engine.registerDomain(domain);
            engine.unregisterDomain("test-domain");

            expect(() => engine.registerDomain(domain)).not.toThrow();
        });

        // Scenario: Domain without delivery plugins is flagged
        it("should warn when a domain has no delivery plugins", () => {
            engine.registerDomain(createDomain());

            expect(logger.warn).toHaveBeenCalledWith(
                "Domain has no delivery plugins; messages will be composed only",
                { domainId: "test-domain" }
            );
        });

        // Scenario: Running an unknown domain
        it("should reject when running an unknown domain", async () => {
            await expect(engine.runDomain("missing")).rejects.toThrow("Domain not registered: missing");
        });
    });

    describe("send order", () => {
        // Scenario: Messages are delivered by ascending sendAt
        it("should deliver in ascending sendAt order", async () => {
            const { plugin, delivered } = createRecordingDelivery();
            engine.registerDomain(createDomain({
                provider: createMockProvider([
                    createRecipient("Cleo", "0900"),
                    createRecipient("Ari", "0700"),
                    createRecipient("Bo", "0800"),
                ]),
                composers : [createGreetingComposer()],
                deliveries: [plugin],
            }));

            const summary = await engine.runDomain("test-domain");

            expect(delivered).toEqual(["Ari", "Bo", "Cleo"]);
            expect(summary).toMatchObject({
                domainId  : "test-domain",
                recipients: 3,
                composed  : 3,
                skipped   : 0,
                delivered : 3,
                failed    : 0,
            });
        });

        // Scenario: Equal send times keep provider order
        it("should keep provider order for equal sendAt values", async () => {
            const { plugin, delivered } = createRecordingDelivery();
            engine.registerDomain(createDomain({
                provider: createMockProvider([
                    createRecipient("Zed", "0800"),
                    createRecipient("Amy", "0800"),
                    createRecipient("Max", "0600"),
                ]),
                composers : [createGreetingComposer()],
                deliveries: [plugin],
            }));

            await engine.runDomain("test-domain");

            expect(delivered).toEqual(["Max", "Zed", "Amy"]);
        });

        // Scenario: Delivery receives the composed body
        it("should pass the composed message to delivery plugins", async () => {
            const { plugin } = createRecordingDelivery();
            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700")]),
                composers : [createGreetingComposer()],
                deliveries: [plugin],
                config    : { channel: "test" },
            }));

            await engine.runDomain("test-domain");

            expect(plugin.deliver).toHaveBeenCalledWith(expect.objectContaining({
                recipient: expect.objectContaining({ id: "Ari", address: "ari@example.com" }),
                message  : { body: "Hello Ari", templateId: "hello" },
                config   : { channel: "test" },
            }));
        });
    });

    describe("composers", () => {
        // Scenario: First composer with a message wins
        it("should use the first composer that returns a message", async () => {
            const deferring: ComposerPlugin = { id: "deferring", compose: vi.fn(() => null) };
            const winning: ComposerPlugin = { id: "winning", compose: vi.fn(() => ({ body: "from winning" })) };
            const unused = createGreetingComposer("unused");
            const { plugin } = createRecordingDelivery();

            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700")]),
                composers : [deferring, winning, unused],
                deliveries: [plugin],
            }));

            await engine.runDomain("test-domain");

            expect(deferring.compose).toHaveBeenCalledTimes(1);
            expect(unused.compose).not.toHaveBeenCalled();
            expect(plugin.deliver).toHaveBeenCalledWith(expect.objectContaining({
                message: { body: "from winning" },
            }));
        });

        // Scenario: No composer has an opinion
        it("should skip recipients no composer handles", async () => {
            const uncomposed = vi.fn();
            eventBus.subscribe("recipient:uncomposed", uncomposed);
            const { plugin, delivered } = createRecordingDelivery();

            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700")]),
                composers : [{ id: "deferring", compose: () => null }],
                deliveries: [plugin],
            }));

            const summary = await engine.runDomain("test-domain");

            expect(delivered).toEqual([]);
            expect(summary.skipped).toBe(1);
            expect(summary.failed).toBe(0);
            expect(uncomposed).toHaveBeenCalledTimes(1);
        });

        // Scenario: A composer error skips only that recipient
        it("should continue with other recipients when composing fails", async () => {
            const failed = vi.fn();
            eventBus.subscribe("recipient:composeFailed", failed);
            const { plugin, delivered } = createRecordingDelivery();

            const composer: ComposerPlugin = {
                id: "picky",
                compose(recipient) {
                    if (recipient.name === "Bo") {
                        throw new Error("cannot greet Bo");
                    }
                    return { body: `Hi ${recipient.name}` };
                },
            };

            engine.registerDomain(createDomain({
                provider: createMockProvider([
                    createRecipient("Ari", "0700"),
                    createRecipient("Bo", "0800"),
                    createRecipient("Cleo", "0900"),
                ]),
                composers : [composer],
                deliveries: [plugin],
            }));

            const summary = await engine.runDomain("test-domain");

            expect(delivered).toEqual(["Ari", "Cleo"]);
            expect(summary).toMatchObject({ recipients: 3, composed: 2, delivered: 2, failed: 1 });

            const event: EventPayload = failed.mock.calls[0][0];
            expect(event.data).toEqual({
                domainId   : "test-domain",
                recipientId: "Bo",
                error      : "cannot greet Bo",
            });
        });
    });

    describe("delivery", () => {
        // Scenario: A throwing delivery does not stop the batch
        it("should continue the batch when a delivery throws", async () => {
            const failed = vi.fn();
            eventBus.subscribe("recipient:deliveryFailed", failed);
            const seen: string[] = [];

            const flaky: DeliveryPlugin = {
                id: "flaky",
                async deliver(context) {
                    seen.push(context.recipient.id);
                    if (context.recipient.id === "Ari") {
                        throw new Error("boom");
                    }
                    return { deliveryId: "flaky", success: true };
                },
            };

            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700"), createRecipient("Bo", "0800")]),
                composers : [createGreetingComposer()],
                deliveries: [flaky],
            }));

            const summary = await engine.runDomain("test-domain");

            expect(seen).toEqual(["Ari", "Bo"]);
            expect(summary).toMatchObject({ delivered: 1, failed: 1 });
            expect(failed.mock.calls[0][0].data).toEqual({
                domainId   : "test-domain",
                recipientId: "Ari",
                deliveryId : "flaky",
                error      : "boom",
            });
            expect(logger.error).toHaveBeenCalledWith("Failed to deliver message", {
                domainId   : "test-domain",
                recipientId: "Ari",
                deliveryId : "flaky",
                error      : "boom",
            });
        });

        // Scenario: An unsuccessful result counts as a failure
        it("should count unsuccessful results as failures", async () => {
            const refusing: DeliveryPlugin = {
                id     : "refusing",
                deliver: vi.fn().mockResolvedValue({ deliveryId: "refusing", success: false, error: "rejected" }),
            };

            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700")]),
                composers : [createGreetingComposer()],
                deliveries: [refusing],
            }));

            const summary = await engine.runDomain("test-domain");

            expect(summary).toMatchObject({ composed: 1, delivered: 0, failed: 1 });
        });

        // Scenario: Every delivery plugin gets every message
        it("should hand each message to every delivery plugin", async () => {
            const first = createRecordingDelivery("first");
            const second = createRecordingDelivery("second");

            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700"), createRecipient("Bo", "0600")]),
                composers : [createGreetingComposer()],
                deliveries: [first.plugin, second.plugin],
            }));

            await engine.runDomain("test-domain");

            expect(first.delivered).toEqual(["Bo", "Ari"]);
            expect(second.delivered).toEqual(["Bo", "Ari"]);
        });
    });

    describe("provider lifecycle", () => {
        // Scenario: Provider initialized and shut down around a run
        it("should initialize and shut down the provider", async () => {
            const provider = createMockProvider([createRecipient("Ari", "0700")]);
            engine.registerDomain(createDomain({ provider }));

            await engine.runDomain("test-domain");

            expect(provider.initialize).toHaveBeenCalledTimes(1);
            expect(provider.getRecipients).toHaveBeenCalledTimes(1);
            expect(provider.shutdown).toHaveBeenCalledTimes(1);
        });

        // Scenario: Provider failure aborts the run
        it("should reject and emit dispatch:error when the provider fails", async () => {
            const errorHandler = vi.fn();
            eventBus.subscribe("dispatch:error", errorHandler);

            const provider = createMockProvider();
            provider.initialize.mockRejectedValue(new Error("Init failed"));
            engine.registerDomain(createDomain({ provider }));

            await expect(engine.runDomain("test-domain")).rejects.toThrow("Init failed");

            expect(errorHandler).toHaveBeenCalledTimes(1);
            expect(provider.getRecipients).not.toHaveBeenCalled();
            expect(provider.shutdown).toHaveBeenCalledTimes(1);
        });

        // Scenario: run() covers every registered domain
        it("should run every registered domain in order", async () => {
            engine.registerDomain(createDomain({ id: "first" }));
            engine.registerDomain(createDomain({ id: "second" }));

            const summaries = await engine.run();

            expect(summaries.map((s) => s.domainId)).toEqual(["first", "second"]);
        });

        // Scenario: Completion event carries the summary
        it("should emit dispatch:starting and dispatch:completed", async () => {
            const types: string[] = [];
            eventBus.subscribe("*", (event) => types.push(event.type));
            const { plugin } = createRecordingDelivery();

            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700")]),
                composers : [createGreetingComposer()],
                deliveries: [plugin],
            }));

            const summary = await engine.runDomain("test-domain");

            expect(types).toEqual([
                "dispatch:starting",
                "recipient:composed",
                "recipient:delivered",
                "dispatch:completed",
            ]);
            expect(summary.traceId).toMatch(/^dr_/);
        });
    });

    describe("pacing", () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        // Scenario: Wait only when the send time advances
        it("should wait sendInterval before a later send time", async () => {
            const paced = new DispatchEngine({ eventBus, logger, sendInterval: 3000 });
            const waiting = vi.fn();
            eventBus.subscribe("recipient:waiting", waiting);
            const { plugin, delivered } = createRecordingDelivery();

            paced.registerDomain(createDomain({
                provider: createMockProvider([
                    createRecipient("Cleo", "0800"),
                    createRecipient("Ari", "0700"),
                    createRecipient("Bo", "0700"),
                ]),
                composers : [createGreetingComposer()],
                deliveries: [plugin],
            }));

            const run = paced.runDomain("test-domain");
            await vi.runAllTimersAsync();
            const summary = await run;

            expect(delivered).toEqual(["Ari", "Bo", "Cleo"]);
            expect(summary.delivered).toBe(3);
            expect(waiting).toHaveBeenCalledTimes(1);
            expect(waiting.mock.calls[0][0].data).toEqual({
                domainId   : "test-domain",
                recipientId: "Cleo",
                waitMs     : 3000,
            });
        });

        // Scenario: No pacing by default
        it("should not wait when sendInterval is zero", async () => {
            const waiting = vi.fn();
            eventBus.subscribe("recipient:waiting", waiting);
            const { plugin, delivered } = createRecordingDelivery();

            engine.registerDomain(createDomain({
                provider  : createMockProvider([createRecipient("Ari", "0700"), createRecipient("Bo", "0800")]),
                composers : [createGreetingComposer()],
                deliveries: [plugin],
            }));

            await engine.runDomain("test-domain");

            expect(delivered).toEqual(["Ari", "Bo"]);
            expect(waiting).not.toHaveBeenCalled();
        });
    });
});
