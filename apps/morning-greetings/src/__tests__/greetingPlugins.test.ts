/**
 * @fileoverview Unit tests for the greetings domain plugins
 *
 * Tests cover:
 * - ContactStoreProvider recipient mapping
 * - GreetingComposerPlugin
 * - SendGreetingDeliveryPlugin results
 *
 * @module domain/__tests__/greetingPlugins
 */

import { describe, it, expect, vi } from "vitest";
import type { ComposeContext, ComposerPlugin, DeliveryContext, Recipient } from "@daybreak/engine";
import { ContactStore } from "../domain/contacts/ContactStore.js";
import { ContactStoreProvider } from "../domain/providers/ContactStoreProvider.js";
import { GreetingComposerPlugin } from "../domain/composers/GreetingComposer.js";
import { SendGreetingDeliveryPlugin } from "../domain/actions/SendGreetingAction.js";
import { MessageSender, type MessageTransport } from "../domain/delivery/MessageSender.js";
import { InvalidFieldError } from "../domain/errors.js";

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function createRecipient(overrides: Partial<Recipient<object>> = {}): Recipient<object> {
    return {
        id      : "Ada",
        name    : "Ada",
        address : "ada@example.com",
        sendAt  : "0700",
        metadata: {},
        ...overrides,
    };
}

function createComposeContext(): ComposeContext {
    return { config: {}, logger: createMockLogger(), traceId: "dr_test" };
}

function createDeliveryContext(recipient: Recipient<object>, body: string): DeliveryContext {
    return {
        recipient,
        message: { body },
        config : {},
        logger : createMockLogger(),
        traceId: "dr_test",
    };
}

describe("ContactStoreProvider", () => {
    // Scenario: Contacts become recipients keyed by name
    it("should map each contact to a recipient", async () => {
        const store = new ContactStore();
        store.add("Ada", "ada@example.com", "0700");
        store.add("Bob", "bob@x.com", "0600");

        const recipients = await new ContactStoreProvider(store).getRecipients();

        expect(recipients).toEqual([
            {
                type    : "contact",
                id      : "Ada",
                name    : "Ada",
                address : "ada@example.com",
                sendAt  : "0700",
                metadata: { preferredTime: "0700" },
            },
            {
                type    : "contact",
                id      : "Bob",
                name    : "Bob",
                address : "bob@x.com",
                sendAt  : "0600",
                metadata: { preferredTime: "0600" },
            },
        ]);
    });

    // Scenario: Store changes after a snapshot do not leak into it
    it("should snapshot contacts at call time", async () => {
        const store = new ContactStore();
        store.add("Ada", "ada@example.com", "0700");
        const provider = new ContactStoreProvider(store);

        const recipients = await provider.getRecipients();
        store.modify("Ada", { preferredTime: "0900" });

        expect(recipients[0].sendAt).toBe("0700");
    });
});

describe("GreetingComposerPlugin", () => {
    // Scenario: Template chosen by the random source
    it("should compose a greeting with the template id", () => {
        const composer = new GreetingComposerPlugin({ random: () => 0.5 });

        expect(composer.compose(createRecipient())).toEqual({
            body      : "Good day, Ada",
            templateId: "greeting#2",
        });
    });

    it("should use configured templates", () => {
        const composer = new GreetingComposerPlugin({ templates: ["Morning, {name}."], random: () => 0 });

        expect(composer.compose(createRecipient({ name: "Bob" })).body).toBe("Morning, Bob.");
    });

    // Scenario: Unnamed recipient
    it("should throw InvalidFieldError for a recipient without a name", () => {
        const composer = new GreetingComposerPlugin();

        expect(() => composer.compose(createRecipient({ name: "" }))).toThrow(InvalidFieldError);
    });

    it("should satisfy the engine call shape", async () => {
        const composer: ComposerPlugin = new GreetingComposerPlugin({ random: () => 0 });

        const message = await composer.compose(createRecipient(), createComposeContext());

        expect(message?.body).toBe("Good Morning, Ada! Have a great day.....!");
    });
});

describe("SendGreetingDeliveryPlugin", () => {
    function createPlugin() {
        const transport = {
            id  : "mock",
            send: vi.fn<MessageTransport["send"]>().mockResolvedValue(undefined),
        };
        return { transport, plugin: new SendGreetingDeliveryPlugin(new MessageSender({ transport })) };
    }

    // Scenario: Successful hand-off
    it("should send to the recipient address and report success", async () => {
        const { transport, plugin } = createPlugin();

        const result = await plugin.deliver(createDeliveryContext(createRecipient(), "Good day, Ada"));

        expect(transport.send).toHaveBeenCalledWith("ada@example.com", "Good day, Ada");
        expect(result).toEqual({
            deliveryId: "send-greeting",
            success   : true,
            data      : { address: "ada@example.com" },
        });
    });

    // Scenario: Validation failure becomes a failed result
    it("should report an invalid address as a failure", async () => {
        const { transport, plugin } = createPlugin();

        const result = await plugin.deliver(createDeliveryContext(createRecipient({ address: "bad-email" }), "hi"));

        expect(transport.send).not.toHaveBeenCalled();
        expect(result).toEqual({
            deliveryId: "send-greeting",
            success   : false,
            error     : 'Invalid email address: "bad-email"',
        });
    });

    // Scenario: Transport failure becomes a failed result
    it("should report a transport error as a failure", async () => {
        const { transport, plugin } = createPlugin();
        transport.send.mockRejectedValueOnce(new Error("mailbox full"));

        const result = await plugin.deliver(createDeliveryContext(createRecipient(), "hi"));

        expect(result).toEqual({ deliveryId: "send-greeting", success: false, error: "mailbox full" });
    });
});
