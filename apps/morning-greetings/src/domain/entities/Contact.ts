/**
 * @fileoverview Contact Entity
 *
 * The greetings domain's only record, and its mapping onto the engine's
 * Recipient contract.
 *
 * @module domain/entities/Contact
 */

import type { Recipient } from "@daybreak/engine";

/**
 * A validated contact. Names are unique within a ContactStore.
 */
export interface Contact {
    name: string;
    email: string;

    /** Four digits, HHMM. Used only as the send-order key */
    preferredTime: string;
}

/**
 * Shape accepted by the LIST importer and the store's bulk helpers.
 */
export interface ContactInput {
    readonly name: string;
    readonly email: string;
    readonly preferredTime?: string;
}

/**
 * Preferred time used when a source does not give one.
 */
export const DEFAULT_PREFERRED_TIME = "0800";

export interface ContactRecipientMetadata {
    readonly preferredTime: string;
}

/**
 * Contact as seen by the dispatch engine.
 */
export interface ContactRecipient extends Recipient<ContactRecipientMetadata> {
    readonly type: "contact";
}

/**
 * Snapshot a contact as a recipient. The name is the recipient id.
 *
 * @example
 * ```typescript
 * toContactRecipient({ name: "Ada", email: "ada@example.com", preferredTime: "0700" });
 * // { type: "contact", id: "Ada", name: "Ada", address: "ada@example.com", sendAt: "0700", ... }
 * ```
 */
export function toContactRecipient(contact: Contact): ContactRecipient {
    return {
        type    : "contact",
        id      : contact.name,
        name    : contact.name,
        address : contact.email,
        sendAt  : contact.preferredTime,
        metadata: { preferredTime: contact.preferredTime },
    };
}

/**
 * Format a contact the way the CLI lists it.
 */
export function formatContact(contact: Contact): string {
    return `Name: ${contact.name}, Email: ${contact.email}, Preferred Time: ${contact.preferredTime}`;
}
