/**
 * @fileoverview Contact Store
 *
 * Ordered, in-memory collection of validated contacts keyed by name.
 *
 * Every field is validated before the collection changes, so an invalid
 * contact is never stored. Re-adding an existing name is a logged no-op,
 * while removing or modifying a missing name throws.
 *
 * @module domain/contacts/ContactStore
 */

import { silentLogger, type Logger } from "@daybreak/engine";
import {
    DEFAULT_PREFERRED_TIME,
    formatContact,
    type Contact,
} from "../entities/Contact.js";
import { ContactNotFoundError, DuplicateContactError } from "../errors.js";
import {
    validateEmail,
    validateName,
    validateTime,
} from "../validation/contactValidator.js";

export interface ContactStoreOptions {
    readonly logger?: Logger;
}

/**
 * Fields accepted by {@link ContactStore.modify}. Omitted fields are kept.
 */
export interface ContactChanges {
    readonly name?: string;
    readonly email?: string;
    readonly preferredTime?: string;
}

/**
 * @example
 * ```typescript
 * const store = new ContactStore({ logger });
 *
 * store.add("Ada", "ada@example.com", "0700");
 * store.add("Ada", "other@example.com");        // warning, ignored
 * store.modify("Ada", { preferredTime: "0900" });
 * store.remove("Ada");
 * ```
 */
export class ContactStore {
    private readonly contacts: Contact[] = [];
    private readonly logger: Logger;

    constructor(options: ContactStoreOptions = {}) {
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Add a contact.
     *
     * Checks run in order (name, duplicate, email, time) and stop at the
     * first failure. A duplicate name is logged and skipped.
     *
     * @throws InvalidFieldError if a field is empty or malformed
     */
    add(name: string, email: string, preferredTime: string = DEFAULT_PREFERRED_TIME): void {
        validateName(name);

        if (this.indexOf(name) !== -1) {
            this.logger.warn("Skipping duplicate contact", {
                name,
                reason: new DuplicateContactError(name).message,
            });
            return;
        }

        validateEmail(email);
        validateTime(preferredTime);

        const contact: Contact = { name, email, preferredTime };
        this.contacts.push(contact);

        this.logger.info("Added contact", { ...contact });
    }

    /**
     * Look up a contact by name.
     *
     * @returns The stored record itself (changes to it are visible in the
     *   store), or undefined when no contact has that name
     */
    get(name: string): Contact | undefined {
        return this.contacts.find((contact) => contact.name === name);
    }

    /**
     * Change some fields of an existing contact.
     *
     * All supplied fields are validated before any of them is applied.
     *
     * @throws ContactNotFoundError if no contact is named `name`
     * @throws InvalidFieldError if a supplied field is malformed
     * @throws DuplicateContactError if renaming onto another contact's name
     */
    modify(name: string, changes: ContactChanges): void {
        const contact = this.get(name);
        if (!contact) {
            throw new ContactNotFoundError(name);
        }

        if (changes.name !== undefined) {
            validateName(changes.name);
            if (changes.name !== name && this.indexOf(changes.name) !== -1) {
                throw new DuplicateContactError(changes.name);
            }
        }
        if (changes.email !== undefined) {
            validateEmail(changes.email);
        }
        if (changes.preferredTime !== undefined) {
            validateTime(changes.preferredTime);
        }

        contact.name          = changes.name ?? contact.name;
        contact.email         = changes.email ?? contact.email;
        contact.preferredTime = changes.preferredTime ?? contact.preferredTime;

        this.logger.info("Modified contact", { previousName: name, ...contact });
    }

    /**
     * Remove a contact by name.
     *
     * @throws ContactNotFoundError if no contact is named `name`
     */
    remove(name: string): void {
        const index = this.indexOf(name);
        if (index === -1) {
            throw new ContactNotFoundError(name);
        }

        this.contacts.splice(index, 1);
        this.logger.info("Removed contact", { name });
    }

    /**
     * All contacts in insertion order. The array is a copy; the records are not.
     */
    list(): Contact[] {
        return [...this.contacts];
    }

    isEmpty(): boolean {
        return this.contacts.length === 0;
    }

    get size(): number {
        return this.contacts.length;
    }

    /**
     * One `Name: ..., Email: ..., Preferred Time: ...` line per contact.
     */
    format(): string {
        return this.contacts.map((contact) => `${formatContact(contact)}\n`).join("");
    }

    toString(): string {
        return this.format();
    }

    private indexOf(name: string): number {
        return this.contacts.findIndex((contact) => contact.name === name);
    }
}
