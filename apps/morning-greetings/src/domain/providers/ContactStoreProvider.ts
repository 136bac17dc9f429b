/**
 * @fileoverview Contact store provider
 *
 * Implements the RecipientProvider contract over a ContactStore.
 * Each run snapshots the store as it is when the run starts.
 *
 * @module domain/providers/ContactStoreProvider
 */

import type { RecipientProvider } from "@daybreak/engine";
import type { ContactStore } from "../contacts/ContactStore.js";
import { toContactRecipient, type ContactRecipient } from "../entities/Contact.js";

/**
 * @example
 * ```typescript
 * const provider = new ContactStoreProvider(store);
 * const recipients = await provider.getRecipients();
 * ```
 */
export class ContactStoreProvider implements RecipientProvider<ContactRecipient> {
    readonly id          = "contact-store";
    readonly name        = "Contact Store";
    readonly description = "Provides the contacts imported for this run";

    constructor(private readonly store: ContactStore) {}

    async getRecipients(): Promise<readonly ContactRecipient[]> {
        return this.store.list().map(toContactRecipient);
    }
}
