/**
 * @fileoverview Domain entities barrel exports
 *
 * @module domain/entities
 */

export {
    toContactRecipient,
    formatContact,
    DEFAULT_PREFERRED_TIME,
    type Contact,
    type ContactInput,
    type ContactRecipient,
    type ContactRecipientMetadata,
} from "./Contact.js";
