/**
 * @fileoverview Contact management barrel exports
 *
 * @module domain/contacts
 */

export { ContactStore, type ContactStoreOptions, type ContactChanges } from "./ContactStore.js";
export {
    importModes,
    importModeFromBits,
    importModeToBits,
    ImportModeBit,
    NO_IMPORT,
    type ImportModes,
} from "./importMode.js";
export {
    buildContactStore,
    type ContactSources,
    type BuildContactStoreOptions,
} from "./buildContactStore.js";
export * from "./importers/index.js";
