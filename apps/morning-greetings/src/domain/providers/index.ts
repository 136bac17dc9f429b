/**
 * @fileoverview Provider barrel exports
 *
 * @module domain/providers
 */

export { ContactStoreProvider } from "./ContactStoreProvider.js";
