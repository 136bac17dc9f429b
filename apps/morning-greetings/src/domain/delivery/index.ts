/**
 * @fileoverview Delivery barrel exports
 *
 * @module domain/delivery
 */

export {
    MessageSender,
    type MessageTransport,
    type MessageSenderOptions,
} from "./MessageSender.js";
export * from "./transports/index.js";
