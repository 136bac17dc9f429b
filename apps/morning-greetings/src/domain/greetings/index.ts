/**
 * @fileoverview Greetings barrel exports
 *
 * @module domain/greetings
 */

export {
    generateMessage,
    generateGreeting,
    renderGreeting,
    DEFAULT_GREETING_TEMPLATES,
    NAME_PLACEHOLDER,
    type GenerateMessageOptions,
    type GeneratedMessage,
} from "./messageGenerator.js";
