/**
 * @fileoverview Greeting generator
 *
 * Picks one greeting template at random and fills in the contact's name.
 *
 * @module domain/greetings/messageGenerator
 */

import { InvalidFieldError } from "../errors.js";

/**
 * Placeholder replaced by the recipient's name.
 */
export const NAME_PLACEHOLDER = "{name}";

export const DEFAULT_GREETING_TEMPLATES: readonly string[] = [
    "Good Morning, {name}! Have a great day.....!",
    "Hello {name}! Hope your day is fantastic!",
    "Good day, {name}",
    "Top of the morning {name}!",
    "Have a lovely day, {name} :)",
];

export interface GenerateMessageOptions {
    /** Templates to choose from (default: DEFAULT_GREETING_TEMPLATES) */
    readonly templates?: readonly string[];

    /** Uniform random source in [0, 1) (default: Math.random) */
    readonly random?: () => number;
}

/**
 * Result of picking a template, for callers that want to know which one.
 */
export interface GeneratedMessage {
    readonly body: string;
    readonly templateIndex: number;
}

/**
 * Fill every `{name}` placeholder of a template.
 */
export function renderGreeting(template: string, name: string): string {
    return template.split(NAME_PLACEHOLDER).join(name);
}

/**
 * Like {@link generateMessage}, also returning the chosen template's index.
 *
 * @throws InvalidFieldError if `name` is empty or no templates are given
 */
export function generateGreeting(name: string, options: GenerateMessageOptions = {}): GeneratedMessage {
    if (name.length === 0) {
        throw new InvalidFieldError("name", "Cannot greet a contact without a name");
    }

    const templates = options.templates ?? DEFAULT_GREETING_TEMPLATES;
    if (templates.length === 0) {
        throw new InvalidFieldError("body", "No greeting templates to choose from");
    }

    const random = options.random ?? Math.random;
    // Clamp guards a random source that returns exactly 1
    const templateIndex = Math.min(Math.floor(random() * templates.length), templates.length - 1);

    return {
        body: renderGreeting(templates[templateIndex], name),
        templateIndex,
    };
}

/**
 * Generate a greeting for `name` from a randomly chosen template.
 *
 * @example
 * ```typescript
 * generateMessage("Eve");
 * // e.g. "Top of the morning Eve!"
 * ```
 *
 * @throws InvalidFieldError if `name` is empty
 */
export function generateMessage(name: string, options: GenerateMessageOptions = {}): string {
    return generateGreeting(name, options).body;
}
