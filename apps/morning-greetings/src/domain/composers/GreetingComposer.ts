/**
 * @fileoverview Greeting composer
 *
 * Built-in ComposerPlugin: every recipient gets a random greeting from
 * the configured templates. It never defers, so it is registered last.
 *
 * @module domain/composers/GreetingComposer
 */

import type { ComposedMessage, ComposerPlugin, Recipient } from "@daybreak/engine";
import {
    DEFAULT_GREETING_TEMPLATES,
    generateGreeting,
} from "../greetings/messageGenerator.js";

export interface GreetingComposerConfig {
    /** Templates with a `{name}` placeholder (default: built-in greetings) */
    readonly templates?: readonly string[];

    /** Uniform random source in [0, 1) */
    readonly random?: () => number;
}

export class GreetingComposerPlugin implements ComposerPlugin {
    readonly id          = "greeting";
    readonly name        = "Morning Greeting";
    readonly description = "Picks a random greeting template for each contact";

    private readonly templates: readonly string[];
    private readonly random: () => number;

    constructor(config: GreetingComposerConfig = {}) {
        this.templates = config.templates ?? DEFAULT_GREETING_TEMPLATES;
        this.random    = config.random ?? Math.random;
    }

    /**
     * @throws InvalidFieldError if the recipient has no name
     */
    compose(recipient: Recipient<object>): ComposedMessage {
        const { body, templateIndex } = generateGreeting(recipient.name, {
            templates: this.templates,
            random   : this.random,
        });

        return { body, templateId: `${this.id}#${templateIndex}` };
    }
}
