/**
 * Composer Plugin Contract
 *
 * Plugins that turn a recipient into a message body.
 * The engine asks composers in registration order; the first one
 * that returns a message wins.
 *
 * Design principles:
 * - Pure: No delivery side effects, no recipient mutation
 * - Optional: A composer returns null when it has no opinion
 * - Strict: A composer throws when the recipient cannot be greeted at all
 */

import type { Recipient } from "./Recipient.js";
import type { Logger } from "./Logger.js";

/**
 * Message produced by a composer.
 */
export interface ComposedMessage {
    /** Message body handed to delivery plugins */
    readonly body: string;

    /** Identifier of the template or strategy that produced the body */
    readonly templateId?: string;
}

/**
 * Context provided to composer plugins.
 */
export interface ComposeContext {
    /**
     * Read-only configuration for the plugin.
     * Domain-specific settings passed during registration.
     */
    readonly config: Readonly<Record<string, unknown>>;

    /**
     * Logger for the plugin.
     */
    readonly logger: Logger;

    /**
     * Unique trace ID for this dispatch run.
     * Use for correlation in logs and events.
     */
    readonly traceId: string;
}

/**
 * Composer Plugin interface.
 *
 * @example
 * ```typescript
 * const birthdayComposer: ComposerPlugin = {
 *     id: "birthday",
 *     compose(recipient) {
 *         if (!isBirthday(recipient)) {
 *             return null;
 *         }
 *         return { body: `Happy birthday, ${recipient.name}!` };
 *     }
 * };
 * ```
 */
export interface ComposerPlugin {
    /**
     * Unique identifier for this plugin.
     */
    readonly id: string;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Optional description of what this plugin does.
     */
    readonly description?: string;

    /**
     * Compose a message for a recipient.
     *
     * @param recipient - The recipient to address (read-only)
     * @param context - Compose context (config, logger, traceId)
     * @returns ComposedMessage, or null to defer to the next composer
     */
    compose(
        recipient: Recipient<object>,
        context: ComposeContext
    ): Promise<ComposedMessage | null> | ComposedMessage | null;
}

/**
 * Type guard to check if an object is a ComposerPlugin.
 *
 * @param obj - The object to check
 * @returns True if the object implements ComposerPlugin
 */
export function isComposerPlugin(obj: unknown): obj is ComposerPlugin {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "compose" in obj &&
        typeof obj.compose === "function"
    );
}
