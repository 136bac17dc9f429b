/**
 * Delivery Plugin Contract
 *
 * Plugins that hand a composed message to a transport.
 * Every registered delivery plugin receives every composed message.
 *
 * Design principles:
 * - Validating: Reject bad input before anything leaves the process
 * - Focused: Delivery plugins only deliver, they do not compose
 */

import type { Recipient } from "./Recipient.js";
import type { ComposedMessage } from "./ComposerPlugin.js";
import type { Logger } from "./Logger.js";

/**
 * Context provided to delivery plugins during execution.
 */
export interface DeliveryContext {
    /**
     * The recipient being addressed (read-only).
     */
    readonly recipient: Recipient<object>;

    /**
     * The message to deliver.
     */
    readonly message: ComposedMessage;

    /**
     * Read-only configuration for the plugin.
     */
    readonly config: Readonly<Record<string, unknown>>;

    /**
     * Logger for the plugin.
     */
    readonly logger: Logger;

    /**
     * Unique trace ID for this dispatch run.
     */
    readonly traceId: string;
}

/**
 * Result of a delivery attempt.
 */
export interface DeliveryResult {
    /**
     * Identifier of the delivery plugin.
     */
    readonly deliveryId: string;

    /**
     * Whether the message was handed to the transport.
     */
    readonly success: boolean;

    /**
     * Error message if the delivery failed.
     */
    readonly error?: string;

    /**
     * Optional output data from the transport.
     */
    readonly data?: Record<string, unknown>;
}

/**
 * Delivery Plugin interface.
 *
 * A plugin may either resolve with `success: false` or throw; the
 * engine treats both as a failed delivery for that recipient only.
 *
 * @example
 * ```typescript
 * const logDelivery: DeliveryPlugin = {
 *     id: "log",
 *     async deliver(context) {
 *         console.log(`${context.recipient.address}: ${context.message.body}`);
 *         return { deliveryId: this.id, success: true };
 *     }
 * };
 * ```
 */
export interface DeliveryPlugin {
    /**
     * Unique identifier for this delivery plugin.
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
     * Deliver a composed message.
     *
     * @param context - Execution context (recipient, message, config, etc.)
     * @returns Result of the delivery
     */
    deliver(context: DeliveryContext): Promise<DeliveryResult>;
}

/**
 * Type guard to check if an object is a DeliveryPlugin.
 *
 * @param obj - The object to check
 * @returns True if the object implements DeliveryPlugin
 */
export function isDeliveryPlugin(obj: unknown): obj is DeliveryPlugin {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "deliver" in obj &&
        typeof obj.deliver === "function"
    );
}
