/**
 * RecipientProvider Contract
 *
 * Recipient providers are passive data sources. The engine pulls the
 * full recipient list from the provider once per dispatch run.
 */

import type { Recipient } from "./Recipient.js";

/**
 * RecipientProvider interface.
 *
 * Providers are responsible for:
 * - Connecting to data sources (in-memory store, file, API, etc.)
 * - Converting raw records to the Recipient shape
 *
 * @example
 * ```typescript
 * class StaticProvider implements RecipientProvider {
 *     readonly id = "static";
 *     readonly name = "Static Provider";
 *
 *     async getRecipients() {
 *         return [{ id: "1", name: "Ada", address: "ada@example.com", sendAt: "0700", metadata: {} }];
 *     }
 * }
 * ```
 */
export interface RecipientProvider<T extends Recipient<object> = Recipient> {
    /** Unique identifier for this provider */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Optional description */
    readonly description?: string;

    /**
     * Initialize the provider.
     * Called once before each dispatch run.
     */
    initialize?(): Promise<void>;

    /**
     * Fetch every recipient for this run, in the provider's own order.
     * The engine is responsible for sorting by send time.
     */
    getRecipients(): Promise<readonly T[]>;

    /**
     * Shutdown the provider.
     * Called once after each dispatch run, even when the run failed.
     */
    shutdown?(): Promise<void>;
}
