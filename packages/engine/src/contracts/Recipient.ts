/**
 * Recipient Contract
 *
 * The base shape of anything the dispatch engine can address a message to.
 * Domain implementations extend this with domain-specific metadata.
 *
 * Recipients are read-only within the engine. Composers and delivery
 * plugins receive recipients but cannot mutate them.
 */

/**
 * Base recipient that all domain recipients must satisfy.
 *
 * @typeParam TMetadata - Domain-specific metadata type
 *
 * @example
 * ```typescript
 * interface ContactMetadata {
 *     source: "csv" | "json";
 * }
 *
 * interface ContactRecipient extends Recipient<ContactMetadata> {}
 * ```
 */
export interface Recipient<TMetadata extends object = Record<string, unknown>> {
    /** Unique identifier for this recipient within its provider */
    readonly id: string;

    /** Display name, used by composers to personalize messages */
    readonly name: string;

    /** Delivery address (email, phone number, handle) */
    readonly address: string;

    /**
     * Sort key for the send order. Compared as a string, so fixed-width
     * values such as "0700" or ISO timestamps order correctly.
     */
    readonly sendAt: string;

    /** Domain-specific metadata */
    readonly metadata: TMetadata;
}

