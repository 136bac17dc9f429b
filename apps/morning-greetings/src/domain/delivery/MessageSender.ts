/**
 * @fileoverview Delivery sink
 *
 * Validates a greeting's address and body, then hands both to a
 * MessageTransport. There is no acknowledgment and no retry: a rejected
 * transport promise propagates to the caller.
 *
 * @module domain/delivery/MessageSender
 */

import { silentLogger, type Logger } from "@daybreak/engine";
import { InvalidFieldError } from "../errors.js";
import { validateEmail } from "../validation/contactValidator.js";

/**
 * Whatever actually moves a message out of the process.
 */
export interface MessageTransport {
    /** Identifier used in logs */
    readonly id: string;

    send(recipientEmail: string, body: string): Promise<void>;
}

export interface MessageSenderOptions {
    readonly transport: MessageTransport;
    readonly logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const sender = new MessageSender({ transport: new ConsoleTransport() });
 * await sender.send("ada@example.com", "Good day, Ada");
 * ```
 */
export class MessageSender {
    private readonly transport: MessageTransport;
    private readonly logger: Logger;

    constructor(options: MessageSenderOptions) {
        this.transport = options.transport;
        this.logger    = options.logger ?? silentLogger;
    }

    /**
     * @throws InvalidFieldError if the email is empty or malformed, or the body is empty
     */
    async send(recipientEmail: string, body: string): Promise<void> {
        validateEmail(recipientEmail);

        if (body.length === 0) {
            throw new InvalidFieldError("body", "Message body must not be empty");
        }

        this.logger.debug("Handing message to transport", {
            transport: this.transport.id,
            recipientEmail,
        });

        await this.transport.send(recipientEmail, body);
    }
}
