/**
 * @fileoverview Console transport
 *
 * Default transport: prints the message instead of sending it.
 *
 * @module domain/delivery/transports/ConsoleTransport
 */

import type { MessageTransport } from "../MessageSender.js";

export type WriteLine = (line: string) => void;

export class ConsoleTransport implements MessageTransport {
    readonly id = "console";

    private readonly write: WriteLine;

    constructor(write: WriteLine = (line) => console.log(line)) {
        this.write = write;
    }

    async send(recipientEmail: string, body: string): Promise<void> {
        this.write(`Sending message to ${recipientEmail}: ${body}`);
    }
}
