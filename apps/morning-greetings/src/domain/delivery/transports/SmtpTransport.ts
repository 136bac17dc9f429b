/**
 * @fileoverview SMTP transport
 *
 * Sends each greeting as a plain-text email through nodemailer.
 * The underlying transporter is created on first use and reused.
 *
 * @module domain/delivery/transports/SmtpTransport
 */

import nodemailer, { type Transporter } from "nodemailer";
import type { MessageTransport } from "../MessageSender.js";

export interface SmtpTransportConfig {
    readonly host: string;
    readonly port: number;
    readonly user?: string;
    readonly pass?: string;

    /** Sender address */
    readonly from: string;

    /** Subject line for every greeting */
    readonly subject: string;

    /** Use TLS from the start (default false) */
    readonly secure?: boolean;
}

/**
 * @example
 * ```typescript
 * const transport = new SmtpTransport({
 *     host   : "localhost",
 *     port   : 1025,
 *     from   : "greetings@example.test",
 *     subject: "Good morning!",
 * });
 * ```
 */
export class SmtpTransport implements MessageTransport {
    readonly id = "smtp";

    private readonly config: SmtpTransportConfig;
    private transporter: Transporter | null = null;

    constructor(config: SmtpTransportConfig) {
        this.config = config;
    }

    async send(recipientEmail: string, body: string): Promise<void> {
        await this.getTransporter().sendMail({
            from   : this.config.from,
            to     : recipientEmail,
            subject: this.config.subject,
            text   : body,
        });
    }

    /**
     * Close pooled connections, if any were opened.
     */
    close(): void {
        this.transporter?.close();
        this.transporter = null;
    }

    private getTransporter(): Transporter {
        if (this.transporter) {
            return this.transporter;
        }

        this.transporter = nodemailer.createTransport({
            host  : this.config.host,
            port  : this.config.port,
            secure: this.config.secure ?? false,
            auth  : this.config.user
                ? { user: this.config.user, pass: this.config.pass }
                : undefined,
        });

        return this.transporter;
    }
}
