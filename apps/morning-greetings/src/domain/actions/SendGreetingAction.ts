/**
 * @fileoverview Send Greeting Delivery Plugin
 *
 * Implements the DeliveryPlugin contract by handing each composed
 * greeting to a MessageSender.
 *
 * @module domain/actions/SendGreetingAction
 */

import {
    describeError,
    type DeliveryContext,
    type DeliveryPlugin,
    type DeliveryResult,
} from "@daybreak/engine";
import type { MessageSender } from "../delivery/MessageSender.js";

/**
 * @example
 * ```typescript
 * const delivery = new SendGreetingDeliveryPlugin(
 *     new MessageSender({ transport: new ConsoleTransport() }),
 * );
 * ```
 */
export class SendGreetingDeliveryPlugin implements DeliveryPlugin {
    readonly id          = "send-greeting";
    readonly name        = "Send Greeting";
    readonly description = "Delivers greetings through the configured transport";

    constructor(private readonly sender: MessageSender) {}

    async deliver(context: DeliveryContext): Promise<DeliveryResult> {
        const { recipient, message, logger } = context;

        try {
            await this.sender.send(recipient.address, message.body);
        }
        catch (error) {
            return {
                deliveryId: this.id,
                success   : false,
                error     : describeError(error),
            };
        }

        logger.debug("Greeting sent", {
            recipientId: recipient.id,
            address    : recipient.address,
        });

        return {
            deliveryId: this.id,
            success   : true,
            data      : { address: recipient.address },
        };
    }
}
