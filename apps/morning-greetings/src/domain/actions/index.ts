/**
 * @fileoverview Delivery plugin barrel exports
 *
 * @module domain/actions
 */

export { SendGreetingDeliveryPlugin } from "./SendGreetingAction.js";
