/**
 * @fileoverview Transports barrel exports
 *
 * @module domain/delivery/transports
 */

export { ConsoleTransport, type WriteLine } from "./ConsoleTransport.js";
export { SmtpTransport, type SmtpTransportConfig } from "./SmtpTransport.js";
