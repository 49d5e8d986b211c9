/**
 * Twilio webhook and messaging types.
 */

/**
 * Normalized phone number in E.164 format.
 * Always starts with + followed by country code and number.
 */
export type E164PhoneNumber = string;

/** Accepted by the carrier for delivery. */
export interface GatewaySendResult {
  carrierMessageId: string;
}

/**
 * Carrier send boundary. Implementations throw GatewayError on any failure.
 */
export interface MessageGateway {
  send(toPhone: E164PhoneNumber, text: string): Promise<GatewaySendResult>;
}
