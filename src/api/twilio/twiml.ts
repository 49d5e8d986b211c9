/**
 * TwiML responses for the inbound SMS webhook.
 */

import Twilio from 'twilio';

/** Empty response: acknowledge without an automatic reply. */
export function emptyTwiml(): string {
  return new Twilio.twiml.MessagingResponse().toString();
}

/** Response that makes the carrier deliver `body` to the sender. */
export function messageTwiml(body: string): string {
  const response = new Twilio.twiml.MessagingResponse();
  response.message(body);
  return response.toString();
}
