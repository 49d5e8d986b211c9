/**
 * Twilio-backed message gateway.
 */

import type Twilio from 'twilio';
import { GatewayError } from '../errors.ts';
import { createLogger, errorMessage } from '../logger.ts';
import { createTwilioClient, type TwilioConfig } from './config.ts';
import type { E164PhoneNumber, GatewaySendResult, MessageGateway } from './types.ts';

const log = createLogger('twilio');

export interface TwilioGatewayOptions {
  /** Injected in tests; defaults to a client built from the config */
  client?: Pick<Twilio.Twilio, 'messages'>;
}

export class TwilioGateway implements MessageGateway {
  private readonly client: Pick<Twilio.Twilio, 'messages'>;

  constructor(
    private readonly config: TwilioConfig,
    options: TwilioGatewayOptions = {},
  ) {
    this.client = options.client ?? createTwilioClient(config);
  }

  /** Deadlines are applied by the caller (OutboundSender). */
  async send(toPhone: E164PhoneNumber, text: string): Promise<GatewaySendResult> {
    try {
      const message = await this.client.messages.create({
        to: toPhone,
        body: text,
        ...(this.config.messagingServiceSid
          ? { messagingServiceSid: this.config.messagingServiceSid }
          : { from: this.config.fromNumber ?? undefined }),
      });
      log.info('SMS accepted', { to: toPhone, sid: message.sid, status: message.status });
      return { carrierMessageId: message.sid };
    } catch (error) {
      throw new GatewayError(`Twilio send failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
