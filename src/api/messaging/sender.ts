/**
 * The single outbound path. Every automated or operator message passes through
 * `deliver()`, which applies the outbound toggle, the length ceiling and the gateway
 * deadline, and writes exactly one audit entry for the attempt.
 */

import type { AuditLog } from '../audit/service.ts';
import type { AuditEntry } from '../audit/types.ts';
import type { EngineConfig } from '../config.ts';
import type { Contact, ConversationState } from '../conversation/types.ts';
import { GatewayError } from '../errors.ts';
import { createLogger, errorMessage } from '../logger.ts';
import type { MessageGateway } from '../twilio/types.ts';
import { withTimeout } from '../utils/timeout.ts';

const log = createLogger('outbound');

export type DeliveryOutcome = 'sent' | 'suppressed' | 'failed';

export interface DeliverParams {
  contact: Contact;
  body: string;
  /** State at send time */
  state: ConversationState;
  actor: string;
}

export interface DeliveryResult {
  outcome: DeliveryOutcome;
  carrierMessageId: string | null;
  entry: AuditEntry;
}

export type SenderConfig = Pick<EngineConfig, 'outboundEnabled' | 'maxReplyLength' | 'gatewayTimeoutMs'>;

export class OutboundSender {
  constructor(
    private readonly gateway: MessageGateway,
    private readonly audit: AuditLog,
    private readonly config: SenderConfig,
  ) {}

  async deliver(params: DeliverParams): Promise<DeliveryResult> {
    const { contact, body, state, actor } = params;

    if (body.length > this.config.maxReplyLength) {
      log.error('Refusing to send overlong body', { contactId: contact.id, length: body.length });
      return this.record(params, 'failed', null, `body exceeds ${this.config.maxReplyLength} characters`);
    }

    if (!this.config.outboundEnabled) {
      log.info('Outbound disabled, message suppressed', { contactId: contact.id, state, actor });
      return this.record(params, 'suppressed', null, 'outbound disabled');
    }

    try {
      const result = await withTimeout(
        () => this.gateway.send(contact.phone, body),
        this.config.gatewayTimeoutMs,
        () => new GatewayError(`Gateway send timed out after ${this.config.gatewayTimeoutMs}ms`, { timedOut: true }),
      );
      return this.record(params, 'sent', result.carrierMessageId, null);
    } catch (error) {
      log.error('Gateway send failed', { contactId: contact.id, actor, error: errorMessage(error) });
      return this.record(params, 'failed', null, errorMessage(error));
    }
  }

  /**
   * Record a message carried in the webhook response instead of a gateway call.
   * It is subject to the same outbound toggle.
   */
  async recordInlineReply(params: DeliverParams): Promise<DeliveryResult> {
    if (!this.config.outboundEnabled) {
      log.info('Outbound disabled, inline reply suppressed', { contactId: params.contact.id });
      return this.record(params, 'suppressed', null, 'outbound disabled');
    }
    return this.record(params, 'sent', null, 'webhook response');
  }

  private async record(
    params: DeliverParams,
    outcome: DeliveryOutcome,
    carrierMessageId: string | null,
    detail: string | null,
  ): Promise<DeliveryResult> {
    const entry = await this.audit.append({
      contact_id: params.contact.id,
      direction: 'out',
      body: params.body,
      state: params.state,
      outcome,
      actor: params.actor,
      carrier_message_id: carrierMessageId,
      detail,
    });
    return { outcome, carrierMessageId, entry };
  }
}
