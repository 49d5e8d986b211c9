/**
 * Opt-out execution shared by the STOP keyword and the console's manual stop,
 * so both leave the same contact state and the same audit trail.
 */

import { AuditActors } from '../audit/types.ts';
import { OPT_OUT_CONFIRMATION } from '../composer/templates.ts';
import type { ConversationStateMachine } from '../conversation/state-machine.ts';
import type { Contact, ConversationState, TransitionTurn } from '../conversation/types.ts';
import { createLogger } from '../logger.ts';
import type { DeliveryResult, OutboundSender } from '../messaging/sender.ts';

const log = createLogger('compliance');

/**
 * response  confirmation rides in the webhook reply (keyword STOP)
 * gateway   confirmation is sent through the carrier API (console stop)
 */
export type ConfirmationDelivery = 'response' | 'gateway';

export interface OptOutOptions {
  actor: string;
  delivery: ConfirmationDelivery;
  /** The keyword message itself, committed with the transition and before the confirmation */
  inbound?: { body: string; carrierMessageId: string };
}

export interface OptOutResult {
  contact: Contact;
  previousState: ConversationState;
  confirmation: DeliveryResult;
  /** Text for the webhook reply, or null when nothing is to be carried in it */
  responseText: string | null;
}

export class ComplianceService {
  constructor(
    private readonly machine: ConversationStateMachine,
    private readonly sender: OutboundSender,
  ) {}

  /**
   * Move the contact to `stop` unconditionally and confirm exactly once.
   * Callers must hold the contact's lock.
   */
  async applyOptOut(contact: Contact, options: OptOutOptions): Promise<OptOutResult> {
    const inbound: TransitionTurn | undefined = options.inbound
      ? {
          direction: 'in',
          body: options.inbound.body,
          outcome: 'received',
          actor: AuditActors.customer,
          carrier_message_id: options.inbound.carrierMessageId,
          detail: null,
        }
      : undefined;
    const applied = await this.machine.apply(contact, 'opt-out', undefined, inbound);
    log.info('Contact opted out', {
      contactId: contact.id,
      from: applied.from,
      actor: options.actor,
      delivery: options.delivery,
    });

    const params = { contact: applied.contact, body: OPT_OUT_CONFIRMATION, state: applied.to, actor: options.actor };
    const confirmation =
      options.delivery === 'response' ? await this.sender.recordInlineReply(params) : await this.sender.deliver(params);

    return {
      contact: applied.contact,
      previousState: applied.from,
      confirmation,
      responseText: options.delivery === 'response' && confirmation.outcome === 'sent' ? OPT_OUT_CONFIRMATION : null,
    };
  }
}
