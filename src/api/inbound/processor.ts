/**
 * Inbound SMS webhook pipeline.
 *
 *   verify signature -> parse -> resolve contact -> [lock] dedupe, guard, transition [unlock]
 *   -> compose -> [lock] re-check, send [unlock]
 *
 * Reply generation runs outside the contact lock so a STOP arriving meanwhile is
 * applied immediately; the re-check then withholds the stale reply.
 */

import { z } from 'zod';
import type { AuditLog } from '../audit/service.ts';
import { AuditActors } from '../audit/types.ts';
import type { ComplianceGuard } from '../compliance/guard.ts';
import type { ComplianceService } from '../compliance/service.ts';
import type { ComposedReply, ReplyComposer } from '../composer/composer.ts';
import type { ContactLocks } from '../conversation/lock.ts';
import type { ConversationStateMachine } from '../conversation/state-machine.ts';
import type { Contact, ConversationState, ConversationStore } from '../conversation/types.ts';
import { InvalidTransitionError, UnknownContactError } from '../errors.ts';
import { createLogger } from '../logger.ts';
import type { DeliveryOutcome, OutboundSender } from '../messaging/sender.ts';
import { isE164, normalizePhoneNumber } from '../twilio/phone-utils.ts';
import { emptyTwiml, messageTwiml } from '../twilio/twiml.ts';
import { isValidTwilioSignature, type WebhookParams } from '../webhooks/verification.ts';

const log = createLogger('inbound');

const DEFAULT_HISTORY_LIMIT = 20;

export const InboundSmsSchema = z
  .object({
    From: z.string().trim().min(1, 'From is required'),
    Body: z.string(),
    MessageSid: z.string().min(1).optional(),
    SmsSid: z.string().min(1).optional(),
  })
  .refine((payload) => Boolean(payload.MessageSid || payload.SmsSid), { message: 'MessageSid is required', path: ['MessageSid'] });

export interface InboundRequest {
  /** Full URL the carrier signed */
  url: string;
  params: WebhookParams;
  signature: string | undefined;
}

export type InboundResult =
  | { kind: 'rejected'; reason: string }
  | { kind: 'malformed'; issues: string[] }
  | { kind: 'unknown_contact'; phone: string }
  | { kind: 'duplicate'; contactId: string; carrierMessageId: string; twiml: string }
  | { kind: 'opted_out'; contactId: string; confirmation: DeliveryOutcome; twiml: string }
  | { kind: 'no_reply'; contactId: string; state: ConversationState; reason: string; twiml: string }
  | {
      kind: 'replied';
      contactId: string;
      state: ConversationState;
      outcome: DeliveryOutcome | 'blocked';
      reply: ComposedReply;
      twiml: string;
    };

export interface InboundProcessorDeps {
  store: ConversationStore;
  locks: ContactLocks;
  machine: ConversationStateMachine;
  guard: ComplianceGuard;
  compliance: ComplianceService;
  composer: ReplyComposer;
  sender: OutboundSender;
  audit: AuditLog;
  /** Shared webhook secret; null fails every request closed */
  secret: string | null;
  historyLimit?: number;
}

/** Outcome of the locked guard/transition phase. */
type Admission =
  | { phase: 'done'; result: InboundResult }
  | { phase: 'reply'; contact: Contact };

export class InboundProcessor {
  constructor(private readonly deps: InboundProcessorDeps) {}

  async handle(request: InboundRequest): Promise<InboundResult> {
    const { store, audit } = this.deps;

    if (
      !isValidTwilioSignature({
        url: request.url,
        params: request.params,
        signature: request.signature,
        secret: this.deps.secret,
      })
    ) {
      const reason = !this.deps.secret
        ? 'webhook secret not configured'
        : request.signature
          ? 'signature mismatch'
          : 'missing signature';
      await audit.recordRejection({ source: 'twilio', reason, url: request.url, phone: request.params.From ?? null });
      return { kind: 'rejected', reason };
    }

    const parsed = InboundSmsSchema.safeParse(request.params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      log.warn('Malformed inbound webhook', { issues });
      return { kind: 'malformed', issues };
    }

    const phone = normalizePhoneNumber(parsed.data.From);
    if (!isE164(phone)) {
      log.warn('Inbound sender is not a phone number', { from: parsed.data.From });
      return { kind: 'malformed', issues: ['From: not a valid phone number'] };
    }
    const body = parsed.data.Body;
    const carrierMessageId = parsed.data.MessageSid ?? parsed.data.SmsSid ?? '';

    let contact: Contact;
    try {
      contact = await this.resolveContact(phone);
    } catch (error) {
      if (error instanceof UnknownContactError) {
        log.warn('Inbound from unknown number', { phone });
        return { kind: 'unknown_contact', phone };
      }
      throw error;
    }

    const admission = await this.deps.locks.run(contact.id, () => this.admit(contact.id, body, carrierMessageId));
    if (admission.phase === 'done') {
      return admission.result;
    }

    const committed = admission.contact;
    const history = await audit.history(committed.id, this.deps.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    const reply = await this.deps.composer.compose(committed, history, committed.state);

    return this.deps.locks.run<InboundResult>(committed.id, async () => {
      const fresh = await store.findContactById(committed.id);
      if (!fresh || fresh.version !== committed.version) {
        const state = fresh?.state ?? committed.state;
        const detail = state === 'stop' ? 'contact opted out before send' : 'superseded by a newer transition';
        log.info('Reply withheld', { contactId: committed.id, detail });
        await audit.append({
          contact_id: committed.id,
          direction: 'out',
          body: reply.text,
          state,
          outcome: 'blocked',
          actor: AuditActors.system,
          detail,
        });
        return { kind: 'replied', contactId: committed.id, state, outcome: 'blocked', reply, twiml: emptyTwiml() };
      }

      const delivery = await this.deps.sender.deliver({
        contact: fresh,
        body: reply.text,
        state: fresh.state,
        actor: AuditActors.system,
      });
      return {
        kind: 'replied',
        contactId: fresh.id,
        state: fresh.state,
        outcome: delivery.outcome,
        reply,
        twiml: emptyTwiml(),
      };
    });
  }

  /**
   * Existing contact, or a new one in `start` for a known service customer.
   * There is no anonymous onboarding.
   */
  private async resolveContact(phone: string): Promise<Contact> {
    const existing = await this.deps.store.findContactByPhone(phone);
    if (existing) {
      return existing;
    }

    const customer = await this.deps.store.findServiceCustomer(phone);
    if (!customer) {
      throw new UnknownContactError(phone);
    }

    const created = await this.deps.store.createContact(customer);
    log.info('Contact created from service customer', { contactId: created.id });
    return created;
  }

  /** Runs under the contact lock. */
  private async admit(contactId: string, body: string, carrierMessageId: string): Promise<Admission> {
    const { store, audit, guard, machine, compliance } = this.deps;

    const duplicate = await store.findInboundTurnByCarrierId(carrierMessageId);
    if (duplicate) {
      log.info('Duplicate inbound message ignored', { contactId, carrierMessageId });
      return { phase: 'done', result: { kind: 'duplicate', contactId, carrierMessageId, twiml: emptyTwiml() } };
    }

    const contact = await store.findContactById(contactId);
    if (!contact) {
      throw new Error(`Contact ${contactId} disappeared`);
    }

    if (guard.evaluate(contact, body).isOptOut) {
      const outcome = await compliance.applyOptOut(contact, {
        actor: AuditActors.system,
        delivery: 'response',
        inbound: { body, carrierMessageId },
      });
      return {
        phase: 'done',
        result: {
          kind: 'opted_out',
          contactId,
          confirmation: outcome.confirmation.outcome,
          twiml: outcome.responseText ? messageTwiml(outcome.responseText) : emptyTwiml(),
        },
      };
    }

    try {
      const applied = await machine.apply(contact, 'inbound-reply', undefined, {
        direction: 'in',
        body,
        outcome: 'received',
        actor: AuditActors.customer,
        carrier_message_id: carrierMessageId,
        detail: null,
      });
      return { phase: 'reply', contact: applied.contact };
    } catch (error) {
      if (!(error instanceof InvalidTransitionError)) {
        throw error;
      }
      log.warn('Inbound message does not advance the conversation', { contactId, state: contact.state });
      await audit.append({
        contact_id: contactId,
        direction: 'in',
        body,
        state: contact.state,
        outcome: 'received',
        actor: AuditActors.customer,
        carrier_message_id: carrierMessageId,
        detail: error.message,
      });
      return {
        phase: 'done',
        result: { kind: 'no_reply', contactId, state: contact.state, reason: error.message, twiml: emptyTwiml() },
      };
    }
  }
}
