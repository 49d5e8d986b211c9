/**
 * Conversation domain types.
 * Property names on persisted records use snake_case to match the table columns.
 */

import type { E164PhoneNumber } from '../twilio/types.ts';

export const CONVERSATION_STATES = ['start', 'interested', 'action_sqft', 'follow_up', 'pause', 'stop', 'done'] as const;
export type ConversationState = (typeof CONVERSATION_STATES)[number];

/** States no automated send may target. */
export const TERMINAL_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>(['stop', 'done']);

export const TRIGGERS = ['inbound-reply', 'opt-out', 'opt-in', 'manual-override', 'scheduled-follow-up'] as const;
export type Trigger = (typeof TRIGGERS)[number];

/** Triggers whose edges come from the configured transition table. */
export const AUTOMATED_TRIGGERS = ['inbound-reply', 'scheduled-follow-up'] as const;
export type AutomatedTrigger = (typeof AUTOMATED_TRIGGERS)[number];

export function isConversationState(value: string): value is ConversationState {
  return (CONVERSATION_STATES as readonly string[]).includes(value);
}

export function isTerminalState(state: ConversationState): boolean {
  return TERMINAL_STATES.has(state);
}

/** Mid-conversation: counted against a campaign's maxActive cap. */
export function isActiveState(state: ConversationState): boolean {
  return state !== 'start' && !isTerminalState(state);
}

/** Entering one of these states sets `was_interested` on the contact for good. */
export function marksInterest(state: ConversationState): boolean {
  return state === 'interested' || state === 'action_sqft';
}

export interface Contact {
  id: string;
  phone: E164PhoneNumber;
  state: ConversationState;
  display_name: string;
  last_service: string | null;
  days_since_service: number | null;
  cancelled: boolean;
  was_interested: boolean;
  /** Bumped on every state change; used for optimistic concurrency */
  version: number;
  created_at: Date;
  updated_at: Date;
}

/** Read-only customer record owned by the business system. */
export interface ServiceCustomer {
  phone: E164PhoneNumber;
  display_name: string;
  last_service: string | null;
  days_since_service: number | null;
  cancelled: boolean;
}

export type TurnDirection = 'in' | 'out';

/**
 * received   inbound message recorded
 * sent       accepted by the carrier (or carried in the webhook reply)
 * suppressed fully processed, not transmitted because outbound is disabled
 * failed     gateway error or timeout; the customer never got it
 * blocked    composed but withheld because compliance stopped the contact first
 */
export type TurnOutcome = 'received' | 'sent' | 'suppressed' | 'failed' | 'blocked';

export interface ConversationTurn {
  id: string;
  contact_id: string;
  direction: TurnDirection;
  body: string;
  state: ConversationState;
  carrier_message_id: string | null;
  timestamp: Date;
  outcome: TurnOutcome;
  /** 'customer', 'system', 'campaign:<run id>' or 'operator:<id>' */
  actor: string;
  detail: string | null;
}

export type NewConversationTurn = Omit<ConversationTurn, 'id' | 'timestamp'> & { timestamp?: Date };

/** A turn committed together with a state change; it takes the contact and the new state. */
export type TransitionTurn = Omit<NewConversationTurn, 'contact_id' | 'state'>;

export interface WebhookRejection {
  id: string;
  source: string;
  reason: string;
  phone: string | null;
  url: string;
  timestamp: Date;
}

export type NewWebhookRejection = Omit<WebhookRejection, 'id' | 'timestamp'>;

/** A service customer selected for a campaign, with its contact if one exists yet. */
export interface CampaignCandidate extends ServiceCustomer {
  contact_id: string | null;
  state: ConversationState | null;
}

export interface CandidateFilter {
  minDaysSinceService?: number;
  maxDaysSinceService?: number;
  cancelledOnly?: boolean;
  limit?: number;
}

export type CampaignStatus = 'running' | 'completed' | 'cancelled';

export interface CampaignRun {
  id: string;
  filter: CandidateFilter;
  max_active: number;
  status: CampaignStatus;
  started_at: Date;
  finished_at: Date | null;
  requested: number;
  sent: number;
  suppressed: number;
  skipped: number;
  failed: number;
  launched_by: string;
}

export type CampaignCounts = Pick<CampaignRun, 'requested' | 'sent' | 'suppressed' | 'skipped' | 'failed'>;

export interface ConversationSummary {
  contact_id: string;
  phone: E164PhoneNumber;
  display_name: string;
  status: string;
  was_interested: boolean;
  last_message_at: Date | null;
  last_snippet: string;
  last_direction: TurnDirection | null;
}

export interface ConversationListFilter {
  q?: string;
  state?: ConversationState;
}

export type ConversationSortKey = 'name' | 'number' | 'status' | 'last_message';

export interface ConversationSort {
  key: ConversationSortKey;
  direction: 'asc' | 'desc';
}

export interface TimeRange {
  from?: Date;
  to?: Date;
}

/**
 * Persistence boundary. The Postgres implementation lives in store.ts;
 * tests use an in-process implementation of the same interface.
 */
export interface ConversationStore {
  findContactById(id: string): Promise<Contact | null>;
  findContactByPhone(phone: E164PhoneNumber): Promise<Contact | null>;
  findServiceCustomer(phone: E164PhoneNumber): Promise<ServiceCustomer | null>;
  /** Creates the contact in `start`, or returns the existing one for the phone. */
  createContact(customer: ServiceCustomer): Promise<Contact>;
  /**
   * Writes a new state only if the row is still at `expectedVersion`, bumping the
   * version and setting `was_interested` when `marksInterest(state)`.
   * Returns the updated contact, or null on a version conflict.
   *
   * With `turn`, the turn is appended in the same transaction: both are written or neither is.
   */
  updateContactState(
    id: string,
    state: ConversationState,
    expectedVersion: number,
    turn?: TransitionTurn,
  ): Promise<Contact | null>;
  countActiveContacts(): Promise<number>;
  /** Business criteria only; contact state is enforced by the dispatcher. */
  findCampaignCandidates(filter: CandidateFilter): Promise<CampaignCandidate[]>;

  appendTurn(turn: NewConversationTurn): Promise<ConversationTurn>;
  findInboundTurnByCarrierId(carrierMessageId: string): Promise<ConversationTurn | null>;
  listTurns(contactId: string, range?: TimeRange, limit?: number): Promise<ConversationTurn[]>;
  appendRejection(rejection: NewWebhookRejection): Promise<WebhookRejection>;
  listConversations(filter: ConversationListFilter): Promise<ConversationSummary[]>;

  createCampaignRun(run: CampaignRun): Promise<void>;
  finalizeCampaignRun(id: string, status: CampaignStatus, counts: CampaignCounts, finishedAt: Date): Promise<void>;
  findCampaignRun(id: string): Promise<CampaignRun | null>;
}
