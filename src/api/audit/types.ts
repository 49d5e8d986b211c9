/**
 * Types for the conversation audit log.
 * Entries are conversation turns; the console reads the same records it shows operators.
 */

import type { ConversationState, TurnDirection, TurnOutcome } from '../conversation/types.ts';

export type { ConversationTurn as AuditEntry, WebhookRejection } from '../conversation/types.ts';

export interface AuditAppendParams {
  contact_id: string;
  direction: TurnDirection;
  body: string;
  state: ConversationState;
  outcome: TurnOutcome;
  actor: string;
  carrier_message_id?: string | null;
  detail?: string | null;
  timestamp?: Date;
}

export interface AuditRejectionParams {
  source: string;
  reason: string;
  url: string;
  phone?: string | null;
}

export interface AuditExportOptions {
  from?: Date;
  to?: Date;
  limit?: number;
}

/** Actor strings recorded on every entry. */
export const AuditActors = {
  customer: 'customer',
  system: 'system',
  operator: (id: string) => `operator:${id}`,
  campaign: (runId: string) => `campaign:${runId}`,
} as const;
