/**
 * Append-only audit log of every inbound and outbound message event.
 */

import type { ConversationStore } from '../conversation/types.ts';
import { createLogger } from '../logger.ts';
import type {
  AuditAppendParams,
  AuditEntry,
  AuditExportOptions,
  AuditRejectionParams,
  WebhookRejection,
} from './types.ts';

const log = createLogger('audit');

const DEFAULT_HISTORY_LIMIT = 20;
const DEFAULT_EXPORT_LIMIT = 1000;
const MAX_LIMIT = 5000;

export class AuditLog {
  constructor(private readonly store: ConversationStore) {}

  /**
   * Append an entry. There is no update or delete path.
   */
  async append(params: AuditAppendParams): Promise<AuditEntry> {
    const entry = await this.store.appendTurn({
      contact_id: params.contact_id,
      direction: params.direction,
      body: params.body,
      state: params.state,
      carrier_message_id: params.carrier_message_id ?? null,
      outcome: params.outcome,
      actor: params.actor,
      detail: params.detail ?? null,
      timestamp: params.timestamp,
    });

    log.debug('Audit entry appended', {
      contactId: entry.contact_id,
      direction: entry.direction,
      outcome: entry.outcome,
      state: entry.state,
    });
    return entry;
  }

  /**
   * Record a webhook refused before any contact was looked up.
   */
  async recordRejection(params: AuditRejectionParams): Promise<WebhookRejection> {
    const rejection = await this.store.appendRejection({
      source: params.source,
      reason: params.reason,
      url: params.url,
      phone: params.phone ?? null,
    });
    log.warn('Webhook rejected', { source: rejection.source, reason: rejection.reason });
    return rejection;
  }

  /** Most recent entries for a contact, oldest first; used as generation context. */
  async history(contactId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<AuditEntry[]> {
    return this.store.listTurns(contactId, {}, Math.min(limit, MAX_LIMIT));
  }

  /** Entries for a contact within a time range, oldest first. */
  async export(contactId: string, options: AuditExportOptions = {}): Promise<AuditEntry[]> {
    const limit = Math.min(options.limit || DEFAULT_EXPORT_LIMIT, MAX_LIMIT);
    return this.store.listTurns(contactId, { from: options.from, to: options.to }, limit);
  }
}
