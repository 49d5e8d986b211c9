/**
 * Operations behind the operator console.
 * The operator identity is established upstream and passed in as-is.
 */

import type { AuditLog } from '../audit/service.ts';
import { AuditActors, type AuditEntry } from '../audit/types.ts';
import type { OutboundDispatcher } from '../campaigns/dispatcher.ts';
import type { CampaignRegistry } from '../campaigns/registry.ts';
import type { ComplianceService } from '../compliance/service.ts';
import type { EngineConfig } from '../config.ts';
import type { ContactLocks } from '../conversation/lock.ts';
import type { ConversationStateMachine } from '../conversation/state-machine.ts';
import type {
  CampaignCandidate,
  CampaignRun,
  CandidateFilter,
  Contact,
  ConversationListFilter,
  ConversationSort,
  ConversationState,
  ConversationStore,
  ConversationSummary,
  TimeRange,
} from '../conversation/types.ts';
import { UnknownContactError } from '../errors.ts';
import { createLogger } from '../logger.ts';

const log = createLogger('console');

export const DEFAULT_CONVERSATION_SORT: ConversationSort = { key: 'last_message', direction: 'desc' };

export interface ConsoleDeps {
  store: ConversationStore;
  locks: ContactLocks;
  machine: ConversationStateMachine;
  compliance: ComplianceService;
  audit: AuditLog;
  dispatcher: OutboundDispatcher;
  registry: CampaignRegistry;
  config: Pick<EngineConfig, 'maxActive'>;
}

function compareSummaries(a: ConversationSummary, b: ConversationSummary, sort: ConversationSort): number {
  const sign = sort.direction === 'asc' ? 1 : -1;
  switch (sort.key) {
    case 'name':
      return sign * a.display_name.localeCompare(b.display_name);
    case 'number':
      return sign * a.phone.localeCompare(b.phone);
    case 'status':
      return sign * a.status.localeCompare(b.status);
    case 'last_message': {
      // Conversations with no messages go last in either direction.
      if (!a.last_message_at || !b.last_message_at) {
        return (a.last_message_at ? 0 : 1) - (b.last_message_at ? 0 : 1);
      }
      return sign * (a.last_message_at.getTime() - b.last_message_at.getTime());
    }
  }
}

/** `2026-03-04T09:05:59.000Z` -> `2026-03-04 09:05` */
function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function formatTranscriptLine(entry: AuditEntry): string {
  const role = entry.direction === 'in' ? 'customer' : 'business';
  const marker = entry.outcome === 'sent' || entry.outcome === 'received' ? '' : ` [${entry.outcome}]`;
  return `[${formatTimestamp(entry.timestamp)}] ${role}: ${entry.body}${marker}`;
}

export class ConsoleService {
  constructor(private readonly deps: ConsoleDeps) {}

  /**
   * Operator override of a contact's state. `stop` runs the same path as the keyword
   * (with the confirmation sent through the gateway); leaving `stop` is an opt-in.
   */
  async setContactState(operatorId: string, contactId: string, newState: ConversationState): Promise<Contact> {
    const { store, locks, machine, compliance } = this.deps;
    const actor = AuditActors.operator(operatorId);

    return locks.run(contactId, async () => {
      const contact = await store.findContactById(contactId);
      if (!contact) {
        throw new UnknownContactError(contactId);
      }

      if (newState === 'stop') {
        const result = await compliance.applyOptOut(contact, { actor, delivery: 'gateway' });
        return result.contact;
      }

      const trigger = contact.state === 'stop' ? 'opt-in' : 'manual-override';
      const applied = await machine.apply(contact, trigger, newState);
      log.info('Contact state set by operator', { contactId, from: applied.from, to: applied.to, trigger, actor });
      return applied.contact;
    });
  }

  async listConversations(
    filter: ConversationListFilter = {},
    sort: ConversationSort = DEFAULT_CONVERSATION_SORT,
  ): Promise<ConversationSummary[]> {
    const summaries = await this.deps.store.listConversations(filter);
    return [...summaries].sort(
      (a, b) => compareSummaries(a, b, sort) || a.display_name.localeCompare(b.display_name),
    );
  }

  /**
   * Plain-text transcript, one line per audit entry, times in UTC.
   */
  async exportTranscript(contactId: string, range: TimeRange = {}): Promise<string> {
    const contact = await this.deps.store.findContactById(contactId);
    if (!contact) {
      throw new UnknownContactError(contactId);
    }

    const entries = await this.deps.audit.export(contactId, range);
    const lines = [
      `Conversation with ${contact.display_name} (${contact.phone})`,
      `State: ${contact.state.toUpperCase()}`,
      '',
      ...entries.map(formatTranscriptLine),
    ];
    return `${lines.join('\n')}\n`;
  }

  async previewCampaignCandidates(filter: CandidateFilter): Promise<CampaignCandidate[]> {
    return this.deps.store.findCampaignCandidates(filter);
  }

  /**
   * Start a campaign in the background. Resolves with the run record as created;
   * poll `getCampaignRun` for progress.
   */
  async launchCampaign(operatorId: string, filter: CandidateFilter, maxActive?: number): Promise<CampaignRun> {
    const { store, dispatcher, registry } = this.deps;
    const candidates = await store.findCampaignCandidates(filter);
    const controller = new AbortController();

    const run = await dispatcher.begin(candidates.length, maxActive ?? this.deps.config.maxActive, {
      filter,
      launchedBy: AuditActors.operator(operatorId),
    });
    registry.track(run.id, controller, dispatcher.execute(run, candidates, controller.signal));
    return run;
  }

  cancelCampaign(runId: string): boolean {
    return this.deps.registry.cancel(runId);
  }

  async getCampaignRun(runId: string): Promise<CampaignRun | null> {
    return this.deps.store.findCampaignRun(runId);
  }
}
