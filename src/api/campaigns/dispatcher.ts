/**
 * Paced, capped campaign sender.
 *
 * Each candidate goes through admission (cap check, contactability, scheduled-follow-up
 * transition) one at a time under a shared admission lock, then its send runs in one
 * of `gatewayConcurrency` worker slots. Gateway calls are spaced at least
 * `sendPaceIntervalMs` apart, however long each message took to compose.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import type { AuditLog } from '../audit/service.ts';
import { AuditActors } from '../audit/types.ts';
import type { ComplianceGuard } from '../compliance/guard.ts';
import type { ReplyComposer } from '../composer/composer.ts';
import type { EngineConfig } from '../config.ts';
import type { ContactLocks } from '../conversation/lock.ts';
import type { ConversationStateMachine } from '../conversation/state-machine.ts';
import {
  isTerminalState,
  type CampaignCandidate,
  type CampaignCounts,
  type CampaignRun,
  type CandidateFilter,
  type Contact,
  type ConversationState,
  type ConversationStore,
} from '../conversation/types.ts';
import { InvalidTransitionError } from '../errors.ts';
import { createLogger, errorMessage } from '../logger.ts';
import type { OutboundSender } from '../messaging/sender.ts';

const log = createLogger('campaign');

/** Lock key shared by every run so two campaigns cannot both pass the cap check. */
export const ADMISSION_LOCK_KEY = 'campaign:admission';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Hands out send slots at least `intervalMs` apart. A slot is reserved when
 * requested, so concurrent callers queue behind each other.
 */
export class Pacer {
  private nextSlotAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly sleep: Sleep,
    private readonly now: () => number,
  ) {}

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = this.nextSlotAt === null ? now : Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + Math.max(this.intervalMs, 0);

    if (slot > now) {
      await this.sleep(slot - now);
    }
  }
}

export interface CampaignOptions {
  filter: CandidateFilter;
  launchedBy: string;
  signal?: AbortSignal;
}

export interface DispatcherDeps {
  store: ConversationStore;
  locks: ContactLocks;
  machine: ConversationStateMachine;
  guard: ComplianceGuard;
  composer: ReplyComposer;
  sender: OutboundSender;
  audit: AuditLog;
  config: Pick<EngineConfig, 'sendPaceIntervalMs' | 'gatewayConcurrency'>;
  sleep?: Sleep;
  now?: () => number;
}

type Admission =
  | { kind: 'admitted'; contact: Contact; openerState: ConversationState }
  | { kind: 'skipped'; reason: string }
  | { kind: 'cap_reached' };

export class OutboundDispatcher {
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(private readonly deps: DispatcherDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run a campaign to completion (or cancellation) and return the finalized run.
   */
  async runCampaign(candidates: CampaignCandidate[], maxActive: number, options: CampaignOptions): Promise<CampaignRun> {
    const run = await this.begin(candidates.length, maxActive, options);
    return this.execute(run, candidates, options.signal);
  }

  /** Create the run record; `execute` does the work. */
  async begin(requested: number, maxActive: number, options: CampaignOptions): Promise<CampaignRun> {
    const run: CampaignRun = {
      id: uuidv4(),
      filter: options.filter,
      max_active: maxActive,
      status: 'running',
      started_at: new Date(this.now()),
      finished_at: null,
      requested,
      sent: 0,
      suppressed: 0,
      skipped: 0,
      failed: 0,
      launched_by: options.launchedBy,
    };
    await this.deps.store.createCampaignRun(run);
    log.info('Campaign started', { runId: run.id, requested, maxActive, launchedBy: options.launchedBy });
    return run;
  }

  async execute(run: CampaignRun, candidates: CampaignCandidate[], signal?: AbortSignal): Promise<CampaignRun> {
    const counts: CampaignCounts = { requested: candidates.length, sent: 0, suppressed: 0, skipped: 0, failed: 0 };
    const pacer = new Pacer(this.deps.config.sendPaceIntervalMs, this.sleep, this.now);
    const inFlight = new Set<Promise<void>>();

    for (let i = 0; i < candidates.length; i++) {
      const candidate = candidates[i];
      const remaining = candidates.length - i;

      if (signal?.aborted) {
        counts.skipped += remaining;
        break;
      }

      if (candidate.state && isTerminalState(candidate.state)) {
        counts.skipped++;
        continue;
      }

      while (inFlight.size >= this.deps.config.gatewayConcurrency) {
        await Promise.race(inFlight);
      }

      if (signal?.aborted) {
        counts.skipped += remaining;
        break;
      }

      let admission: Admission;
      try {
        admission = await this.admit(candidate, run.max_active);
      } catch (error) {
        log.error('Candidate admission failed', { runId: run.id, error: errorMessage(error) });
        counts.failed++;
        continue;
      }

      if (admission.kind === 'cap_reached') {
        log.info('Active cap reached, no further admissions', { runId: run.id, maxActive: run.max_active });
        counts.skipped += remaining;
        break;
      }
      if (admission.kind === 'skipped') {
        log.debug('Candidate skipped', { runId: run.id, reason: admission.reason });
        counts.skipped++;
        continue;
      }

      const task: Promise<void> = this.send(run, admission, pacer, counts).finally(() => {
        inFlight.delete(task);
      });
      inFlight.add(task);
    }

    // Sends already admitted run to completion, cancelled or not.
    await Promise.all(inFlight);

    const status = signal?.aborted ? 'cancelled' : 'completed';
    const finishedAt = new Date(this.now());
    await this.deps.store.finalizeCampaignRun(run.id, status, counts, finishedAt);

    log.info('Campaign finished', { runId: run.id, status, ...counts });
    return { ...run, ...counts, status, finished_at: finishedAt };
  }

  private async admit(candidate: CampaignCandidate, maxActive: number): Promise<Admission> {
    const { store, locks, guard, machine } = this.deps;

    return locks.run<Admission>(ADMISSION_LOCK_KEY, async () => {
      const active = await store.countActiveContacts();
      if (active >= maxActive) {
        return { kind: 'cap_reached' };
      }

      const contact = await this.resolveContact(candidate);

      return locks.run<Admission>(contact.id, async () => {
        const fresh = await store.findContactById(contact.id);
        if (!fresh || !guard.isContactable(fresh)) {
          return { kind: 'skipped', reason: `contact is ${fresh?.state ?? 'missing'}` };
        }

        try {
          const applied = await machine.apply(fresh, 'scheduled-follow-up');
          return { kind: 'admitted', contact: applied.contact, openerState: applied.from };
        } catch (error) {
          if (error instanceof InvalidTransitionError) {
            return { kind: 'skipped', reason: error.message };
          }
          throw error;
        }
      });
    });
  }

  private async resolveContact(candidate: CampaignCandidate): Promise<Contact> {
    const { store } = this.deps;
    const existing = candidate.contact_id
      ? await store.findContactById(candidate.contact_id)
      : await store.findContactByPhone(candidate.phone);
    return existing ?? store.createContact(candidate);
  }

  /**
   * Never rejects; every outcome lands in `counts`.
   * The message is written for where the conversation stood before the follow-up
   * transition, and recorded under the state it moved to.
   */
  private async send(
    run: CampaignRun,
    admission: Extract<Admission, { kind: 'admitted' }>,
    pacer: Pacer,
    counts: CampaignCounts,
  ): Promise<void> {
    const { store, locks, audit, composer, sender } = this.deps;
    const { contact, openerState } = admission;
    const actor = AuditActors.campaign(run.id);

    try {
      const history = await audit.history(contact.id);
      const reply = await composer.compose(contact, history, openerState);

      // Admitted sends complete even if the run is cancelled meanwhile.
      await pacer.acquire();

      const outcome = await locks.run(contact.id, async () => {
        const fresh = await store.findContactById(contact.id);
        if (!fresh || fresh.version !== contact.version) {
          const state = fresh?.state ?? contact.state;
          await audit.append({
            contact_id: contact.id,
            direction: 'out',
            body: reply.text,
            state,
            outcome: 'blocked',
            actor,
            detail: state === 'stop' ? 'contact opted out before send' : 'contact changed before send',
          });
          return 'blocked' as const;
        }
        const delivery = await sender.deliver({ contact: fresh, body: reply.text, state: fresh.state, actor });
        return delivery.outcome;
      });

      switch (outcome) {
        case 'sent':
          counts.sent++;
          break;
        case 'suppressed':
          counts.suppressed++;
          break;
        case 'failed':
          counts.failed++;
          break;
        case 'blocked':
          counts.skipped++;
          break;
      }
    } catch (error) {
      log.error('Campaign send failed', { runId: run.id, contactId: contact.id, error: errorMessage(error) });
      counts.failed++;
    }
  }
}
