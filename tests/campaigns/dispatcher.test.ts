import { setTimeout as delay } from 'node:timers/promises';
import { describe, it, expect, vi } from 'vitest';
import { Pacer, type Sleep } from '../../src/api/campaigns/dispatcher.ts';
import { STATE_TEMPLATES } from '../../src/api/composer/templates.ts';
import type { CandidateFilter } from '../../src/api/conversation/types.ts';
import { GenerationFailureError } from '../../src/api/errors.ts';
import { buildTestEngine, FakeGenerator, type TestEngine } from '../helpers/fakes.ts';
import { InMemoryConversationStore } from '../helpers/memory-store.ts';

const ALL: CandidateFilter = {};

function phone(n: number): string {
  return `+1555123${String(n).padStart(4, '0')}`;
}

function seedCustomers(store: InMemoryConversationStore, count: number, offset: number = 0): void {
  for (let i = 1; i <= count; i++) {
    store.addCustomer({ phone: phone(offset + i), days_since_service: 60 + offset + i });
  }
}

async function launch({ engine, store }: TestEngine, maxActive: number, signal?: AbortSignal) {
  const candidates = await store.findCampaignCandidates(ALL);
  return engine.dispatcher.runCampaign(candidates, maxActive, { filter: ALL, launchedBy: 'operator:test', signal });
}

/** Fake clock whose sleep advances time instantly. */
function fakeClock(): { now: () => number; sleep: Sleep; sleeps: number[] } {
  let clock = 0;
  const sleeps: number[] = [];
  return {
    now: () => clock,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock += ms;
    },
    sleeps,
  };
}

describe('Pacer', () => {
  it('lets the first send through and spaces the rest', async () => {
    const clock = fakeClock();
    const pacer = new Pacer(1000, clock.sleep, clock.now);

    await pacer.acquire();
    await pacer.acquire();
    expect(clock.sleeps).toEqual([1000]);
  });

  it('queues concurrent callers one interval apart', async () => {
    const clock = fakeClock();
    const pacer = new Pacer(1000, clock.sleep, clock.now);

    await Promise.all([pacer.acquire(), pacer.acquire(), pacer.acquire()]);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it('does not wait once the interval has already passed', async () => {
    const clock = fakeClock();
    const pacer = new Pacer(1000, clock.sleep, clock.now);

    await pacer.acquire();
    await clock.sleep(2500);
    await pacer.acquire();
    expect(clock.sleeps).toEqual([2500]);
  });
});

describe('OutboundDispatcher', () => {
  it('sends a follow-up to every candidate and records the run', async () => {
    const test = buildTestEngine();
    seedCustomers(test.store, 3);

    const run = await launch(test, 25);

    expect(run).toMatchObject({ status: 'completed', requested: 3, sent: 3, suppressed: 0, skipped: 0, failed: 0 });
    expect(test.gateway.sent.map((m) => m.to).sort()).toEqual([phone(1), phone(2), phone(3)]);
    expect(test.gateway.sent[0]?.text).toBe('Reply for start');
    expect(test.generator.requests.map((r) => r.state)).toEqual(['start', 'start', 'start']);
    expect(test.store.runs.get(run.id)).toMatchObject({ status: 'completed', sent: 3, launched_by: 'operator:test' });

    const contact = await test.store.findContactByPhone(phone(1));
    expect(contact?.state).toBe('follow_up');
    expect(test.store.turnsFor(contact?.id ?? '')).toMatchObject([
      { direction: 'out', outcome: 'sent', state: 'follow_up', actor: `campaign:${run.id}` },
    ]);
  });

  it('opens with the template for the state the contact was in when generation fails', async () => {
    const generator = new FakeGenerator(() => {
      throw new GenerationFailureError('http', 'upstream unavailable');
    });
    const test = buildTestEngine({ generator });
    seedCustomers(test.store, 1);

    await launch(test, 25);

    expect(test.gateway.sent).toEqual([{ to: phone(1), text: STATE_TEMPLATES.start }]);
  });

  it('never exceeds the active cap and skips the remainder', async () => {
    const test = buildTestEngine();
    seedCustomers(test.store, 5);

    const run = await launch(test, 2);

    expect(run).toMatchObject({ requested: 5, sent: 2, skipped: 3 });
    expect(test.store.maxActiveObserved).toBe(2);
    expect(await test.store.countActiveContacts()).toBe(2);
  });

  it('counts contacts already mid-conversation against the cap', async () => {
    const test = buildTestEngine();
    test.store.addContact({ phone: phone(90), days_since_service: 10 }, 'interested');
    test.store.addContact({ phone: phone(91), days_since_service: 12 }, 'pause');
    seedCustomers(test.store, 3);
    const filter: CandidateFilter = { minDaysSinceService: 30 };
    const candidates = await test.store.findCampaignCandidates(filter);

    const run = await test.engine.dispatcher.runCampaign(candidates, 3, { filter, launchedBy: 'operator:test' });

    expect(run).toMatchObject({ requested: 3, sent: 1, skipped: 2 });
    expect(test.store.maxActiveObserved).toBe(3);
  });

  it('holds the cap across concurrent campaigns', async () => {
    const test = buildTestEngine();
    seedCustomers(test.store, 4);
    seedCustomers(test.store, 4, 100);
    const candidates = await test.store.findCampaignCandidates(ALL);
    const options = { filter: ALL, launchedBy: 'operator:test' };

    const [first, second] = await Promise.all([
      test.engine.dispatcher.runCampaign(candidates.slice(0, 4), 3, options),
      test.engine.dispatcher.runCampaign(candidates.slice(4), 3, options),
    ]);

    expect(first.sent + second.sent).toBe(3);
    expect(test.store.maxActiveObserved).toBe(3);
  });

  it('skips opted-out and finished contacts without sending', async () => {
    const test = buildTestEngine();
    const stopped = test.store.addContact({ phone: phone(1) }, 'stop');
    test.store.addContact({ phone: phone(2) }, 'done');
    seedCustomers(test.store, 1, 2);

    const run = await launch(test, 25);

    expect(run).toMatchObject({ requested: 3, sent: 1, skipped: 2 });
    expect(test.gateway.sent.map((m) => m.to)).toEqual([phone(3)]);
    expect(test.store.turnsFor(stopped.id)).toEqual([]);
  });

  it('skips a contact that opted out after the candidate list was built', async () => {
    const test = buildTestEngine();
    const contact = test.store.addContact({ phone: phone(1) }, 'start');
    const candidates = await test.store.findCampaignCandidates(ALL);
    await test.store.updateContactState(contact.id, 'stop', 0);

    const run = await test.engine.dispatcher.runCampaign(candidates, 25, { filter: ALL, launchedBy: 'operator:test' });

    expect(run).toMatchObject({ sent: 0, skipped: 1 });
    expect(test.gateway.calls).toBe(0);
  });

  it('suppresses every send when outbound is disabled', async () => {
    const test = buildTestEngine({ config: { outboundEnabled: false } });
    seedCustomers(test.store, 3);

    const run = await launch(test, 25);

    expect(run).toMatchObject({ sent: 0, suppressed: 3, failed: 0 });
    expect(test.gateway.calls).toBe(0);
    expect((await test.store.findContactByPhone(phone(2)))?.state).toBe('follow_up');
  });

  it('keeps going after a gateway failure', async () => {
    const test = buildTestEngine();
    seedCustomers(test.store, 5);
    test.gateway.failFor.add(phone(2));

    const run = await launch(test, 25);

    expect(run).toMatchObject({ sent: 4, failed: 1, skipped: 0 });
    const failedContact = await test.store.findContactByPhone(phone(2));
    expect(test.store.turnsFor(failedContact?.id ?? '')).toMatchObject([{ outcome: 'failed' }]);
  });

  it('bounds in-flight gateway sends', async () => {
    const test = buildTestEngine({ config: { gatewayConcurrency: 2 } });
    seedCustomers(test.store, 5);
    test.gateway.hold();

    const pending = launch(test, 25);
    await vi.waitFor(() => expect(test.gateway.inFlight).toBe(2));
    test.gateway.release();
    const run = await pending;

    expect(run.sent).toBe(5);
    expect(test.gateway.maxInFlight).toBe(2);
  });

  it('spaces gateway calls by the pacing interval', async () => {
    const clock = fakeClock();
    const test = buildTestEngine({
      config: { sendPaceIntervalMs: 1500, gatewayConcurrency: 1 },
      sleep: clock.sleep,
      now: clock.now,
    });
    seedCustomers(test.store, 3);

    const run = await launch(test, 25);

    expect(run.sent).toBe(3);
    expect(clock.sleeps).toEqual([1500, 1500]);
  });

  it('keeps the interval at the gateway when composition times differ', async () => {
    const generator = new FakeGenerator(async (request) => {
      if (request.contact.phone === phone(1)) {
        await delay(100);
      }
      return `Reply for ${request.state}`;
    });
    const test = buildTestEngine({ generator, config: { sendPaceIntervalMs: 300, gatewayConcurrency: 2 } });
    seedCustomers(test.store, 2);

    const run = await launch(test, 25);

    expect(run.sent).toBe(2);
    expect(test.gateway.sent.map((m) => m.to)).toEqual([phone(2), phone(1)]);
    const [first, second] = test.gateway.sendTimes;
    expect(second - first).toBeGreaterThanOrEqual(290);
  });

  it('finishes admitted sends and stops admitting on cancellation', async () => {
    const controller = new AbortController();
    const test = buildTestEngine({
      config: { sendPaceIntervalMs: 1000, gatewayConcurrency: 1 },
      now: () => 0,
      sleep: async () => {
        controller.abort();
      },
    });
    seedCustomers(test.store, 5);

    const run = await launch(test, 25, controller.signal);

    expect(run).toMatchObject({ status: 'cancelled', sent: 2, skipped: 3 });
    expect(test.gateway.sent.map((m) => m.to)).toEqual([phone(1), phone(2)]);
    expect(test.store.runs.get(run.id)?.status).toBe('cancelled');
    expect(test.store.runs.get(run.id)?.finished_at).toEqual(new Date(0));
  });
});
