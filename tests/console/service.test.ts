import { describe, it, expect, vi } from 'vitest';
import { formatTranscriptLine } from '../../src/api/console/service.ts';
import { InvalidTransitionError, UnknownContactError } from '../../src/api/errors.ts';
import { buildTestEngine } from '../helpers/fakes.ts';

const PHONE = '+15551230001';

describe('ConsoleService.setContactState', () => {
  it('stops a contact and sends the confirmation through the gateway', async () => {
    const { engine, store, gateway } = buildTestEngine();
    const contact = store.addContact({ phone: PHONE }, 'interested');

    const updated = await engine.console.setContactState('alice', contact.id, 'stop');

    expect(updated.state).toBe('stop');
    expect(gateway.sent).toEqual([{ to: PHONE, text: 'Messages Stopped' }]);
    expect(store.turnsFor(contact.id)).toMatchObject([
      { direction: 'out', body: 'Messages Stopped', outcome: 'sent', state: 'stop', actor: 'operator:alice', carrier_message_id: 'SM-out-1' },
    ]);
  });

  it('re-enrolls a stopped contact through opt-in', async () => {
    const { engine, store, gateway } = buildTestEngine();
    const contact = store.addContact({ phone: PHONE }, 'stop');

    const updated = await engine.console.setContactState('alice', contact.id, 'start');

    expect(updated.state).toBe('start');
    expect(updated.version).toBe(1);
    expect(gateway.calls).toBe(0);
  });

  it('overrides any other state', async () => {
    const { engine, store } = buildTestEngine();
    const contact = store.addContact({ phone: PHONE }, 'done');

    expect((await engine.console.setContactState('alice', contact.id, 'follow_up')).state).toBe('follow_up');
    expect((await engine.console.setContactState('alice', contact.id, 'interested')).was_interested).toBe(true);
  });

  it('rejects unknown contacts', async () => {
    const { engine } = buildTestEngine();
    await expect(engine.console.setContactState('alice', 'contact-missing', 'pause')).rejects.toBeInstanceOf(
      UnknownContactError,
    );
  });

  it('confirms a repeated stop and refuses overrides out of stop', async () => {
    const { engine, store } = buildTestEngine();
    const contact = store.addContact({ phone: PHONE }, 'stop');

    await expect(engine.console.setContactState('alice', contact.id, 'stop')).resolves.toMatchObject({ state: 'stop' });
    await expect(engine.machine.apply(contact, 'manual-override', 'pause')).rejects.toBeInstanceOf(InvalidTransitionError);
  });
});

describe('ConsoleService.listConversations', () => {
  async function seed() {
    const test = buildTestEngine();
    const { store, engine } = test;
    const ana = store.addContact({ phone: '+15551230003', display_name: 'Ana Park' }, 'interested');
    const bo = store.addContact({ phone: '+15551230001', display_name: 'Bo Chen' }, 'stop');
    store.addContact({ phone: '+15551230002', display_name: 'Cy Diaz' }, 'start');

    await engine.audit.append({
      contact_id: ana.id,
      direction: 'in',
      body: 'Yes please',
      state: 'interested',
      outcome: 'received',
      actor: 'customer',
      timestamp: new Date('2026-03-02T10:00:00Z'),
    });
    await engine.audit.append({
      contact_id: bo.id,
      direction: 'out',
      body: 'Messages Stopped',
      state: 'stop',
      outcome: 'sent',
      actor: 'system',
      timestamp: new Date('2026-03-03T10:00:00Z'),
    });
    return test;
  }

  it('orders by most recent message and puts silent conversations last', async () => {
    const { engine } = await seed();
    const list = await engine.console.listConversations();
    expect(list.map((c) => c.display_name)).toEqual(['Bo Chen', 'Ana Park', 'Cy Diaz']);
  });

  it('keeps silent conversations last when sorting oldest first', async () => {
    const { engine } = await seed();
    const list = await engine.console.listConversations({}, { key: 'last_message', direction: 'asc' });
    expect(list.map((c) => c.display_name)).toEqual(['Ana Park', 'Bo Chen', 'Cy Diaz']);
  });

  it('sorts by number and by status', async () => {
    const { engine } = await seed();
    const byNumber = await engine.console.listConversations({}, { key: 'number', direction: 'asc' });
    expect(byNumber.map((c) => c.phone)).toEqual(['+15551230001', '+15551230002', '+15551230003']);

    const byStatus = await engine.console.listConversations({}, { key: 'status', direction: 'desc' });
    expect(byStatus.map((c) => c.status)).toEqual(['STOP', 'START', 'INTERESTED']);
  });

  it('filters by search text and state', async () => {
    const { engine } = await seed();
    expect((await engine.console.listConversations({ q: 'chen' })).map((c) => c.display_name)).toEqual(['Bo Chen']);
    expect((await engine.console.listConversations({ state: 'interested' })).map((c) => c.display_name)).toEqual([
      'Ana Park',
    ]);
  });

  it('summarizes the last message', async () => {
    const { engine } = await seed();
    const [first] = await engine.console.listConversations();
    expect(first).toMatchObject({
      status: 'STOP',
      last_snippet: 'Messages Stopped',
      last_direction: 'out',
      last_message_at: new Date('2026-03-03T10:00:00Z'),
    });
  });
});

describe('ConsoleService.exportTranscript', () => {
  it('renders one line per entry with UTC minutes and non-delivery markers', async () => {
    const { engine, store } = buildTestEngine();
    const contact = store.addContact({ phone: PHONE, display_name: 'Dana Reyes' }, 'interested');
    await engine.audit.append({
      contact_id: contact.id,
      direction: 'in',
      body: 'Yes still seeing ants',
      state: 'interested',
      outcome: 'received',
      actor: 'customer',
      timestamp: new Date('2026-03-04T09:05:59Z'),
    });
    await engine.audit.append({
      contact_id: contact.id,
      direction: 'out',
      body: 'How many square feet?',
      state: 'interested',
      outcome: 'suppressed',
      actor: 'system',
      timestamp: new Date('2026-03-04T09:06:10Z'),
    });

    const transcript = await engine.console.exportTranscript(contact.id);

    expect(transcript).toBe(
      [
        'Conversation with Dana Reyes (+15551230001)',
        'State: INTERESTED',
        '',
        '[2026-03-04 09:05] customer: Yes still seeing ants',
        '[2026-03-04 09:06] business: How many square feet? [suppressed]',
        '',
      ].join('\n'),
    );
  });

  it('limits entries to the requested range', async () => {
    const { engine, store } = buildTestEngine();
    const contact = store.addContact({ phone: PHONE }, 'interested');
    for (const day of ['01', '02', '03']) {
      await engine.audit.append({
        contact_id: contact.id,
        direction: 'in',
        body: `day ${day}`,
        state: 'interested',
        outcome: 'received',
        actor: 'customer',
        timestamp: new Date(`2026-03-${day}T12:00:00Z`),
      });
    }

    const transcript = await engine.console.exportTranscript(contact.id, {
      from: new Date('2026-03-02T00:00:00Z'),
      to: new Date('2026-03-02T23:59:59Z'),
    });

    expect(transcript.trimEnd().split('\n').slice(3)).toEqual(['[2026-03-02 12:00] customer: day 02']);
  });

  it('formats a failed send', () => {
    expect(
      formatTranscriptLine({
        id: 'turn-1',
        contact_id: 'contact-1',
        direction: 'out',
        body: 'Hi',
        state: 'follow_up',
        carrier_message_id: null,
        timestamp: new Date('2026-01-02T03:04:05Z'),
        outcome: 'failed',
        actor: 'campaign:run-1',
        detail: 'carrier rejected',
      }),
    ).toBe('[2026-01-02 03:04] business: Hi [failed]');
  });
});

describe('ConsoleService campaigns', () => {
  it('previews candidates with their current state', async () => {
    const { engine, store } = buildTestEngine();
    store.addCustomer({ phone: '+15551230002', days_since_service: 200, cancelled: true });
    store.addContact({ phone: PHONE, days_since_service: 100 }, 'stop');

    const preview = await engine.console.previewCampaignCandidates({ minDaysSinceService: 90 });

    expect(preview.map((c) => [c.phone, c.state])).toEqual([
      [PHONE, 'stop'],
      ['+15551230002', null],
    ]);
    expect(await engine.console.previewCampaignCandidates({ cancelledOnly: true })).toHaveLength(1);
  });

  it('launches a campaign in the background and records its completion', async () => {
    const { engine, store } = buildTestEngine({ config: { maxActive: 10 } });
    store.addCustomer({ phone: PHONE });
    store.addCustomer({ phone: '+15551230002' });

    const run = await engine.console.launchCampaign('alice', {});

    expect(run).toMatchObject({ status: 'running', requested: 2, max_active: 10, launched_by: 'operator:alice' });
    await vi.waitFor(async () => {
      expect((await engine.console.getCampaignRun(run.id))?.status).toBe('completed');
    });
    expect(await engine.console.getCampaignRun(run.id)).toMatchObject({ sent: 2, skipped: 0 });
    await vi.waitFor(() => expect(engine.registry.isRunning(run.id)).toBe(false));
  });

  it('cancels a running campaign', async () => {
    const { engine, store } = buildTestEngine();
    for (let i = 1; i <= 3; i++) {
      store.addCustomer({ phone: `+1555123000${i}` });
    }

    const run = await engine.console.launchCampaign('alice', {}, 5);
    expect(engine.console.cancelCampaign(run.id)).toBe(true);

    await vi.waitFor(async () => {
      expect((await engine.console.getCampaignRun(run.id))?.status).toBe('cancelled');
    });
    const finished = await engine.console.getCampaignRun(run.id);
    expect((finished?.sent ?? 0) + (finished?.skipped ?? 0)).toBe(3);
  });

  it('reports cancelling an unknown run', () => {
    const { engine } = buildTestEngine();
    expect(engine.console.cancelCampaign('run-missing')).toBe(false);
  });
});
