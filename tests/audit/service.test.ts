import { describe, it, expect } from 'vitest';
import { AuditLog } from '../../src/api/audit/service.ts';
import { AuditActors } from '../../src/api/audit/types.ts';
import { snippet } from '../../src/api/conversation/store.ts';
import { InMemoryConversationStore } from '../helpers/memory-store.ts';

function seeded(count: number): { audit: AuditLog; store: InMemoryConversationStore; contactId: string } {
  const store = new InMemoryConversationStore();
  const audit = new AuditLog(store);
  const contact = store.addContact({ phone: '+15551230001' }, 'interested');
  for (let i = 0; i < count; i++) {
    store.turns.push({
      id: `seed-${i}`,
      contact_id: contact.id,
      direction: i % 2 === 0 ? 'in' : 'out',
      body: `message ${i}`,
      state: 'interested',
      carrier_message_id: null,
      timestamp: new Date(Date.UTC(2026, 0, 1, 0, i)),
      outcome: i % 2 === 0 ? 'received' : 'sent',
      actor: i % 2 === 0 ? AuditActors.customer : AuditActors.system,
      detail: null,
    });
  }
  return { audit, store, contactId: contact.id };
}

describe('AuditLog', () => {
  it('appends entries with defaults for optional fields', async () => {
    const { audit, store, contactId } = seeded(0);

    const entry = await audit.append({
      contact_id: contactId,
      direction: 'out',
      body: 'Hello',
      state: 'interested',
      outcome: 'suppressed',
      actor: AuditActors.operator('alice'),
    });

    expect(entry).toMatchObject({ carrier_message_id: null, detail: null, actor: 'operator:alice' });
    expect(store.turnsFor(contactId)).toHaveLength(1);
  });

  it('returns the most recent history oldest first', async () => {
    const { audit, contactId } = seeded(30);

    const history = await audit.history(contactId, 3);

    expect(history.map((e) => e.body)).toEqual(['message 27', 'message 28', 'message 29']);
  });

  it('exports a time range', async () => {
    const { audit, contactId } = seeded(10);

    const entries = await audit.export(contactId, {
      from: new Date(Date.UTC(2026, 0, 1, 0, 2)),
      to: new Date(Date.UTC(2026, 0, 1, 0, 4)),
    });

    expect(entries.map((e) => e.body)).toEqual(['message 2', 'message 3', 'message 4']);
  });

  it('records webhook rejections apart from conversation turns', async () => {
    const { audit, store } = seeded(0);

    const rejection = await audit.recordRejection({
      source: 'twilio',
      reason: 'signature mismatch',
      url: 'https://sms.example.com/api/twilio/sms',
    });

    expect(rejection).toMatchObject({ source: 'twilio', reason: 'signature mismatch', phone: null });
    expect(store.turns).toHaveLength(0);
  });

  it('builds actor strings', () => {
    expect(AuditActors.campaign('run-1')).toBe('campaign:run-1');
    expect(AuditActors.operator('alice')).toBe('operator:alice');
  });
});

describe('snippet', () => {
  it('keeps short bodies and shortens long ones', () => {
    expect(snippet(null)).toBe('');
    expect(snippet('short')).toBe('short');
    expect(snippet('a'.repeat(100))).toBe(`${'a'.repeat(77)}...`);
  });
});
