/**
 * Postgres-backed conversation store.
 * Table shapes are documented in sql/schema.sql.
 */

import type { Pool } from 'pg';
import type { E164PhoneNumber } from '../twilio/types.ts';
import {
  isConversationState,
  marksInterest,
  type CampaignCandidate,
  type CampaignCounts,
  type CampaignRun,
  type CampaignStatus,
  type CandidateFilter,
  type Contact,
  type ConversationListFilter,
  type ConversationState,
  type ConversationStore,
  type ConversationSummary,
  type ConversationTurn,
  type NewConversationTurn,
  type NewWebhookRejection,
  type ServiceCustomer,
  type TimeRange,
  type TransitionTurn,
  type TurnDirection,
  type TurnOutcome,
  type WebhookRejection,
} from './types.ts';

const DEFAULT_TURN_LIMIT = 500;
const MAX_TURN_LIMIT = 5000;
const SNIPPET_LENGTH = 80;

const CONTACT_COLUMNS = `id::text, phone, state, display_name, last_service, days_since_service,
  cancelled, was_interested, version, created_at, updated_at`;

const TURN_COLUMNS = `id::text, contact_id::text, direction, body, state, carrier_message_id,
  timestamp, outcome, actor, detail`;

const UPDATE_STATE_SQL = `UPDATE contact
    SET state = $2,
        was_interested = was_interested OR $3,
        version = version + 1,
        updated_at = now()
  WHERE id = $1 AND version = $4
  RETURNING ${CONTACT_COLUMNS}`;

const INSERT_TURN_SQL = `INSERT INTO conversation_turn
    (contact_id, direction, body, state, carrier_message_id, timestamp, outcome, actor, detail)
  VALUES ($1, $2, $3, $4, $5, COALESCE($6, now()), $7, $8, $9)
  RETURNING ${TURN_COLUMNS}`;

function turnParams(turn: NewConversationTurn): unknown[] {
  return [
    turn.contact_id,
    turn.direction,
    turn.body,
    turn.state,
    turn.carrier_message_id,
    turn.timestamp ?? null,
    turn.outcome,
    turn.actor,
    turn.detail,
  ];
}

interface ContactRow {
  id: string;
  phone: string;
  state: string;
  display_name: string;
  last_service: string | null;
  days_since_service: number | null;
  cancelled: boolean;
  was_interested: boolean;
  version: number;
  created_at: Date;
  updated_at: Date;
}

interface TurnRow {
  id: string;
  contact_id: string;
  direction: TurnDirection;
  body: string;
  state: string;
  carrier_message_id: string | null;
  timestamp: Date;
  outcome: TurnOutcome;
  actor: string;
  detail: string | null;
}

interface CandidateRow extends ServiceCustomer {
  contact_id: string | null;
  state: string | null;
}

interface SummaryRow {
  contact_id: string;
  phone: string;
  display_name: string;
  state: string;
  was_interested: boolean;
  last_message_at: Date | null;
  last_body: string | null;
  last_direction: TurnDirection | null;
}

interface CampaignRunRow {
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

function toState(value: string): ConversationState {
  if (!isConversationState(value)) {
    throw new Error(`Unknown conversation state in database: ${value}`);
  }
  return value;
}

function toContact(row: ContactRow): Contact {
  return { ...row, state: toState(row.state) };
}

function toTurn(row: TurnRow): ConversationTurn {
  return { ...row, state: toState(row.state) };
}

export function snippet(body: string | null): string {
  if (!body) return '';
  return body.length > SNIPPET_LENGTH ? `${body.slice(0, SNIPPET_LENGTH - 3)}...` : body;
}

export class PgConversationStore implements ConversationStore {
  constructor(private readonly pool: Pool) {}

  async findContactById(id: string): Promise<Contact | null> {
    const result = await this.pool.query<ContactRow>(`SELECT ${CONTACT_COLUMNS} FROM contact WHERE id = $1`, [id]);
    return result.rows[0] ? toContact(result.rows[0]) : null;
  }

  async findContactByPhone(phone: E164PhoneNumber): Promise<Contact | null> {
    const result = await this.pool.query<ContactRow>(`SELECT ${CONTACT_COLUMNS} FROM contact WHERE phone = $1`, [phone]);
    return result.rows[0] ? toContact(result.rows[0]) : null;
  }

  async findServiceCustomer(phone: E164PhoneNumber): Promise<ServiceCustomer | null> {
    const result = await this.pool.query<ServiceCustomer>(
      `SELECT phone, display_name, last_service, days_since_service, cancelled
         FROM service_customer
        WHERE phone = $1`,
      [phone],
    );
    return result.rows[0] ?? null;
  }

  async createContact(customer: ServiceCustomer): Promise<Contact> {
    // A concurrent first message from the same phone resolves to the same row.
    const result = await this.pool.query<ContactRow>(
      `INSERT INTO contact (phone, state, display_name, last_service, days_since_service, cancelled)
       VALUES ($1, 'start', $2, $3, $4, $5)
       ON CONFLICT (phone) DO UPDATE SET phone = EXCLUDED.phone
       RETURNING ${CONTACT_COLUMNS}`,
      [customer.phone, customer.display_name, customer.last_service, customer.days_since_service, customer.cancelled],
    );
    return toContact(result.rows[0]);
  }

  async updateContactState(
    id: string,
    state: ConversationState,
    expectedVersion: number,
    turn?: TransitionTurn,
  ): Promise<Contact | null> {
    const params = [id, state, marksInterest(state), expectedVersion];
    if (!turn) {
      const result = await this.pool.query<ContactRow>(UPDATE_STATE_SQL, params);
      return result.rows[0] ? toContact(result.rows[0]) : null;
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const updated = await client.query<ContactRow>(UPDATE_STATE_SQL, params);
      if (!updated.rows[0]) {
        await client.query('ROLLBACK');
        return null;
      }
      await client.query(INSERT_TURN_SQL, turnParams({ ...turn, contact_id: id, state }));
      await client.query('COMMIT');
      return toContact(updated.rows[0]);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async countActiveContacts(): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) FROM contact WHERE state NOT IN ('start', 'stop', 'done')`,
    );
    return parseInt(result.rows[0].count, 10);
  }

  async findCampaignCandidates(filter: CandidateFilter): Promise<CampaignCandidate[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.minDaysSinceService !== undefined) {
      conditions.push(`s.days_since_service >= $${paramIndex++}`);
      params.push(filter.minDaysSinceService);
    }

    if (filter.maxDaysSinceService !== undefined) {
      conditions.push(`s.days_since_service <= $${paramIndex++}`);
      params.push(filter.maxDaysSinceService);
    }

    if (filter.cancelledOnly) {
      conditions.push('s.cancelled = true');
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limitClause = filter.limit !== undefined ? `LIMIT $${paramIndex++}` : '';
    if (filter.limit !== undefined) {
      params.push(filter.limit);
    }

    const result = await this.pool.query<CandidateRow>(
      `SELECT s.phone, s.display_name, s.last_service, s.days_since_service, s.cancelled,
              c.id::text AS contact_id, c.state
         FROM service_customer s
         LEFT JOIN contact c ON c.phone = s.phone
         ${whereClause}
        ORDER BY s.days_since_service ASC NULLS LAST, s.phone ASC
        ${limitClause}`,
      params,
    );

    return result.rows.map((row) => ({ ...row, state: row.state === null ? null : toState(row.state) }));
  }

  async appendTurn(turn: NewConversationTurn): Promise<ConversationTurn> {
    const result = await this.pool.query<TurnRow>(INSERT_TURN_SQL, turnParams(turn));
    return toTurn(result.rows[0]);
  }

  async findInboundTurnByCarrierId(carrierMessageId: string): Promise<ConversationTurn | null> {
    const result = await this.pool.query<TurnRow>(
      `SELECT ${TURN_COLUMNS}
         FROM conversation_turn
        WHERE direction = 'in' AND carrier_message_id = $1
        LIMIT 1`,
      [carrierMessageId],
    );
    return result.rows[0] ? toTurn(result.rows[0]) : null;
  }

  async listTurns(contactId: string, range: TimeRange = {}, limit: number = DEFAULT_TURN_LIMIT): Promise<ConversationTurn[]> {
    const conditions = ['contact_id = $1'];
    const params: unknown[] = [contactId];
    let paramIndex = 2;

    if (range.from) {
      conditions.push(`timestamp >= $${paramIndex++}`);
      params.push(range.from);
    }

    if (range.to) {
      conditions.push(`timestamp <= $${paramIndex++}`);
      params.push(range.to);
    }

    params.push(Math.min(limit, MAX_TURN_LIMIT));

    // Newest N, returned oldest first.
    const result = await this.pool.query<TurnRow>(
      `SELECT * FROM (
         SELECT ${TURN_COLUMNS}
           FROM conversation_turn
          WHERE ${conditions.join(' AND ')}
          ORDER BY timestamp DESC, id DESC
          LIMIT $${paramIndex++}
       ) recent
       ORDER BY timestamp ASC, id ASC`,
      params,
    );
    return result.rows.map(toTurn);
  }

  async appendRejection(rejection: NewWebhookRejection): Promise<WebhookRejection> {
    const result = await this.pool.query<WebhookRejection>(
      `INSERT INTO webhook_rejection (source, reason, phone, url)
       VALUES ($1, $2, $3, $4)
       RETURNING id::text, source, reason, phone, url, timestamp`,
      [rejection.source, rejection.reason, rejection.phone, rejection.url],
    );
    return result.rows[0];
  }

  async listConversations(filter: ConversationListFilter): Promise<ConversationSummary[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.q) {
      conditions.push(`(c.display_name ILIKE $${paramIndex} OR c.phone ILIKE $${paramIndex})`);
      params.push(`%${filter.q}%`);
      paramIndex++;
    }

    if (filter.state) {
      conditions.push(`c.state = $${paramIndex++}`);
      params.push(filter.state);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const result = await this.pool.query<SummaryRow>(
      `SELECT c.id::text AS contact_id, c.phone, c.display_name, c.state, c.was_interested,
              t.timestamp AS last_message_at, t.body AS last_body, t.direction AS last_direction
         FROM contact c
         LEFT JOIN LATERAL (
           SELECT timestamp, body, direction
             FROM conversation_turn
            WHERE contact_id = c.id
            ORDER BY timestamp DESC, id DESC
            LIMIT 1
         ) t ON true
         ${whereClause}`,
      params,
    );

    return result.rows.map((row) => ({
      contact_id: row.contact_id,
      phone: row.phone,
      display_name: row.display_name,
      status: toState(row.state).toUpperCase(),
      was_interested: row.was_interested,
      last_message_at: row.last_message_at,
      last_snippet: snippet(row.last_body),
      last_direction: row.last_direction,
    }));
  }

  async createCampaignRun(run: CampaignRun): Promise<void> {
    await this.pool.query(
      `INSERT INTO campaign_run (id, filter, max_active, status, started_at, finished_at,
                                 requested, sent, suppressed, skipped, failed, launched_by)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
      [
        run.id,
        JSON.stringify(run.filter),
        run.max_active,
        run.status,
        run.started_at,
        run.finished_at,
        run.requested,
        run.sent,
        run.suppressed,
        run.skipped,
        run.failed,
        run.launched_by,
      ],
    );
  }

  async finalizeCampaignRun(id: string, status: CampaignStatus, counts: CampaignCounts, finishedAt: Date): Promise<void> {
    await this.pool.query(
      `UPDATE campaign_run
          SET status = $2, finished_at = $3,
              requested = $4, sent = $5, suppressed = $6, skipped = $7, failed = $8
        WHERE id = $1`,
      [id, status, finishedAt, counts.requested, counts.sent, counts.suppressed, counts.skipped, counts.failed],
    );
  }

  async findCampaignRun(id: string): Promise<CampaignRun | null> {
    const result = await this.pool.query<CampaignRunRow>(
      `SELECT id::text, filter, max_active, status, started_at, finished_at,
              requested, sent, suppressed, skipped, failed, launched_by
         FROM campaign_run
        WHERE id = $1`,
      [id],
    );
    return result.rows[0] ?? null;
  }
}
