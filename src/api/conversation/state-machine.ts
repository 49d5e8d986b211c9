/**
 * Conversation state machine.
 *
 * Automated edges (inbound replies, scheduled follow-ups) come from a transition
 * table loaded and validated at startup. Compliance and operator edges are built in:
 *   opt-out          any state -> stop
 *   opt-in           stop -> any other state
 *   manual-override  any state but stop -> any state
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, InvalidTransitionError, UnknownContactError, VersionConflictError } from '../errors.ts';
import { createLogger } from '../logger.ts';
import {
  AUTOMATED_TRIGGERS,
  CONVERSATION_STATES,
  isTerminalState,
  type AutomatedTrigger,
  type Contact,
  type ConversationState,
  type ConversationStore,
  type TransitionTurn,
  type Trigger,
} from './types.ts';

const logger = createLogger('state-machine');

export type TransitionTable = Partial<Record<ConversationState, Partial<Record<AutomatedTrigger, ConversationState>>>>;

const StateSchema = z.enum(CONVERSATION_STATES);

const EdgesSchema = z
  .object({
    'inbound-reply': StateSchema.optional(),
    'scheduled-follow-up': StateSchema.optional(),
  })
  .strict();

export const TransitionTableSchema = z.record(StateSchema, EdgesSchema).superRefine((table, ctx) => {
  for (const state of CONVERSATION_STATES) {
    const edges = table[state];
    if (!edges || !isTerminalState(state)) continue;
    for (const trigger of AUTOMATED_TRIGGERS) {
      if (edges[trigger]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [state, trigger],
          message: `automated edge out of terminal state "${state}" is not allowed`,
        });
      }
    }
  }
});

export function parseTransitionTable(raw: unknown): TransitionTable {
  const parsed = TransitionTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid transition table',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function loadTransitionTable(file: string): TransitionTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read transition table ${file}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseTransitionTable(raw);
}

/**
 * Pure transition function. Throws InvalidTransitionError for any edge that is
 * neither built in nor present in the table.
 */
export function transition(
  table: TransitionTable,
  current: ConversationState,
  trigger: Trigger,
  target?: ConversationState,
): ConversationState {
  switch (trigger) {
    case 'opt-out':
      return 'stop';
    case 'opt-in':
      if (current === 'stop' && target && target !== 'stop') return target;
      throw new InvalidTransitionError(current, trigger, target);
    case 'manual-override':
      if (current !== 'stop' && target) return target;
      throw new InvalidTransitionError(current, trigger, target);
    case 'inbound-reply':
    case 'scheduled-follow-up': {
      const next = table[current]?.[trigger];
      if (!next) throw new InvalidTransitionError(current, trigger, target);
      return next;
    }
  }
}

export interface AppliedTransition {
  contact: Contact;
  from: ConversationState;
  to: ConversationState;
}

interface StateMachineOptions {
  /** Attempts against a fresh row after a version conflict. Default: 3. */
  maxAttempts?: number;
}

export class ConversationStateMachine {
  private readonly maxAttempts: number;

  constructor(
    private readonly store: ConversationStore,
    private readonly table: TransitionTable,
    options: StateMachineOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
  }

  /** Where `trigger` would take a contact now, without persisting anything. */
  next(current: ConversationState, trigger: Trigger, target?: ConversationState): ConversationState {
    return transition(this.table, current, trigger, target);
  }

  /**
   * Persist a transition with an optimistic version check, re-reading the contact
   * and recomputing the edge on conflict. State is untouched when the edge is invalid.
   * `turn` is committed with the state change, recorded under the new state.
   */
  async apply(
    contact: Contact,
    trigger: Trigger,
    target?: ConversationState,
    turn?: TransitionTurn,
  ): Promise<AppliedTransition> {
    let current = contact;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const to = transition(this.table, current.state, trigger, target);
      const updated = await this.store.updateContactState(current.id, to, current.version, turn);
      if (updated) {
        return { contact: updated, from: current.state, to };
      }

      logger.debug('Version conflict, retrying from fresh row', { contactId: current.id, attempt, trigger });
      const fresh = await this.store.findContactById(current.id);
      if (!fresh) {
        throw new UnknownContactError(current.phone);
      }
      current = fresh;
    }

    throw new VersionConflictError(contact.id, this.maxAttempts);
  }
}
