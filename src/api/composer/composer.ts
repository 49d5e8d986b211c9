/**
 * Reply composition: one bounded-length reply per trigger.
 *
 * Generated text longer than the limit is regenerated once with a tighter hint,
 * then cut at a word boundary. Any generation failure falls back to the state
 * template; the caller's committed transition is never touched from here.
 */

import type { AuditEntry } from '../audit/types.ts';
import type { EngineConfig } from '../config.ts';
import type { Contact, ConversationState } from '../conversation/types.ts';
import { GenerationFailureError } from '../errors.ts';
import { createLogger, errorMessage } from '../logger.ts';
import { withTimeout } from '../utils/timeout.ts';
import type { ReplyGenerator } from './generator.ts';
import { templateForState } from './templates.ts';

const log = createLogger('composer');

export type ReplySource = 'generated' | 'truncated' | 'template';

export interface ComposedReply {
  text: string;
  source: ReplySource;
}

export type ComposerConfig = Pick<EngineConfig, 'maxReplyLength' | 'generationTimeoutMs'>;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut `text` to at most `max` UTF-16 units, preferring the last word boundary.
 * A hard cut never splits a surrogate pair.
 */
export function truncateAtWord(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  const cut = text.slice(0, max);
  if (text[max] === ' ') {
    return cut.trimEnd();
  }
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > 0) {
    return cut.slice(0, lastSpace).trimEnd();
  }
  return isHighSurrogate(cut.charCodeAt(cut.length - 1)) ? cut.slice(0, -1) : cut;
}

export class ReplyComposer {
  constructor(
    private readonly generator: ReplyGenerator | null,
    private readonly config: ComposerConfig,
  ) {}

  async compose(contact: Contact, history: AuditEntry[], state: ConversationState): Promise<ComposedReply> {
    const max = this.config.maxReplyLength;

    if (!this.generator) {
      return this.template(state);
    }

    let first: string;
    try {
      first = await this.generate(this.generator, contact, history, state, max);
    } catch (error) {
      log.warn('GenerationFailure, using template reply', {
        contactId: contact.id,
        state,
        reason: error instanceof GenerationFailureError ? error.reason : 'unknown',
        error: errorMessage(error),
      });
      return this.template(state);
    }

    if (first.length <= max) {
      return { text: first, source: 'generated' };
    }

    log.info('Generated reply too long, regenerating', { contactId: contact.id, length: first.length, max });
    let candidate = first;
    try {
      const second = await this.generate(this.generator, contact, history, state, Math.floor(max * 0.75));
      if (second.length <= max) {
        return { text: second, source: 'generated' };
      }
      candidate = second;
    } catch (error) {
      log.warn('Regeneration failed, truncating first reply', { contactId: contact.id, error: errorMessage(error) });
    }

    return { text: truncateAtWord(candidate, max), source: 'truncated' };
  }

  private template(state: ConversationState): ComposedReply {
    return { text: truncateAtWord(templateForState(state), this.config.maxReplyLength), source: 'template' };
  }

  private async generate(
    generator: ReplyGenerator,
    contact: Contact,
    history: AuditEntry[],
    state: ConversationState,
    maxLength: number,
  ): Promise<string> {
    const text = await withTimeout(
      (signal) => generator.generate({ contact, history, state, maxLength, signal }),
      this.config.generationTimeoutMs,
      () => new GenerationFailureError('timeout', `Generation timed out after ${this.config.generationTimeoutMs}ms`),
    );
    const trimmed = text.trim();
    if (!trimmed) {
      throw new GenerationFailureError('empty', 'Generator returned no reply text');
    }
    return trimmed;
  }
}
