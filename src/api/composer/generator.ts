/**
 * Language-generation client for reply text.
 *
 * Default model: gpt-4o-mini over the OpenAI chat completions endpoint.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { AuditEntry } from '../audit/types.ts';
import { getSecretFromEnv } from '../config.ts';
import type { Contact, ConversationState } from '../conversation/types.ts';
import { GenerationFailureError } from '../errors.ts';
import { createLogger, errorMessage } from '../logger.ts';

const log = createLogger('generator');

const DEFAULT_ENDPOINT = 'https://api.openai.com/v1/chat/completions';
const DEFAULT_MODEL = 'gpt-4o-mini';

const DEFAULT_BASE_PROMPT = [
  'You write short SMS replies for a pest control business re-engaging past customers.',
  'Be friendly and plain. Ask at most one question. Never use markdown.',
].join(' ');

/** What the next message should accomplish, per state. */
const STATE_GOALS: Record<ConversationState, string> = {
  start: 'Check in and ask whether they are still seeing any pest activity.',
  interested: 'They are interested. Ask roughly how many square feet need service.',
  action_sqft: 'Confirm the square footage they gave, or ask for it if it is missing.',
  follow_up: 'Thank them and say the team will reach out with a booking.',
  pause: 'Acknowledge they want to pause and let them know they can text back anytime.',
  done: 'Thank them and close the conversation.',
  stop: 'Confirm they will receive no more messages.',
};

export interface GenerationRequest {
  contact: Contact;
  /** Oldest first */
  history: AuditEntry[];
  state: ConversationState;
  maxLength: number;
  signal?: AbortSignal;
}

export interface ReplyGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<string>;
}

export interface GeneratorConfig {
  apiKey: string;
  model: string;
  endpoint: string;
  basePrompt: string;
}

type Env = Record<string, string | undefined>;

/**
 * Generation settings from the environment, or null when no API key is configured
 * (the composer then always uses templates).
 */
export function getGeneratorConfig(env: Env = process.env): GeneratorConfig | null {
  const apiKey = getSecretFromEnv('OPENAI_API_KEY', env);
  if (!apiKey) {
    return null;
  }

  let basePrompt = DEFAULT_BASE_PROMPT;
  if (env.BASE_PROMPT_FILE) {
    basePrompt = readFileSync(env.BASE_PROMPT_FILE, 'utf-8').trim() || DEFAULT_BASE_PROMPT;
  }

  return {
    apiKey,
    model: env.OPENAI_MODEL || DEFAULT_MODEL,
    endpoint: env.OPENAI_ENDPOINT || DEFAULT_ENDPOINT,
    basePrompt,
  };
}

interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
    }),
  ),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string().optional() }).optional(),
});

export function buildMessages(config: Pick<GeneratorConfig, 'basePrompt'>, request: GenerationRequest): ChatMessage[] {
  const { contact, history, state, maxLength } = request;

  const system = [
    config.basePrompt,
    `Goal for this message: ${STATE_GOALS[state]}`,
    `Reply in at most ${maxLength} characters.`,
  ].join('\n');

  const profile = [
    `Customer name: ${contact.display_name}`,
    `Last service: ${contact.last_service ?? 'unknown'}`,
    `Days since service: ${contact.days_since_service ?? 'unknown'}`,
    `Cancelled: ${contact.cancelled ? 'yes' : 'no'}`,
  ].join('\n');

  const turns: ChatMessage[] = history
    .filter((entry) => entry.outcome === 'received' || entry.outcome === 'sent' || entry.outcome === 'suppressed')
    .map((entry): ChatMessage => ({ role: entry.direction === 'in' ? 'user' : 'assistant', content: entry.body }));

  return [{ role: 'system', content: system }, { role: 'user', content: profile }, ...turns];
}

/**
 * OpenAI chat completions reply generator.
 */
export class OpenAIReplyGenerator implements ReplyGenerator {
  readonly name = 'openai';

  constructor(private readonly config: GeneratorConfig) {}

  async generate(request: GenerationRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.config.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          messages: buildMessages(this.config, request),
          temperature: 0.3,
          max_tokens: 160,
        }),
        signal: request.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new GenerationFailureError('timeout', 'OpenAI request timed out', { cause: error });
      }
      throw new GenerationFailureError('network', `OpenAI request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      await this.handleError(response);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GenerationFailureError('http', 'OpenAI returned an unexpected response shape');
    }

    const text = parsed.data.choices[0]?.message.content?.trim() ?? '';
    if (!text) {
      throw new GenerationFailureError('empty', 'OpenAI returned no reply text');
    }

    log.debug('Reply generated', { model: this.config.model, tokens: parsed.data.usage?.total_tokens, length: text.length });
    return text;
  }

  private async handleError(response: Response): Promise<never> {
    const status = response.status;
    let message = `HTTP ${status}`;

    const body = ErrorBodySchema.safeParse(await response.json().catch(() => null));
    if (body.success && body.data.error?.message) {
      message = body.data.error.message;
    }

    if (status === 401 || status === 403) {
      throw new GenerationFailureError('auth', `OpenAI authentication failed: ${message}`);
    }
    throw new GenerationFailureError('http', `OpenAI error: ${message}`);
  }
}
