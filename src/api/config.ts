/**
 * Engine configuration, parsed from environment variables with Zod.
 * Passed into processors at construction so tests can build any combination
 * of toggles without touching process state.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.ts';

export const DEFAULT_OPT_OUT_KEYWORDS = ['STOP', 'STOPALL', 'UNSUBSCRIBE', 'CANCEL', 'END', 'QUIT'] as const;

/** Hard ceiling for any outbound body; MAX_REPLY_LENGTH may only lower it. */
export const MAX_OUTBOUND_LENGTH = 320;

const TRUE_VALUES = new Set(['1', 'true', 't', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'f', 'no', 'off', '']);

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return fallback;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got "${value}"` });
      return z.NEVER;
    });

const integer = (fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const keywordList = z
  .string()
  .optional()
  .transform((value) => {
    if (!value) return [...DEFAULT_OPT_OUT_KEYWORDS];
    const keywords = value
      .split(',')
      .map((k) => k.trim().toUpperCase())
      .filter((k) => k.length > 0);
    return keywords.length > 0 ? keywords : [...DEFAULT_OPT_OUT_KEYWORDS];
  });

export const EngineEnvSchema = z.object({
  MAX_ACTIVE: integer(25, 1),
  OUTBOUND_ENABLED: booleanFlag(false),
  SEND_PACE_INTERVAL_MS: integer(1500, 0),
  MAX_REPLY_LENGTH: integer(MAX_OUTBOUND_LENGTH, 1, MAX_OUTBOUND_LENGTH),
  OPT_OUT_KEYWORDS: keywordList,
  GATEWAY_CONCURRENCY: integer(2, 1, 50),
  GATEWAY_TIMEOUT_MS: integer(10_000, 100),
  GENERATION_TIMEOUT_MS: integer(15_000, 100),
  TRANSITION_TABLE_FILE: z.string().min(1).default('config/transitions.json'),
  PUBLIC_BASE_URL: z.string().url('PUBLIC_BASE_URL must be a valid URL').optional(),
});

export interface EngineConfig {
  /** Cap on concurrently engaged (non-terminal, non-start) contacts for campaigns */
  maxActive: number;
  /** Live/staging toggle; when false every send is recorded as suppressed */
  outboundEnabled: boolean;
  /** Minimum interval between admitted campaign sends */
  sendPaceIntervalMs: number;
  maxReplyLength: number;
  optOutKeywords: readonly string[];
  /** Bound on concurrently in-flight gateway sends during a campaign */
  gatewayConcurrency: number;
  gatewayTimeoutMs: number;
  generationTimeoutMs: number;
  transitionTableFile: string;
  /** Externally visible base URL the carrier signs webhooks against */
  publicBaseUrl?: string;
}

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = EngineEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid engine configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return Object.freeze({
    maxActive: values.MAX_ACTIVE,
    outboundEnabled: values.OUTBOUND_ENABLED,
    sendPaceIntervalMs: values.SEND_PACE_INTERVAL_MS,
    maxReplyLength: values.MAX_REPLY_LENGTH,
    optOutKeywords: Object.freeze(values.OPT_OUT_KEYWORDS),
    gatewayConcurrency: values.GATEWAY_CONCURRENCY,
    gatewayTimeoutMs: values.GATEWAY_TIMEOUT_MS,
    generationTimeoutMs: values.GENERATION_TIMEOUT_MS,
    transitionTableFile: values.TRANSITION_TABLE_FILE,
    publicBaseUrl: values.PUBLIC_BASE_URL,
  });
}

/**
 * Get a secret from environment variable or file.
 * Supports:
 * - Direct value: FOO=secret
 * - File-based: FOO_FILE=/path/to/secret
 */
export function getSecretFromEnv(name: string, env: Record<string, string | undefined> = process.env): string | null {
  const value = env[name];
  if (value) return value;

  const filePath = env[`${name}_FILE`];
  if (filePath) {
    try {
      return readFileSync(filePath, 'utf-8').trim() || null;
    } catch {
      return null;
    }
  }

  return null;
}
