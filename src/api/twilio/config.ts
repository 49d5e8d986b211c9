/**
 * Twilio configuration and client initialization.
 */

import Twilio from 'twilio';
import { getSecretFromEnv } from '../config.ts';

export interface TwilioConfig {
  accountSid: string;
  authToken: string;
  /** Either a sender number or a messaging service must be configured */
  fromNumber: string | null;
  messagingServiceSid: string | null;
}

type Env = Record<string, string | undefined>;

/**
 * Check if Twilio is configured with required environment variables.
 */
export function isTwilioConfigured(env: Env = process.env): boolean {
  return !!(
    getSecretFromEnv('TWILIO_ACCOUNT_SID', env) &&
    getSecretFromEnv('TWILIO_AUTH_TOKEN', env) &&
    (env.TWILIO_FROM_NUMBER || env.TWILIO_MESSAGING_SERVICE_SID)
  );
}

/**
 * Get Twilio configuration from environment variables.
 * Throws if required configuration is missing.
 */
export function getTwilioConfig(env: Env = process.env): TwilioConfig {
  const accountSid = getSecretFromEnv('TWILIO_ACCOUNT_SID', env);
  const authToken = getSecretFromEnv('TWILIO_AUTH_TOKEN', env);
  const fromNumber = env.TWILIO_FROM_NUMBER || null;
  const messagingServiceSid = env.TWILIO_MESSAGING_SERVICE_SID || null;

  if (!accountSid || !authToken || (!fromNumber && !messagingServiceSid)) {
    throw new Error(
      'Twilio not configured. Required env vars: TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, and TWILIO_FROM_NUMBER or TWILIO_MESSAGING_SERVICE_SID',
    );
  }

  return { accountSid, authToken, fromNumber, messagingServiceSid };
}

/**
 * The shared secret carrier webhooks are signed with.
 * Returns null when unset so verification fails closed.
 */
export function getWebhookSecret(env: Env = process.env): string | null {
  return getSecretFromEnv('TWILIO_AUTH_TOKEN', env);
}

/**
 * Create a Twilio client instance.
 */
export function createTwilioClient(config: TwilioConfig): Twilio.Twilio {
  return Twilio(config.accountSid, config.authToken);
}
