/**
 * Webhook signature verification for the inbound carrier webhook.
 *
 * The signature check is a pure function of (url, params, signature, secret)
 * so it can be exercised without an HTTP layer. The Fastify adapter only
 * rebuilds the URL the carrier signed.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';

export type WebhookParams = Record<string, string>;

export interface SignatureCheck {
  /** Full URL the carrier posted to, including query string */
  url: string;
  params: WebhookParams;
  signature: string | null | undefined;
  secret: string | null | undefined;
}

/**
 * Compute Twilio's X-Twilio-Signature for a URL and POST parameters:
 * the URL followed by every parameter name and value, sorted by name,
 * HMAC-SHA1 with the auth token, base64.
 *
 * @see https://www.twilio.com/docs/usage/webhooks/webhooks-security
 */
export function computeTwilioSignature(url: string, params: WebhookParams, secret: string): string {
  const data = Object.keys(params)
    .sort()
    .reduce((acc, key) => acc + key + params[key], url);

  return createHmac('sha1', secret).update(Buffer.from(data, 'utf-8')).digest('base64');
}

/**
 * Fails closed: a missing secret, a missing header or any mismatch is invalid.
 */
export function isValidTwilioSignature(check: SignatureCheck): boolean {
  if (!check.secret || !check.signature) {
    return false;
  }

  const expected = Buffer.from(computeTwilioSignature(check.url, check.params, check.secret), 'utf-8');
  const provided = Buffer.from(check.signature, 'utf-8');

  if (provided.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(provided, expected);
}

/**
 * Get the full URL the carrier signed. Behind a proxy, either enable
 * trustProxy or configure the public base URL explicitly.
 */
export function getFullUrl(request: FastifyRequest, publicBaseUrl?: string): string {
  if (publicBaseUrl) {
    return `${publicBaseUrl.replace(/\/+$/, '')}${request.url}`;
  }
  const protocol = request.protocol || 'https';
  const host = request.headers['host'] || request.hostname;
  return `${protocol}://${host}${request.url}`;
}

/**
 * Flatten a parsed form body into string parameters.
 * Repeated keys keep their last value; non-string values are dropped.
 */
export function toWebhookParams(body: unknown): WebhookParams {
  const params: WebhookParams = {};
  if (!body || typeof body !== 'object') {
    return params;
  }
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    } else if (Array.isArray(value) && typeof value[value.length - 1] === 'string') {
      params[key] = value[value.length - 1];
    }
  }
  return params;
}

export function getSignatureHeader(request: FastifyRequest): string | undefined {
  const header = request.headers['x-twilio-signature'];
  return Array.isArray(header) ? header[0] : header;
}

/**
 * Verify the Twilio signature of a Fastify request.
 */
export function verifyTwilioSignature(request: FastifyRequest, secret: string | null, publicBaseUrl?: string): boolean {
  return isValidTwilioSignature({
    url: getFullUrl(request, publicBaseUrl),
    params: toWebhookParams(request.body),
    signature: getSignatureHeader(request),
    secret,
  });
}
