/**
 * Phone number utilities for the carrier integration.
 */

import type { E164PhoneNumber } from './types.ts';

const E164_PATTERN = /^\+[1-9]\d{6,14}$/;

/**
 * Normalize a phone number to E.164 format.
 * Twilio typically sends numbers in E.164 format already,
 * but customer records imported from the business system often do not.
 *
 * @param phone - The phone number to normalize
 * @param defaultCountryCode - Default country code if missing (e.g., '1' for US)
 * @returns E.164 formatted number (e.g., +14155551234)
 */
export function normalizePhoneNumber(phone: string, defaultCountryCode: string = '1'): E164PhoneNumber {
  // Strip all non-digit characters except leading +
  let cleaned = phone.trim().replace(/[^\d+]/g, '');

  if (cleaned.startsWith('+')) {
    return `+${cleaned.slice(1).replace(/\+/g, '')}`;
  }

  // International format with leading 00 (common in Europe)
  if (cleaned.startsWith('00') && cleaned.length > 10) {
    return `+${cleaned.slice(2)}`;
  }

  cleaned = cleaned.replace(/^0+/, '');

  if (cleaned.length === 10 && defaultCountryCode === '1') {
    return `+1${cleaned}`;
  }

  if (cleaned.length === 11 && cleaned.startsWith('1')) {
    return `+${cleaned}`;
  }

  if (cleaned.length > 10) {
    return `+${cleaned}`;
  }

  return `+${defaultCountryCode}${cleaned}`;
}

export function isE164(phone: string): phone is E164PhoneNumber {
  return E164_PATTERN.test(phone);
}
