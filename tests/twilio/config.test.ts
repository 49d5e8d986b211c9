import { describe, it, expect } from 'vitest';
import { getTwilioConfig, getWebhookSecret, isTwilioConfigured } from '../../src/api/twilio/config.ts';
import { emptyTwiml, messageTwiml } from '../../src/api/twilio/twiml.ts';

const BASE = { TWILIO_ACCOUNT_SID: 'AC-test', TWILIO_AUTH_TOKEN: 'test-secret' };

describe('Twilio configuration', () => {
  it('needs credentials and a sender', () => {
    expect(isTwilioConfigured({})).toBe(false);
    expect(isTwilioConfigured(BASE)).toBe(false);
    expect(isTwilioConfigured({ ...BASE, TWILIO_FROM_NUMBER: '+15550000000' })).toBe(true);
    expect(isTwilioConfigured({ ...BASE, TWILIO_MESSAGING_SERVICE_SID: 'MG-test' })).toBe(true);
  });

  it('reads the sender settings', () => {
    expect(getTwilioConfig({ ...BASE, TWILIO_MESSAGING_SERVICE_SID: 'MG-test' })).toEqual({
      accountSid: 'AC-test',
      authToken: 'test-secret',
      fromNumber: null,
      messagingServiceSid: 'MG-test',
    });
  });

  it('throws when incomplete', () => {
    expect(() => getTwilioConfig(BASE)).toThrow('Twilio not configured');
  });

  it('signs webhooks with the auth token', () => {
    expect(getWebhookSecret(BASE)).toBe('test-secret');
    expect(getWebhookSecret({})).toBeNull();
  });
});

describe('TwiML responses', () => {
  it('acknowledges without a message', () => {
    expect(emptyTwiml()).toBe('<?xml version="1.0" encoding="UTF-8"?><Response/>');
  });

  it('carries a reply message', () => {
    expect(messageTwiml('Messages Stopped')).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><Response><Message>Messages Stopped</Message></Response>',
    );
  });
});
