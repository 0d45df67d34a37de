import { describe, it, expect } from 'vitest';
import { createHmac } from 'node:crypto';
import {
  computeTwilioSignature,
  isValidTwilioSignature,
  toFormParams,
} from '../../../src/services/webhook/twilioSignature';

const SECRET = 'test-secret';
const WEBHOOK_URL = 'https://bets.test/twilio-webhook';

function hmac(payload: string): string {
  return createHmac('sha1', SECRET).update(payload).digest('base64');
}

describe('computeTwilioSignature', () => {
  it('signs the url followed by the sorted key/value pairs', () => {
    const signature = computeTwilioSignature(SECRET, WEBHOOK_URL, { To: 'whatsapp:+1', Body: 'start', From: 'whatsapp:+2' });

    expect(signature).toBe(hmac(`${WEBHOOK_URL}BodystartFromwhatsapp:+2Towhatsapp:+1`));
  });

  it('includes every value of a repeated key in sorted order', () => {
    const signature = computeTwilioSignature(SECRET, WEBHOOK_URL, { Media: ['b', 'a'] });

    expect(signature).toBe(hmac(`${WEBHOOK_URL}MediaaMediab`));
  });

  it('signs the bare url when there are no params', () => {
    expect(computeTwilioSignature(SECRET, WEBHOOK_URL, {})).toBe(hmac(WEBHOOK_URL));
  });
});

describe('isValidTwilioSignature', () => {
  const params = { From: 'whatsapp:+15551230001', Body: 'bet 1' };

  it('accepts the matching signature', () => {
    const signature = computeTwilioSignature(SECRET, WEBHOOK_URL, params);

    expect(isValidTwilioSignature(SECRET, WEBHOOK_URL, params, signature)).toBe(true);
  });

  it('rejects a signature for different params', () => {
    const signature = computeTwilioSignature(SECRET, WEBHOOK_URL, { ...params, Body: 'bet 2' });

    expect(isValidTwilioSignature(SECRET, WEBHOOK_URL, params, signature)).toBe(false);
  });

  it('rejects a signature made with another secret', () => {
    const signature = computeTwilioSignature('other-secret', WEBHOOK_URL, params);

    expect(isValidTwilioSignature(SECRET, WEBHOOK_URL, params, signature)).toBe(false);
  });

  it('rejects a signature of the wrong length', () => {
    expect(isValidTwilioSignature(SECRET, WEBHOOK_URL, params, 'short')).toBe(false);
  });
});

describe('toFormParams', () => {
  it('keeps string and string-list fields only', () => {
    expect(toFormParams({ Body: 'hi', Media: ['a', 'b'], NumMedia: 0, Nested: { a: 1 }, Mixed: ['a', 1] })).toEqual({
      Body: 'hi',
      Media: ['a', 'b'],
    });
  });

  it('returns no params for a missing body', () => {
    expect(toFormParams(undefined)).toEqual({});
  });
});
