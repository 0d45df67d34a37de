/**
 * Twilio request signing.
 *
 *   base64( HMAC-SHA1( secret, url + key1 + value1 + key2 + value2 … ) )
 *
 * with form keys in sorted order. Repeated keys contribute every value,
 * each value sorted.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export type FormParams = Record<string, string | string[]>;

export function computeTwilioSignature(secret: string, url: string, params: FormParams): string {
  let payload = url;
  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    const values = Array.isArray(value) ? [...value].sort() : [value];
    for (const item of values) {
      payload += key + item;
    }
  }
  return createHmac('sha1', secret).update(payload, 'utf8').digest('base64');
}

export function isValidTwilioSignature(
  secret: string,
  url: string,
  params: FormParams,
  signature: string,
): boolean {
  const expected = Buffer.from(computeTwilioSignature(secret, url, params));
  const provided = Buffer.from(signature);
  return expected.length === provided.length && timingSafeEqual(expected, provided);
}

/** Keep only string (or string list) fields of a parsed urlencoded body. */
export function toFormParams(body: unknown): FormParams {
  const params: FormParams = {};
  if (typeof body !== 'object' || body === null) return params;

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      params[key] = value;
    }
  }
  return params;
}
