/**
 * Minimal Twilio REST client: sends one text message through the
 * Messages resource. Throws on any failure; callers decide whether to retry.
 */

import { z } from 'zod';

const TWILIO_API_BASE = 'https://api.twilio.com/2010-04-01';
const DEFAULT_TIMEOUT_MS = 10_000;

const messageResponseSchema = z.object({ sid: z.string() });

export interface TwilioClientOptions {
  accountSid: string;
  authToken: string;
  /** Sender, e.g. `whatsapp:+14155238886`. */
  from: string;
  timeoutMs?: number;
  apiBaseUrl?: string;
  fetchImpl?: typeof fetch;
}

export class TwilioDeliveryError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'TwilioDeliveryError';
  }
}

export class TwilioClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TwilioClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** Returns the message SID assigned by Twilio. */
  async sendMessage(to: string, body: string): Promise<string> {
    const { accountSid, authToken, from } = this.options;
    const base = this.options.apiBaseUrl ?? TWILIO_API_BASE;
    const url = `${base}/Accounts/${encodeURIComponent(accountSid)}/Messages.json`;
    const auth = Buffer.from(`${accountSid}:${authToken}`).toString('base64');

    const res = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${auth}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ To: to, From: from, Body: body }).toString(),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new TwilioDeliveryError(`Twilio responded ${res.status}: ${detail.slice(0, 200)}`, res.status);
    }

    const parsed = messageResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new TwilioDeliveryError('Twilio response did not include a message sid', res.status);
    }
    return parsed.data.sid;
  }
}
