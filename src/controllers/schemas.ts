/**
 * Request Validation Schemas
 *
 * Twilio posts inbound messages as urlencoded forms with PascalCase fields.
 * Only the fields the conversation needs are validated; the rest are ignored.
 */

import { z } from 'zod';

export const inboundMessageSchema = z.object({
  /** Sender address, e.g. `whatsapp:+15551234567`. */
  From: z.string().trim().min(1),
  Body: z.string().default(''),
  MessageSid: z.string().optional(),
});

export type InboundMessage = z.infer<typeof inboundMessageSchema>;
