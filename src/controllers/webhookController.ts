import type { Request, Response } from 'express';
import type { ConversationService } from '../services/conversation/conversationService';
import type { InboundDeduplicator } from '../services/webhook/inboundDeduplicator';
import { createLogger } from '../utils/logger';
import { inboundMessageSchema } from './schemas';

const logger = createLogger('webhookController');

/**
 * Twilio only needs an empty 200; replies go out through the REST API.
 */
function acknowledge(res: Response): void {
  res.status(200).end();
}

export function createWebhookController(
  conversation: Pick<ConversationService, 'handleInbound'>,
  deduplicator: Pick<InboundDeduplicator, 'complete' | 'release'>,
) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = inboundMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn({ fields: parsed.error.issues.map((issue) => issue.path.join('.')) }, 'inbound message without sender ignored');
      acknowledge(res);
      return;
    }

    const { From: sender, Body: body, MessageSid: messageSid } = parsed.data;
    logger.info({ user: sender, messageSid }, 'inbound message');

    try {
      await conversation.handleInbound(sender, body);
    } catch (err) {
      if (messageSid) await deduplicator.release(messageSid);
      throw err;
    }
    if (messageSid) await deduplicator.complete(messageSid);
    acknowledge(res);
  };
}
