import express, { Router } from 'express';
import { createWebhookController } from '../controllers/webhookController';
import { asyncHandler } from '../middleware/errorHandler';
import { inboundDedupe } from '../middleware/inboundDedupe';
import { verifyTwilioSignature, type TwilioSignatureOptions } from '../middleware/twilioSignature';
import type { ConversationService } from '../services/conversation/conversationService';
import type { InboundDeduplicator } from '../services/webhook/inboundDeduplicator';

export const WEBHOOK_PATH = '/twilio-webhook';

export interface WebhookRouterDeps {
  conversation: Pick<ConversationService, 'handleInbound'>;
  deduplicator: InboundDeduplicator;
  signature: TwilioSignatureOptions;
}

export function createWebhookRouter(deps: WebhookRouterDeps): Router {
  const router = Router();

  // Non-strict routing: `/twilio-webhook/` matches as well.
  router.post(
    WEBHOOK_PATH,
    express.urlencoded({ extended: false }),
    verifyTwilioSignature(deps.signature),
    asyncHandler(inboundDedupe(deps.deduplicator)),
    asyncHandler(createWebhookController(deps.conversation, deps.deduplicator)),
  );

  return router;
}
