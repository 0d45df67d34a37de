/**
 * Inbound De-duplication Middleware
 *
 * A webhook whose `MessageSid` was already claimed is acknowledged with an
 * empty 200 and goes no further. Requests without a SID pass through.
 */

import type { Request, Response, NextFunction } from 'express';
import type { InboundDeduplicator } from '../services/webhook/inboundDeduplicator';
import { toFormParams } from '../services/webhook/twilioSignature';
import { createLogger } from '../utils/logger';

const logger = createLogger('inboundDedupe');

export function inboundDedupe(deduplicator: InboundDeduplicator) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const messageSid = toFormParams(req.body).MessageSid;
    if (typeof messageSid !== 'string' || !messageSid) {
      next();
      return;
    }

    if (!(await deduplicator.claim(messageSid))) {
      logger.info({ messageSid }, 'duplicate delivery acknowledged');
      res.status(200).end();
      return;
    }
    next();
  };
}
