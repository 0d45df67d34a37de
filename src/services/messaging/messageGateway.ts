/**
 * Message Gateway
 *
 * Outbound text delivery. `send` never rejects: a message that cannot be
 * delivered (or enqueued) is logged and dropped.
 */

import { createLogger, errorMessage } from '../../utils/logger';
import type { TwilioClient } from './twilioClient';

const logger = createLogger('messageGateway');

export interface MessageGateway {
  send(to: string, body: string): Promise<void>;
}

/** Delivers inline through the Twilio REST API. */
export class DirectMessageGateway implements MessageGateway {
  constructor(private readonly client: Pick<TwilioClient, 'sendMessage'>) {}

  async send(to: string, body: string): Promise<void> {
    try {
      const sid = await this.client.sendMessage(to, body);
      logger.debug({ to, sid }, 'message sent');
    } catch (err) {
      logger.error({ to, error: errorMessage(err) }, 'failed to send message');
    }
  }
}
