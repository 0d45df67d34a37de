/**
 * Outbound Message Queue
 *
 * Uses BullMQ so replies survive a restart and Twilio hiccups are retried:
 * - 3 attempts with exponential backoff (1s, 2s, 4s)
 * - completed jobs kept for an hour, failed jobs for a day
 *
 * When the queue itself is unreachable the gateway falls back to inline
 * delivery so the user still gets an answer.
 */

import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';
import { OUTBOUND_QUEUE_NAME } from '../../constants/betting';
import { createLogger, errorMessage } from '../../utils/logger';
import { DirectMessageGateway, type MessageGateway } from './messageGateway';
import type { TwilioClient } from './twilioClient';

const logger = createLogger('outboundQueue');

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface OutboundMessageJob {
  to: string;
  body: string;
}

export interface OutboundMessageResult {
  sid: string;
}

export interface OutboundQueueOptions {
  connection: ConnectionOptions;
  concurrency: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

const RETRY_ATTEMPTS = 3;

/** Backoff delay in ms (exponential: 1s, 2s, 4s) */
const BACKOFF_DELAY_MS = 1000;

type Sender = Pick<TwilioClient, 'sendMessage'>;

/** The parts of a BullMQ job the processor reads. */
export type OutboundJob = Pick<Job<OutboundMessageJob, OutboundMessageResult>, 'id' | 'data' | 'attemptsMade'>;

export function createOutboundProcessor(client: Sender): (job: OutboundJob) => Promise<OutboundMessageResult> {
  return async (job) => {
    try {
      const sid = await client.sendMessage(job.data.to, job.data.body);
      return { sid };
    } catch (err) {
      logger.warn(
        { jobId: job.id, to: job.data.to, attempt: job.attemptsMade + 1, error: errorMessage(err) },
        'delivery attempt failed',
      );
      throw err; // Re-throw to trigger retry
    }
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Queue & Worker
// ─────────────────────────────────────────────────────────────────────────────

export class OutboundQueue implements MessageGateway {
  private queue: Queue<OutboundMessageJob, OutboundMessageResult> | null = null;
  private worker: Worker<OutboundMessageJob, OutboundMessageResult> | null = null;
  private readonly inline: DirectMessageGateway;

  constructor(
    private readonly client: Sender,
    private readonly options: OutboundQueueOptions,
  ) {
    this.inline = new DirectMessageGateway(client);
  }

  start(): void {
    if (this.queue && this.worker) {
      logger.warn({}, 'already started');
      return;
    }

    const { connection, concurrency } = this.options;

    this.queue = new Queue<OutboundMessageJob, OutboundMessageResult>(OUTBOUND_QUEUE_NAME, {
      connection,
      defaultJobOptions: {
        attempts: RETRY_ATTEMPTS,
        backoff: { type: 'exponential', delay: BACKOFF_DELAY_MS },
        removeOnComplete: { age: 3600, count: 1000 },
        removeOnFail: { age: 86400 },
      },
    });

    this.worker = new Worker<OutboundMessageJob, OutboundMessageResult>(
      OUTBOUND_QUEUE_NAME,
      createOutboundProcessor(this.client),
      { connection, concurrency },
    );

    this.worker.on('failed', (job, err) => {
      logger.error(
        { jobId: job?.id, to: job?.data.to, attempts: job?.attemptsMade, error: err.message },
        'message permanently failed',
      );
    });

    this.worker.on('error', (err) => {
      logger.error({ error: err.message }, 'worker error');
    });

    logger.info({ concurrency }, 'started');
  }

  async stop(): Promise<void> {
    const closing: Promise<void>[] = [];
    if (this.worker) {
      closing.push(this.worker.close());
      this.worker = null;
    }
    if (this.queue) {
      closing.push(this.queue.close());
      this.queue = null;
    }
    if (closing.length) {
      await Promise.all(closing);
      logger.info({}, 'stopped');
    }
  }

  async send(to: string, body: string): Promise<void> {
    try {
      if (!this.queue) {
        throw new Error('queue not started');
      }
      await this.queue.add('send', { to, body });
    } catch (err) {
      logger.error({ to, error: errorMessage(err) }, 'enqueue failed, delivering inline');
      await this.inline.send(to, body);
    }
  }
}
