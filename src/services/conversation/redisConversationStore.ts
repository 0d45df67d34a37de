/**
 * Redis-backed conversation state.
 *
 * State is JSON under `conversation-state:<user>` with a TTL and is
 * validated on load. `transact` serialises in-process callers on a local
 * mutex first, then takes the cross-process Redis lock.
 */

import { CONVERSATION_STATE_PREFIX } from '../../constants/betting';
import { conversationStateSchema, IDLE, type ConversationState } from '../../types';
import { KeyedMutex } from '../../utils/keyedMutex';
import { createLogger, errorMessage } from '../../utils/logger';
import type { RedisCommandClient } from '../../utils/redisClient';
import type { RedisLock } from '../../utils/redisLock';
import type { ConversationStateStore, StateTransition } from './conversationStateStore';

const logger = createLogger('redisConversationStore');

export interface RedisConversationStoreOptions {
  ttlSeconds: number;
  lock: RedisLock;
}

export function conversationStateKey(userId: string): string {
  return `${CONVERSATION_STATE_PREFIX}:${userId}`;
}

export class RedisConversationStore implements ConversationStateStore {
  private readonly local = new KeyedMutex();

  constructor(
    private readonly redis: RedisCommandClient,
    private readonly options: RedisConversationStoreOptions,
  ) {}

  async get(userId: string): Promise<ConversationState> {
    const raw = await this.redis.get(conversationStateKey(userId));
    if (raw === null) return IDLE;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      logger.warn({ userId, error: errorMessage(err) }, 'stored state is not JSON — treating as idle');
      return IDLE;
    }

    const parsed = conversationStateSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn({ userId, issues: parsed.error.issues.length }, 'stored state failed validation — treating as idle');
      return IDLE;
    }
    return parsed.data;
  }

  async transact(userId: string, fn: StateTransition): Promise<ConversationState> {
    return this.local.runExclusive(userId, () =>
      this.options.lock.withLock(userId, async () => {
        const next = await fn(await this.get(userId));
        await this.write(userId, next);
        return next;
      }),
    );
  }

  async clear(userId: string): Promise<void> {
    await this.redis.del(conversationStateKey(userId));
  }

  private async write(userId: string, state: ConversationState): Promise<void> {
    if (state.state === 'idle') {
      await this.clear(userId);
      return;
    }
    await this.redis.set(conversationStateKey(userId), JSON.stringify(state), 'EX', this.options.ttlSeconds);
  }
}
