/**
 * Conversation State Store
 *
 * Per-user dialogue state with an atomic read-modify-write. Absence of an
 * entry is `idle`; committing `idle` removes the entry.
 */

import { IDLE, type ConversationState } from '../../types';
import { KeyedMutex } from '../../utils/keyedMutex';

export type StateTransition = (current: ConversationState) => Promise<ConversationState>;

export interface ConversationStateStore {
  get(userId: string): Promise<ConversationState>;
  /**
   * Run `fn` on the current state with exclusive access for `userId` and
   * persist what it returns. If `fn` throws, nothing is written and the
   * error propagates.
   */
  transact(userId: string, fn: StateTransition): Promise<ConversationState>;
  clear(userId: string): Promise<void>;
}

interface StoredState {
  state: ConversationState;
  expiresAt: number;
}

export interface InMemoryConversationStoreOptions {
  ttlSeconds: number;
  now?: () => number;
}

export class InMemoryConversationStore implements ConversationStateStore {
  private readonly entries = new Map<string, StoredState>();
  private readonly mutex = new KeyedMutex();
  private readonly now: () => number;

  constructor(private readonly options: InMemoryConversationStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  async get(userId: string): Promise<ConversationState> {
    return this.read(userId);
  }

  async transact(userId: string, fn: StateTransition): Promise<ConversationState> {
    return this.mutex.runExclusive(userId, async () => {
      const next = await fn(this.read(userId));
      this.write(userId, next);
      return next;
    });
  }

  async clear(userId: string): Promise<void> {
    this.entries.delete(userId);
  }

  size(): number {
    return this.entries.size;
  }

  private read(userId: string): ConversationState {
    const entry = this.entries.get(userId);
    if (!entry) return IDLE;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(userId);
      return IDLE;
    }
    return entry.state;
  }

  private write(userId: string, state: ConversationState): void {
    if (state.state === 'idle') {
      this.entries.delete(userId);
      return;
    }
    this.entries.set(userId, { state, expiresAt: this.now() + this.options.ttlSeconds * 1000 });
  }
}
