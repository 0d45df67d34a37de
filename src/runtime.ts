/**
 * Wires the server's collaborators from configuration.
 *
 * Redis and Supabase are optional: without `REDIS_URL` the conversation
 * store, lock and de-duplication stay in-process and replies are sent
 * inline; without Supabase credentials accounts live in memory.
 */

import type { Env } from './config/env';
import { CONVERSATION_LOCK_PREFIX } from './constants/betting';
import type { HealthDependencies } from './infrastructure/healthCheck';
import { AccountRepository, InMemoryAccountStore, type AccountStore } from './repositories';
import { AccountService } from './services/account/accountService';
import { CatalogService } from './services/catalog/catalogService';
import { DataGatewayClient } from './services/catalog/dataGatewayClient';
import { InMemoryConversationStore, type ConversationStateStore } from './services/conversation/conversationStateStore';
import { ConversationService } from './services/conversation/conversationService';
import { RedisConversationStore } from './services/conversation/redisConversationStore';
import { DirectMessageGateway, type MessageGateway } from './services/messaging/messageGateway';
import { OutboundQueue } from './services/messaging/outboundQueue';
import { TwilioClient } from './services/messaging/twilioClient';
import {
  InMemoryInboundDeduplicator,
  RedisInboundDeduplicator,
  type InboundDeduplicator,
} from './services/webhook/inboundDeduplicator';
import type { TwilioSignatureOptions } from './middleware/twilioSignature';
import { getSupabaseAdmin, isSupabaseConfigured } from './supabaseClient';
import { createLogger } from './utils/logger';
import { getRedisClient, getRedisConnectionOptions } from './utils/redisClient';
import { RedisLock } from './utils/redisLock';

const logger = createLogger('runtime');

export interface Runtime {
  accounts: AccountStore;
  catalog: CatalogService;
  conversation: ConversationService;
  deduplicator: InboundDeduplicator;
  messages: MessageGateway;
  outboundQueue: OutboundQueue | null;
  signature: TwilioSignatureOptions;
  health: HealthDependencies;
}

export function createRuntime(env: Env): Runtime {
  const supabase = isSupabaseConfigured() ? getSupabaseAdmin() : undefined;
  const redis = env.REDIS_URL ? getRedisClient() : undefined;

  const accounts: AccountStore = supabase ? new AccountRepository(supabase) : new InMemoryAccountStore();
  logger.info({ store: supabase ? 'supabase' : 'memory' }, 'account store selected');

  let states: ConversationStateStore;
  let deduplicator: InboundDeduplicator;
  const dedupeOptions = {
    ttlSeconds: env.INBOUND_DEDUPE_TTL_SECONDS,
    processingTtlSeconds: env.INBOUND_PROCESSING_TTL_SECONDS,
  };
  if (redis) {
    const lock = new RedisLock(redis, {
      prefix: CONVERSATION_LOCK_PREFIX,
      ttlMs: env.CONVERSATION_LOCK_TTL_MS,
      waitMs: env.CONVERSATION_LOCK_WAIT_MS,
    });
    states = new RedisConversationStore(redis, { ttlSeconds: env.CONVERSATION_TTL_SECONDS, lock });
    deduplicator = new RedisInboundDeduplicator(redis, dedupeOptions);
  } else {
    states = new InMemoryConversationStore({ ttlSeconds: env.CONVERSATION_TTL_SECONDS });
    deduplicator = new InMemoryInboundDeduplicator(dedupeOptions);
  }
  logger.info({ store: redis ? 'redis' : 'memory' }, 'conversation store selected');

  const twilio = new TwilioClient({
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    from: env.TWILIO_PHONE_NUMBER,
  });
  const outboundQueue = redis
    ? new OutboundQueue(twilio, {
        connection: getRedisConnectionOptions(),
        concurrency: env.OUTBOUND_QUEUE_CONCURRENCY,
      })
    : null;
  const messages: MessageGateway = outboundQueue ?? new DirectMessageGateway(twilio);

  const gateway = new DataGatewayClient({
    baseUrl: env.DATA_GATEWAY_BASE_URL,
    token: env.DATA_GATEWAY_TOKEN,
    timeoutMs: env.DATA_GATEWAY_TIMEOUT_MS,
  });
  const catalog = new CatalogService(gateway);

  const conversation = new ConversationService({
    accounts,
    accountService: new AccountService(accounts, { startingBalance: env.STARTING_BALANCE }),
    states,
    messages,
    catalog: () => catalog.getSnapshot(),
    fetchMatches: (eventKey) => gateway.fetchMatches(eventKey),
    settings: { betCost: env.BET_COST, recentBetsLimit: env.RECENT_BETS_LIMIT },
  });

  return {
    accounts,
    catalog,
    conversation,
    deduplicator,
    messages,
    outboundQueue,
    signature: { secret: env.TWILIO_WEBHOOK_SECRET, publicBaseUrl: env.PUBLIC_WEBHOOK_BASE_URL },
    health: { redis, supabase, catalog },
  };
}
