import 'dotenv/config';
import { createApp } from './app';
import { assertEnvOnStartup } from './config/env';
import { createRuntime } from './runtime';
import { createLogger, errorMessage } from './utils/logger';
import { closeRedisClient } from './utils/redisClient';

const logger = createLogger('server');

async function main(): Promise<void> {
  const env = assertEnvOnStartup();
  const runtime = createRuntime(env);

  await runtime.catalog.refresh();
  if (env.SEED_PLACEHOLDER_BETS) {
    await runtime.catalog.seedPlaceholderBets(runtime.accounts, env.SEED_BET_COST);
  }

  runtime.outboundQueue?.start();

  const app = createApp(runtime);
  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, 'listening');
  });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'shutting down');
    server.close();
    try {
      await runtime.outboundQueue?.stop();
      await closeRedisClient();
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'error during shutdown');
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  logger.error({ error: errorMessage(err) }, 'failed to start');
  process.exit(1);
});
