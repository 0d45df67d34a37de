import express, { type Express } from 'express';
import { errorHandler, notFoundHandler, requestIdMiddleware } from './middleware/errorHandler';
import { createHealthRouter } from './routes/health';
import { createWebhookRouter, type WebhookRouterDeps } from './routes/webhook';
import type { HealthDependencies } from './infrastructure/healthCheck';

export interface AppDependencies extends WebhookRouterDeps {
  health: HealthDependencies;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  // Twilio reaches us through a TLS-terminating proxy; honour X-Forwarded-Proto.
  app.set('trust proxy', true);

  app.use(requestIdMiddleware);
  app.use(createHealthRouter(deps.health));
  app.use(createWebhookRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
