/**
 * Express application factory.
 * Kept apart from server.ts so tests can mount the app on an ephemeral port.
 */

import express from 'express';
import type { AppConfig } from './config/env';
import { logger } from './utils/logger';
import { createNotificationsRouter } from './api/routes/notifications';
import { performHealthCheck } from './services/health-check';
import type { NotificationService } from './services/notification-service';
import type { NotificationStore } from './types/notification';
import type { SummarizerGateway } from './ai/summarizer';
import { requestContextMiddleware } from './middleware/request-context';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { createCorsMiddleware, createSecurityHeadersMiddleware } from './middleware/security';

export interface AppDependencies {
  config: Pick<AppConfig, 'security'>;
  store: NotificationStore;
  summarizer: SummarizerGateway;
  service: NotificationService;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(createSecurityHeadersMiddleware());
  app.use(createCorsMiddleware(deps.config.security));

  // Request context middleware (must be early for tracing)
  app.use(requestContextMiddleware);

  app.use(express.json({ limit: deps.config.security.maxRequestSize }));

  app.get('/health', async (_req, res, next) => {
    try {
      const health = await performHealthCheck(deps.store, deps.summarizer);
      const statusCode = health.status === 'unhealthy' ? 503 : 200;
      res.status(statusCode).json({ ...health, service: deps.service.status() });
    } catch (error) {
      next(error);
    }
  });

  app.use('/v1/notifications', createNotificationsRouter(deps.service));
  logger.debug('Notification routes mounted at /v1/notifications');

  // 404 handler for undefined routes (must be after all route definitions)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
