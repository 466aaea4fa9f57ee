// Load environment variables from .env file
import 'dotenv/config';

import { loadConfig } from './config/env';
import { logger } from './utils/logger';
import { createApp } from './app';
import { createNotificationStore } from './services/stores';
import { createSummarizer } from './ai/summarizer';
import { NotificationService } from './services/notification-service';

async function main(): Promise<void> {
  // Read at startup so `notice-digest start` overrides apply
  const config = loadConfig();
  const store = await createNotificationStore(config);
  const summarizer = createSummarizer(config);
  const service = new NotificationService(store, summarizer);

  const app = createApp({ config, store, summarizer, service });

  const server = app.listen(config.port, () => {
    logger.info('Notification service listening', {
      port: config.port,
      backend: store.backend,
      storeState: store.getState(),
      summarizer: summarizer.provider,
      summarizerAvailable: summarizer.isAvailable()
    });
  });

  // Generation calls can take a while; keep requests bounded regardless
  server.setTimeout(120_000);

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      service.close()
        .catch((error: unknown) => {
          logger.error('Failed to close notification store', {
            error: error instanceof Error ? error.message : 'unknown'
          });
        })
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', {
    error: error instanceof Error ? error.message : 'unknown'
  });
  process.exit(1);
});
