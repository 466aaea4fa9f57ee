/**
 * Store selection. The backend is chosen once at startup from configuration;
 * callers only ever see the `NotificationStore` contract.
 *
 * @module services/stores
 */

import type { AppConfig } from '../../config/env';
import type { NotificationStore } from '../../types/notification';
import { logger } from '../../utils/logger';
import { CsvNotificationStore } from './csv-notification-store';
import { connectMongoNotificationStore } from './mongo-notification-store';

export { CsvNotificationStore } from './csv-notification-store';
export { connectMongoNotificationStore } from './mongo-notification-store';

export function createCsvNotificationStore(appConfig: Pick<AppConfig, 'csv'>): CsvNotificationStore {
  return new CsvNotificationStore({
    dataDir: appConfig.csv.dataDir,
    files: {
      India: appConfig.csv.indiaFile,
      USA: appConfig.csv.usaFile
    },
    optionLimit: appConfig.csv.optionLimit
  });
}

export async function createNotificationStore(
  appConfig: Pick<AppConfig, 'store' | 'csv' | 'mongo'>
): Promise<NotificationStore> {
  if (appConfig.store.backend === 'mongo') {
    logger.info('NotificationStore: using MongoDB backend', { database: appConfig.mongo.database });
    return connectMongoNotificationStore({
      uri: appConfig.mongo.uri,
      database: appConfig.mongo.database,
      optionLimit: appConfig.mongo.optionLimit,
      connectTimeoutMs: appConfig.mongo.connectTimeoutMs
    });
  }

  logger.info('NotificationStore: using CSV backend', { dataDir: appConfig.csv.dataDir });
  const store = createCsvNotificationStore(appConfig);
  await store.isAvailable();
  return store;
}
