/**
 * One-shot copy of every CSV partition into MongoDB.
 *
 * Not part of the serving path: run from the CLI, report counts, exit.
 *
 * @module services/migration
 */

import { COUNTRIES, type Country, type NotificationStats } from '../types/notification';
import { logger } from '../utils/logger';
import type { CsvNotificationStore } from './stores/csv-notification-store';
import type { MongoNotificationStore } from './stores/mongo-notification-store';

export interface CountryMigrationReport {
  country: Country;
  total: number;
  inserted: number;
  failed: number;
  /** Target collection counts after the copy. */
  stats: NotificationStats;
}

export interface MigrationReport {
  connected: boolean;
  countries: CountryMigrationReport[];
  success: boolean;
}

export interface VerificationReport {
  success: boolean;
  samples: Record<Country, number>;
}

const PROGRESS_INTERVAL = 1000;
const VERIFY_SAMPLE_SIZE = 5;

export class NotificationMigration {
  constructor(
    private readonly source: CsvNotificationStore,
    private readonly target: MongoNotificationStore,
    private readonly countries: readonly Country[] = COUNTRIES
  ) {}

  async migrateCountry(country: Country): Promise<CountryMigrationReport> {
    const notifications = await this.source.readAll(country);
    logger.info('Migration: copying partition', { country, total: notifications.length });

    let inserted = 0;
    let failed = 0;

    for (const notification of notifications) {
      if (await this.target.insertNotification(country, notification)) {
        inserted++;
        if (inserted % PROGRESS_INTERVAL === 0) {
          logger.info('Migration: progress', { country, inserted });
        }
      } else {
        failed++;
      }
    }

    const stats = await this.target.getStats(country);
    logger.info('Migration: partition done', { country, total: notifications.length, inserted, failed, stats });
    return { country, total: notifications.length, inserted, failed, stats };
  }

  /**
   * Migrate every partition in turn. A partition counts as successful when its
   * source loaded and no insert failed.
   */
  async migrateAll(): Promise<MigrationReport> {
    if (!(await this.target.isAvailable())) {
      logger.error('Migration: MongoDB not connected, nothing migrated');
      return { connected: false, countries: [], success: false };
    }

    const countries: CountryMigrationReport[] = [];
    for (const country of this.countries) {
      countries.push(await this.migrateCountry(country));
    }

    const success = countries.every((report) => report.total > 0 && report.failed === 0);
    return { connected: true, countries, success };
  }

  /** Each partition must list at least one notification after migration. */
  async verify(): Promise<VerificationReport> {
    const samples: Record<Country, number> = { India: 0, USA: 0 };

    for (const country of this.countries) {
      const options = await this.target.listOptions(country, VERIFY_SAMPLE_SIZE);
      samples[country] = options.length;
    }

    const success = this.countries.every((country) => samples[country] > 0);
    return { success, samples };
  }
}
