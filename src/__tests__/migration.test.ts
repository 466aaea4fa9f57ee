import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { NotificationMigration } from '../services/migration';
import type { CsvNotificationStore } from '../services/stores/csv-notification-store';
import type { MongoNotificationStore } from '../services/stores/mongo-notification-store';
import type { Country, Notification } from '../types/notification';
import { logger } from '../utils/logger';

function notice(id: string): Notification {
  return { id, date: '2024-01-01', title: `Notice ${id}`, url: `https://example.org/${id}`, text: 'Body.' };
}

function createSource(partitions: Record<Country, Notification[]>) {
  return {
    readAll: vi.fn(async (country: Country) => partitions[country]),
  };
}

function createTarget(available = true) {
  const inserted: Record<Country, string[]> = { India: [], USA: [] };
  return {
    inserted,
    isAvailable: vi.fn(async () => available),
    insertNotification: vi.fn(async (country: Country, notification: Notification) => {
      if (inserted[country].includes(notification.id)) return false;
      inserted[country].push(notification.id);
      return true;
    }),
    getStats: vi.fn(async (country: Country) => ({
      total: inserted[country].length,
      withSummary: 0,
      withoutSummary: inserted[country].length,
    })),
    listOptions: vi.fn(async (country: Country, limit?: number) =>
      inserted[country].slice(0, limit).map((id) => ({ id, title: '', date: '', hasSummary: false }))
    ),
  };
}

function migrationOf(source: ReturnType<typeof createSource>, target: ReturnType<typeof createTarget>) {
  return new NotificationMigration(
    source as unknown as CsvNotificationStore,
    target as unknown as MongoNotificationStore
  );
}

describe('NotificationMigration', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('copies every partition and reports counts', async () => {
    const source = createSource({ India: [notice('IND-1'), notice('IND-2')], USA: [notice('0')] });
    const target = createTarget();

    const report = await migrationOf(source, target).migrateAll();

    expect(report).toEqual({
      connected: true,
      success: true,
      countries: [
        {
          country: 'India',
          total: 2,
          inserted: 2,
          failed: 0,
          stats: { total: 2, withSummary: 0, withoutSummary: 2 },
        },
        {
          country: 'USA',
          total: 1,
          inserted: 1,
          failed: 0,
          stats: { total: 1, withSummary: 0, withoutSummary: 1 },
        },
      ],
    });
    expect(target.inserted).toEqual({ India: ['IND-1', 'IND-2'], USA: ['0'] });
    expect(target.getStats).toHaveBeenCalledWith('India');
    expect(target.getStats).toHaveBeenCalledWith('USA');
  });

  it('counts duplicate ids as failures', async () => {
    const source = createSource({ India: [notice('IND-1'), notice('IND-1')], USA: [notice('0')] });
    const target = createTarget();

    const report = await migrationOf(source, target).migrateAll();

    expect(report.countries[0]).toEqual({
      country: 'India',
      total: 2,
      inserted: 1,
      failed: 1,
      stats: { total: 1, withSummary: 0, withoutSummary: 1 },
    });
    expect(report.success).toBe(false);
  });

  it('fails when a source partition is empty', async () => {
    const source = createSource({ India: [notice('IND-1')], USA: [] });

    const report = await migrationOf(source, createTarget()).migrateAll();

    expect(report.countries[1]).toEqual({
      country: 'USA',
      total: 0,
      inserted: 0,
      failed: 0,
      stats: { total: 0, withSummary: 0, withoutSummary: 0 },
    });
    expect(report.success).toBe(false);
  });

  it('migrates nothing when the target is not connected', async () => {
    const source = createSource({ India: [notice('IND-1')], USA: [notice('0')] });
    const target = createTarget(false);

    const report = await migrationOf(source, target).migrateAll();

    expect(report).toEqual({ connected: false, countries: [], success: false });
    expect(source.readAll).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith('Migration: MongoDB not connected, nothing migrated');
  });

  it('logs progress every thousand inserts', async () => {
    const many = Array.from({ length: 2000 }, (_, i) => notice(`IND-${i}`));
    const source = createSource({ India: many, USA: [notice('0')] });

    await migrationOf(source, createTarget()).migrateCountry('India');

    expect(logger.info).toHaveBeenCalledWith('Migration: progress', { country: 'India', inserted: 1000 });
    expect(logger.info).toHaveBeenCalledWith('Migration: progress', { country: 'India', inserted: 2000 });
  });

  describe('verify', () => {
    it('samples five notifications per partition', async () => {
      const source = createSource({
        India: Array.from({ length: 7 }, (_, i) => notice(`IND-${i}`)),
        USA: [notice('0')],
      });
      const target = createTarget();
      const migration = migrationOf(source, target);
      await migration.migrateAll();

      expect(await migration.verify()).toEqual({ success: true, samples: { India: 5, USA: 1 } });
      expect(target.listOptions).toHaveBeenCalledWith('India', 5);
    });

    it('fails when a partition is empty in the target', async () => {
      const target = createTarget();
      target.inserted.India.push('IND-1');

      const migration = migrationOf(createSource({ India: [], USA: [] }), target);

      expect(await migration.verify()).toEqual({ success: false, samples: { India: 1, USA: 0 } });
    });
  });
});
