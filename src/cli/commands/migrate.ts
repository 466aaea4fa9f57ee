import { Command } from 'commander';
import { loadConfig } from '../../config/env';
import { NotificationMigration } from '../../services/migration';
import { connectMongoNotificationStore, createCsvNotificationStore } from '../../services/stores';
import { generateRequestId, runWithContext } from '../../utils/logger';

interface MigrateOptions {
  dataDir?: string;
  verify?: boolean;
}

export const migrateCommand = new Command('migrate')
  .description('Copy every CSV notification into MongoDB')
  .option('-d, --data-dir <dir>', 'Directory holding the CSV files')
  .option('--verify', 'List a few notifications per country afterwards')
  // Every log line of one run carries the same id
  .action((options: MigrateOptions) =>
    runWithContext({ requestId: generateRequestId(), command: 'migrate' }, () => migrate(options))
  );

async function migrate(options: MigrateOptions): Promise<void> {
  const appConfig = loadConfig({ ...process.env, DATA_DIR: options.dataDir ?? process.env.DATA_DIR });

  const source = createCsvNotificationStore(appConfig);
  const target = await connectMongoNotificationStore({
    uri: appConfig.mongo.uri,
    database: appConfig.mongo.database,
    optionLimit: appConfig.mongo.optionLimit,
    connectTimeoutMs: appConfig.mongo.connectTimeoutMs,
  });

  console.log('Migrating CSV notifications to MongoDB...');

  try {
    const migration = new NotificationMigration(source, target);
    const report = await migration.migrateAll();

    if (!report.connected) {
      console.error('MongoDB connection failed. Check MONGODB_URI and that the server is running.');
      process.exitCode = 1;
      return;
    }

    for (const entry of report.countries) {
      console.log(`${entry.country}: ${entry.inserted}/${entry.total} migrated, ${entry.failed} failed`);
      console.log(
        `  collection: ${entry.stats.total} total, ${entry.stats.withSummary} with summary, ${entry.stats.withoutSummary} without`
      );
    }

    if (options.verify) {
      const verification = await migration.verify();
      for (const [country, count] of Object.entries(verification.samples)) {
        console.log(`${country}: ${count} notifications listed`);
      }
      if (!verification.success) {
        console.error('Verification failed: some countries have no notifications');
        process.exitCode = 1;
        return;
      }
    }

    if (report.success) {
      console.log('Migration completed successfully');
    } else {
      console.error('Migration finished with failures');
      process.exitCode = 1;
    }
  } finally {
    await Promise.all([source.close(), target.close()]);
  }
}
