import { Command } from 'commander';
import { loadConfig } from '../../config/env';
import { parseCountry } from '../../core/notification-normalizer';
import { createNotificationStore } from '../../services/stores';
import { COUNTRIES, type Country, type NotificationStats } from '../../types/notification';

export const statsCommand = new Command('stats')
  .description('Show summary coverage per country')
  .option('-c, --country <country>', 'Only this country (India or USA)')
  .option('-b, --backend <backend>', 'Store backend (csv or mongo)')
  .option('--json', 'Output raw JSON')
  .action(async (options: { country?: string; backend?: string; json?: boolean }) => {
    let countries: readonly Country[] = COUNTRIES;
    if (options.country) {
      const country = parseCountry(options.country);
      if (!country) {
        console.error(`Unknown country: ${options.country}`);
        process.exit(1);
      }
      countries = [country];
    }

    const appConfig = loadConfig({ ...process.env, STORE_BACKEND: options.backend ?? process.env.STORE_BACKEND });
    const store = await createNotificationStore(appConfig);

    try {
      if (!(await store.isAvailable())) {
        console.error(`The ${store.backend} store is not available`);
        process.exitCode = 1;
        return;
      }

      const stats: Array<[Country, NotificationStats]> = [];
      for (const country of countries) {
        stats.push([country, await store.getStats(country)]);
      }

      if (options.json) {
        console.log(JSON.stringify(Object.fromEntries(stats), null, 2));
        return;
      }

      for (const [country, counts] of stats) {
        console.log(`${country}: ${counts.total} notifications, ${counts.withSummary} summarized, ${counts.withoutSummary} pending`);
      }
    } finally {
      await store.close();
    }
  });
