import { Command } from 'commander';
import http from 'http';
import { z } from 'zod';

const healthResponseSchema = z.object({
  status: z.string(),
  checks: z.record(z.object({ status: z.string(), message: z.string() })).optional(),
});

export const healthCommand = new Command('health')
  .description('Check notification service health')
  .option('-p, --port <port>', 'Server port', '5213')
  .option('--json', 'Output raw JSON')
  .action((options: { port: string; json?: boolean }) => {
    const url = `http://localhost:${options.port}/health`;

    http.get(url, (res) => {
      let data = '';
      res.on('data', (chunk) => data += chunk);
      res.on('end', () => {
        let raw: unknown;
        try {
          raw = JSON.parse(data);
        } catch {
          console.error('Failed to parse health response');
          process.exit(1);
        }

        const parsed = healthResponseSchema.safeParse(raw);
        if (!parsed.success) {
          console.error('Unexpected health response');
          process.exit(1);
        }

        const health = parsed.data;
        if (options.json) {
          console.log(JSON.stringify(raw, null, 2));
        } else {
          console.log(`Status: ${health.status.toUpperCase()}`);
          for (const [name, check] of Object.entries(health.checks ?? {})) {
            console.log(`  ${name}: ${check.status} (${check.message})`);
          }
        }
        process.exit(health.status === 'unhealthy' ? 1 : 0);
      });
    }).on('error', (err) => {
      console.error(`Cannot connect to notification service on port ${options.port}: ${err.message}`);
      process.exit(1);
    });
  });
