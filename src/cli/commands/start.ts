import { Command } from 'commander';

export const startCommand = new Command('start')
  .description('Start the notification API server')
  .option('-p, --port <port>', 'Port to listen on', '5213')
  .option('-b, --backend <backend>', 'Store backend (csv or mongo)')
  .action(async (options: { port: string; backend?: string }) => {
    process.env.PORT = options.port;
    if (options.backend) {
      process.env.STORE_BACKEND = options.backend;
    }
    console.log(`Starting notification service on port ${options.port}...`);
    // Dynamic import so config is read after the overrides above
    await import('../../server');
  });
