#!/usr/bin/env node
/**
 * notice-digest CLI - serve, inspect and migrate regulatory notifications.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { version } from '../../package.json';
import { startCommand } from './commands/start';
import { healthCommand } from './commands/health';
import { statsCommand } from './commands/stats';
import { migrateCommand } from './commands/migrate';

const program = new Command();

program
  .name('notice-digest')
  .description('Browse regulatory notifications and persist AI-generated summaries')
  .version(version);

program.addCommand(startCommand);
program.addCommand(healthCommand);
program.addCommand(statsCommand);
program.addCommand(migrateCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
