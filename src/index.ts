#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { registerRunCommand } from './cli/run.js';
import { registerPluginsCommand } from './cli/plugins.js';

const VERSION = '0.1.0';
const NAME = 'plugin-host';

program
  .name(NAME)
  .description('Local plugin host')
  .version(VERSION);

registerRunCommand(program);
registerPluginsCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
