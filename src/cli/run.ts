/**
 * Run Command
 * Bring the plugin system up and keep the process alive until it is
 * interrupted, then stop plugins in reverse order.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, writeDefaultConfig } from '../config/loader.js';
import { createRuntime, type HostRuntime } from '../runtime.js';

interface RunOptions {
  root: string;
  config?: string;
  init?: boolean;
}

function waitForShutdown(): Promise<NodeJS.Signals> {
  // Signal listeners alone do not hold the event loop open.
  const keepAlive = setInterval(() => undefined, 60_000);
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      clearInterval(keepAlive);
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Start the host and every plugin in the plugin directory')
    .option('-r, --root <dir>', 'Install root', process.cwd())
    .option('-c, --config <file>', 'Config file (default: <root>/config/host.json5)')
    .option('--init', 'Write a default config file first if none exists')
    .action(async (options: RunOptions) => {
      if (options.init) {
        const path = options.config ?? getConfigPath(options.root);
        if (writeDefaultConfig(path)) {
          console.log(chalk.dim(`Wrote default config to ${path}`));
        }
      }

      let runtime: HostRuntime;
      try {
        runtime = createRuntime({ installRoot: options.root, configPath: options.config });
      } catch (err) {
        console.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
        return;
      }

      const { host, logger } = runtime;
      logger.info(`Host v${runtime.config.version} starting in ${runtime.installRoot}`);
      await host.bringUp();

      const signal = await waitForShutdown();
      logger.info(`Received ${signal}, stopping plugins`);
      await host.stopAll();
      logger.info('Host stopped');
    });
}
