/**
 * Plugins Command
 * Inspect the plugin directory without loading any code.
 *
 * Subcommands:
 *   plugins list   - discovered plugins, in resolved load order
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, resolveHostPaths } from '../config/loader.js';
import { OutputAttribution } from '../logging/attribution.js';
import { createLogger } from '../logging/logger.js';
import { ManifestStore } from '../plugins/store.js';
import { resolveLoadOrder, type ResolutionIssue } from '../plugins/resolver.js';
import type { PluginCandidate } from '../plugins/types.js';

export function describeIssue(issue: ResolutionIssue): string {
  if (issue.kind === 'missing-dependency') {
    return `${issue.plugin} depends on ${issue.dependency}, which was not found`;
  }
  return `cycle ${issue.path.join(' → ')} (edge ${issue.plugin} → ${issue.dependency} ignored)`;
}

/** Plain-text listing of a resolved plugin set, one line per entry. */
export function describePlugins(order: PluginCandidate[], issues: ResolutionIssue[]): string[] {
  if (order.length === 0) return ['No plugins found'];

  const lines: string[] = [];
  order.forEach((candidate, i) => {
    const { manifest } = candidate;
    lines.push(`${i + 1}. ${manifest.pluginName} v${manifest.version} - ${manifest.Developer} (${manifest.Permission}, ${manifest.InstallationLevel})`);
    if (manifest.dependencies.length > 0) {
      lines.push(`   depends on: ${manifest.dependencies.join(', ')}`);
    }
  });

  for (const issue of issues) {
    lines.push(`! ${describeIssue(issue)}`);
  }
  return lines;
}

export function registerPluginsCommand(program: Command): void {
  const plugins = program.command('plugins').description('Inspect installed plugins');

  plugins
    .command('list')
    .description('List discovered plugins in load order')
    .option('-r, --root <dir>', 'Install root', process.cwd())
    .action(async (options: { root: string }) => {
      try {
        const config = loadConfig({ installRoot: options.root });
        const { pluginDir } = resolveHostPaths(config, options.root);
        const logger = createLogger(
          { consoleLevel: config.logging.consoleLevel, fileLevel: config.logging.fileLevel },
          new OutputAttribution(),
        );

        const candidates = await new ManifestStore(logger).scan(pluginDir);
        const { order, issues } = resolveLoadOrder(candidates);

        console.log(chalk.bold(`\nPlugins in ${pluginDir}:\n`));
        for (const line of describePlugins(order, issues)) {
          console.log(line.startsWith('!') ? chalk.yellow(`  ${line}`) : `  ${line}`);
        }
        console.log('');
      } catch (err) {
        console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
        process.exitCode = 1;
      }
    });
}
