/**
 * Host runtime wiring.
 *
 * Builds the core infrastructure once, in dependency order, and hands each
 * piece to whatever needs it: attribution → logger → registry (+ System
 * capabilities) → plugin host. Nothing here is a module-level singleton.
 */

import { resolve } from 'path';
import { loadConfig, resolveHostPaths, type HostPaths } from './config/loader.js';
import { OutputAttribution } from './logging/attribution.js';
import { createLogger, type Logger } from './logging/logger.js';
import { CapabilityRegistry } from './plugins/registry.js';
import { registerSystemCapabilities } from './plugins/system-capabilities.js';
import { PluginHost } from './plugins/host.js';
import type { PluginCodeLoader } from './plugins/loader.js';
import type { HostConfig } from './config/schema.js';

export interface RuntimeOptions {
  installRoot: string;
  /** Explicit config file; defaults to <installRoot>/config/host.json5 */
  configPath?: string;
  env?: Record<string, string | undefined>;
  /** Builds the logger instead of the config's logging section (tests) */
  createLogger?: (attribution: OutputAttribution) => Logger;
  codeLoader?: PluginCodeLoader;
}

export interface HostRuntime {
  installRoot: string;
  config: HostConfig;
  paths: HostPaths;
  attribution: OutputAttribution;
  logger: Logger;
  registry: CapabilityRegistry;
  host: PluginHost;
}

/** Throws only when the config file is invalid. */
export function createRuntime(options: RuntimeOptions): HostRuntime {
  const installRoot = resolve(options.installRoot);
  const config = loadConfig({ installRoot, path: options.configPath, env: options.env });
  const paths = resolveHostPaths(config, installRoot);

  const attribution = new OutputAttribution();
  const logger = options.createLogger ? options.createLogger(attribution) : createLogger(
    {
      consoleLevel: config.logging.consoleLevel,
      fileLevel: config.logging.fileLevel,
      file: paths.logFile,
      maxSize: config.logging.maxSize,
      maxFiles: config.logging.maxFiles,
    },
    attribution,
  );

  const registry = new CapabilityRegistry(logger);
  registerSystemCapabilities(registry, {
    installRoot,
    shellTimeoutMs: config.shell.timeoutMs,
    logger,
  });

  const host = new PluginHost({
    pluginDir: paths.pluginDir,
    registry,
    logger,
    attribution,
    codeLoader: options.codeLoader,
    version: config.version,
    installRoot,
  });

  return { installRoot, config, paths, attribution, logger, registry, host };
}
