/**
 * Configuration loader - reads, expands and validates the host config file
 */

import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import JSON5 from 'json5';
import { defaultConfig, validateConfig, type HostConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = join('config', 'host.json5');

type Env = Record<string, string | undefined>;

/** Replace `${VAR}` and `${VAR:-fallback}` with values from `env`. */
export function expandEnvVars(value: string, env: Env = process.env): string {
  return value.replace(/\$\{(\w+)(?::-(.*?))?\}/g, (_, key: string, fallback: string | undefined) => {
    return env[key] ?? fallback ?? '';
  });
}

function expandDeep(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return expandEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => expandDeep(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = expandDeep(val, env);
    }
    return result;
  }
  return obj;
}

export function getConfigPath(installRoot: string): string {
  return join(resolve(installRoot), DEFAULT_CONFIG_FILE);
}

export function parseConfigContent(content: string): unknown {
  const parsed: unknown = JSON5.parse(content);
  return parsed;
}

export interface LoadConfigOptions {
  installRoot: string;
  /** Explicit config file; defaults to <installRoot>/config/host.json5 */
  path?: string;
  env?: Env;
}

/**
 * Load the config file. A missing file yields the defaults; a file that does
 * not parse or validate throws.
 */
export function loadConfig(options: LoadConfigOptions): HostConfig {
  const configPath = options.path ?? getConfigPath(options.installRoot);

  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  const content = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseConfigContent(content);
  } catch (err) {
    throw new Error(`Invalid config ${configPath}: ${(err as Error).message}`);
  }

  const result = validateConfig(expandDeep(parsed, options.env ?? process.env));
  if (!result.success) {
    throw new Error(`Invalid config ${configPath}: ${result.error}`);
  }

  return result.data;
}

/**
 * Write a config file holding the defaults unless one already exists.
 * Returns true when a file was written.
 */
export function writeDefaultConfig(configPath: string): boolean {
  if (existsSync(configPath)) return false;

  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON5.stringify(defaultConfig(), null, 2) + '\n', 'utf-8');
  return true;
}

export interface HostPaths {
  pluginDir: string;
  /** Undefined when file logging is disabled */
  logFile?: string;
}

/** Resolve the config's relative paths against the install root. */
export function resolveHostPaths(config: HostConfig, installRoot: string): HostPaths {
  const root = resolve(installRoot);
  const within = (p: string) => (isAbsolute(p) ? p : join(root, p));
  return {
    pluginDir: within(config.plugins.dir),
    logFile: config.logging.file ? within(config.logging.file) : undefined,
  };
}
