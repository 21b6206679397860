/**
 * Plugin Code Loaders
 *
 * Turn a validated candidate into a PluginModule. Two variants:
 *
 *   SourceCodeLoader - reads `plugin.js` from the plugin directory and runs it
 *     with `registry`, `module`, `exports`, `require`, `console`,
 *     `__filename` and `__dirname` bound as parameters, so the registry is
 *     in place before any top-level plugin code executes.
 *   StaticCodeLoader - a registration table of in-process factories, for
 *     plugins shipped with the host and for tests.
 *
 * Security model (SourceCodeLoader):
 *   - Path containment: the entry file is resolved and verified to be inside
 *     the configured plugin root before it is read.
 *   - Symlink rejection: a symlinked entry file is refused.
 *
 * NOTE: plugin code runs in the host process with the host's privileges.
 * Only load plugins from trusted local directories.
 */

import { readFile, lstat } from 'fs/promises';
import { createRequire } from 'module';
import { dirname, join, resolve, sep } from 'path';
import type { CapabilityRegistry } from './registry.js';
import type { PluginCandidate, PluginModule } from './types.js';
import type { PluginConsole } from '../logging/logger.js';

/** Code unit file looked up in each plugin directory. */
export const ENTRY_FILE = 'plugin.js';

// ---------------------------------------------------------------------------
// Exports: path security helpers (exported for testability)
// ---------------------------------------------------------------------------

/**
 * Returns true when `target` is inside (or exactly equal to) `base`.
 * Both paths are resolved to absolute before comparison.
 */
export function isContainedPath(base: string, target: string): boolean {
  const resolvedBase = resolve(base);
  const resolvedTarget = resolve(target);
  return (
    resolvedTarget === resolvedBase ||
    resolvedTarget.startsWith(resolvedBase.endsWith(sep) ? resolvedBase : resolvedBase + sep)
  );
}

/**
 * Returns true when `path` is a symlink.
 * Non-existent paths return false (not a symlink).
 */
export async function isSymlink(path: string): Promise<boolean> {
  try {
    const stats = await lstat(path);
    return stats.isSymbolicLink();
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Loader contract
// ---------------------------------------------------------------------------

/** What a code unit is given at load time. */
export interface CodeUnitContext {
  registry: CapabilityRegistry;
  console: PluginConsole;
}

export interface PluginCodeLoader {
  load(candidate: PluginCandidate, context: CodeUnitContext): Promise<PluginModule>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Narrow whatever a code unit exported into a PluginModule. A `default`
 * object export is honoured; anything that is not a function is ignored.
 */
export function toPluginModule(exported: unknown): PluginModule {
  const source = isRecord(exported) && isRecord(exported['default']) ? exported['default'] : exported;
  if (!isRecord(source)) return {};

  const pluginModule: PluginModule = {};
  const start = source['start_plugin'];
  const stop = source['stop_plugin'];

  if (typeof start === 'function') {
    pluginModule.start_plugin = (registry, host) => Reflect.apply(start, source, [registry, host]);
  }
  if (typeof stop === 'function') {
    pluginModule.stop_plugin = () => Reflect.apply(stop, source, []);
  }
  return pluginModule;
}

// ---------------------------------------------------------------------------
// SourceCodeLoader
// ---------------------------------------------------------------------------

export interface SourceCodeLoaderConfig {
  /** Root directory plugins live under; entries outside it are refused */
  pluginDir: string;
}

export class SourceCodeLoader implements PluginCodeLoader {
  private readonly pluginDir: string;

  constructor(config: SourceCodeLoaderConfig) {
    this.pluginDir = resolve(config.pluginDir);
  }

  async load(candidate: PluginCandidate, context: CodeUnitContext): Promise<PluginModule> {
    const entryPath = resolve(join(candidate.dir, ENTRY_FILE));
    this.assertContained(entryPath);
    await this.assertNotSymlink(entryPath);

    let source: string;
    try {
      source = await readFile(entryPath, 'utf8');
    } catch (err) {
      throw new Error(`Cannot read ${ENTRY_FILE} of plugin "${candidate.name}": ${(err as Error).message}`);
    }

    const moduleObject: { exports: unknown } = { exports: {} };
    const body = `${source}\n//# sourceURL=${entryPath}`;
    let run: Function;
    try {
      run = new Function(
        'registry', 'module', 'exports', 'require', 'console', '__filename', '__dirname',
        body,
      );
    } catch (err) {
      throw new Error(`Cannot compile ${ENTRY_FILE} of plugin "${candidate.name}": ${(err as Error).message}`);
    }
    run(
      context.registry,
      moduleObject,
      moduleObject.exports,
      createRequire(entryPath),
      context.console,
      entryPath,
      dirname(entryPath),
    );

    return toPluginModule(moduleObject.exports);
  }

  // ---- Private helpers -----------------------------------------------------

  private assertContained(target: string): void {
    if (!isContainedPath(this.pluginDir, target)) {
      throw new Error(
        `Security violation: path "${target}" is outside the plugin directory "${this.pluginDir}"`
      );
    }
  }

  private async assertNotSymlink(path: string): Promise<void> {
    if (await isSymlink(path)) {
      throw new Error(`Security violation: plugin entry "${path}" is a symlink, which is not allowed`);
    }
  }
}

// ---------------------------------------------------------------------------
// StaticCodeLoader
// ---------------------------------------------------------------------------

export type PluginFactory = (context: CodeUnitContext) => PluginModule | Promise<PluginModule>;

export class StaticCodeLoader implements PluginCodeLoader {
  private readonly factories = new Map<string, PluginFactory>();

  constructor(entries: Record<string, PluginFactory> = {}) {
    for (const [name, factory] of Object.entries(entries)) {
      this.factories.set(name, factory);
    }
  }

  /** Add or replace the factory for `name`. Returns `this` for chaining. */
  define(name: string, factory: PluginFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  async load(candidate: PluginCandidate, context: CodeUnitContext): Promise<PluginModule> {
    const factory = this.factories.get(candidate.name);
    if (!factory) {
      throw new Error(`No code registered for plugin "${candidate.name}"`);
    }
    return factory(context);
  }
}
