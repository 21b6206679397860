/**
 * Plugin Host
 *
 * Drives bring-up of every plugin in a directory:
 *   - discover() - scan for validated manifests, create records
 *   - resolve() - order candidates so dependencies come first
 *   - loadAll() - load code units in that order
 *   - startAll() - call each loaded plugin's start_plugin
 *   - bringUp() - all of the above, plus a summary
 *   - stopAll() - call stop_plugin in reverse order
 *
 * Everything runs sequentially, so outcomes follow the resolved order
 * exactly. One plugin failing never stops the others: the failure is logged
 * under the plugin's name, its record is marked, and the host moves on.
 * start_plugin is awaited without a timeout; a start call that never settles
 * stalls the plugins after it. Background work a plugin spawns is not
 * tracked.
 *
 * Events emitted (extends EventEmitter):
 *   - "plugin:loaded"  (name: string, record: PluginRecord)
 *   - "plugin:started" (name: string, record: PluginRecord)
 *   - "plugin:skipped" (name: string, missing: string[])
 *   - "plugin:failed"  (name: string, error: Error)
 *   - "plugin:stopped" (name: string, record: PluginRecord)
 */

import { EventEmitter } from 'events';
import { validateManifest } from './manifest.js';
import { ManifestStore } from './store.js';
import { resolveLoadOrder } from './resolver.js';
import { SourceCodeLoader } from './loader.js';
import { toSummary } from './types.js';
import { createAttributedConsole } from '../logging/logger.js';
import type { ResolutionIssue } from './resolver.js';
import type { PluginCodeLoader } from './loader.js';
import type { CapabilityRegistry } from './registry.js';
import type { HostHandle, PluginCandidate, PluginRecord, PluginStatus, PluginSummary } from './types.js';
import type { Logger } from '../logging/logger.js';
import type { OutputAttribution } from '../logging/attribution.js';

// ---------------------------------------------------------------------------
// Host config
// ---------------------------------------------------------------------------

export interface PluginHostConfig {
  /** Directory scanned for plugin sub-directories */
  pluginDir: string;
  registry: CapabilityRegistry;
  logger: Logger;
  attribution: OutputAttribution;
  /** Defaults to a SourceCodeLoader rooted at pluginDir */
  codeLoader?: PluginCodeLoader;
  store?: ManifestStore;
  /** Reported to plugins through the host handle */
  version?: string;
  installRoot?: string;
}

export interface BringUpSummary {
  order: string[];
  issues: ResolutionIssue[];
  counts: Record<PluginStatus, number>;
}

function normalizeError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ---------------------------------------------------------------------------
// PluginHost
// ---------------------------------------------------------------------------

export class PluginHost extends EventEmitter {
  private readonly config: PluginHostConfig;
  private readonly store: ManifestStore;
  private readonly codeLoader: PluginCodeLoader;
  private readonly records = new Map<string, PluginRecord>();
  private loadOrder: string[] = [];

  constructor(config: PluginHostConfig) {
    super();
    this.config = config;
    this.store = config.store ?? new ManifestStore(config.logger);
    this.codeLoader = config.codeLoader ?? new SourceCodeLoader({ pluginDir: config.pluginDir });
  }

  // ---- Bring-up steps ------------------------------------------------------

  /** Scan the plugin directory and create a record per valid candidate. */
  async discover(): Promise<PluginCandidate[]> {
    const candidates = await this.store.scan(this.config.pluginDir);
    for (const candidate of candidates) {
      const record = this.track(candidate);
      if (validateManifest(candidate.manifest, this.config.logger)) {
        record.status = 'validated';
      }
    }
    return candidates;
  }

  resolve(candidates: PluginCandidate[]): { order: PluginCandidate[]; issues: ResolutionIssue[] } {
    return resolveLoadOrder(candidates, this.config.logger);
  }

  /**
   * Load every candidate in `ordered`. A plugin with a dependency that is
   * neither tracked nor discoverable waits (skipped); the rest carry on.
   */
  async loadAll(ordered: PluginCandidate[]): Promise<void> {
    for (const candidate of ordered) {
      this.track(candidate);
      if (!this.loadOrder.includes(candidate.name)) {
        this.loadOrder.push(candidate.name);
      }
    }

    for (const candidate of ordered) {
      const record = this.track(candidate);
      if (record.status === 'failed') continue;

      if (!validateManifest(candidate.manifest, this.config.logger)) {
        this.fail(record, new Error('Manifest failed validation'), 'Skipping plugin with invalid manifest');
        continue;
      }

      const missing: string[] = [];
      for (const dep of candidate.manifest.dependencies) {
        if (!(await this.isAvailable(dep))) missing.push(dep);
      }
      if (missing.length > 0) {
        record.status = 'dependency-wait';
        record.error = `Missing dependencies: ${missing.join(', ')}`;
        this.config.logger.child(candidate.name).warn(
          `Plugin "${candidate.name}" declares missing dependencies (${missing.join(', ')}); not loading it`,
        );
        this.emit('plugin:skipped', candidate.name, missing);
        continue;
      }

      await this.loadOne(candidate);
    }
  }

  /**
   * Load one code unit with the registry bound. Returns false (and marks the
   * plugin failed) when anything throws.
   */
  async loadOne(candidate: PluginCandidate): Promise<boolean> {
    const record = this.track(candidate);
    const { registry, logger, attribution } = this.config;

    try {
      const pluginModule = await attribution.run(candidate.name, () =>
        this.codeLoader.load(candidate, { registry, console: createAttributedConsole(logger) }),
      );
      record.module = pluginModule;
      record.status = 'loaded';
      record.error = undefined;
      logger.info(`Plugin loaded: ${candidate.name} v${candidate.manifest.version} - ${candidate.manifest.Developer}`);
      this.emit('plugin:loaded', candidate.name, record);
      return true;
    } catch (err) {
      this.fail(record, err, `Failed to load plugin "${candidate.name}"`);
      return false;
    }
  }

  /** Start every loaded plugin, in load order, each inside its own scope. */
  async startAll(): Promise<void> {
    const { registry, logger, attribution } = this.config;

    for (const name of this.loadOrder) {
      const record = this.records.get(name);
      if (!record || record.status !== 'loaded') continue;

      const start = record.module?.start_plugin;
      if (!start) {
        logger.warn(`Plugin "${name}" has no start_plugin entry point`);
        continue;
      }

      logger.info(`Starting plugin: ${name}`);
      try {
        const host = this.createHostHandle(name);
        await attribution.run(name, async () => {
          await start(registry, host);
        });
        record.status = 'started';
        logger.info(`Plugin "${name}" started`);
        this.emit('plugin:started', name, record);
      } catch (err) {
        this.fail(record, err, `Plugin "${name}" failed to start`);
      }
    }
  }

  /** discover → resolve → loadAll → startAll, then log and return a summary. */
  async bringUp(): Promise<BringUpSummary> {
    const { logger } = this.config;

    const candidates = await this.discover();
    const { order, issues } = this.resolve(candidates);
    await this.loadAll(order);
    await this.startAll();

    const summary: BringUpSummary = {
      order: order.map((c) => c.name),
      issues,
      counts: this.countByStatus(),
    };

    logger.info(`Plugin system ready: ${summary.counts.started} of ${this.records.size} plugin(s) started`);
    for (const record of this.listRecords()) {
      const { manifest } = record.candidate;
      const line = `${manifest.pluginName} v${manifest.version} - ${manifest.Developer} [${record.status}]`;
      if (record.status === 'started' || record.status === 'loaded') {
        logger.info(line);
      } else {
        logger.warn(record.error ? `${line}: ${record.error}` : line);
      }
    }

    return summary;
  }

  /**
   * Call stop_plugin on every started plugin, last started first. Failures
   * are logged and do not interrupt the sequence.
   */
  async stopAll(): Promise<void> {
    const { logger, attribution } = this.config;

    for (const name of [...this.loadOrder].reverse()) {
      const record = this.records.get(name);
      if (!record || record.status !== 'started') continue;

      const stop = record.module?.stop_plugin;
      try {
        if (stop) {
          await attribution.run(name, async () => {
            await stop();
          });
        }
        record.status = 'stopped';
        this.emit('plugin:stopped', name, record);
      } catch (err) {
        this.fail(record, err, `Plugin "${name}" failed to stop`);
      }
    }
  }

  // ---- Queries -------------------------------------------------------------

  getPlugin(name: string): PluginRecord | undefined {
    return this.records.get(name);
  }

  /** All records, in load order where known, otherwise discovery order. */
  listRecords(): PluginRecord[] {
    const ordered = this.loadOrder
      .map((name) => this.records.get(name))
      .filter((record): record is PluginRecord => record !== undefined);
    const rest = Array.from(this.records.values()).filter((r) => !this.loadOrder.includes(r.candidate.name));
    return [...ordered, ...rest];
  }

  listPlugins(): PluginSummary[] {
    return this.listRecords().map(toSummary);
  }

  getLoadOrder(): string[] {
    return [...this.loadOrder];
  }

  // ---- Private helpers -----------------------------------------------------

  private track(candidate: PluginCandidate): PluginRecord {
    let record = this.records.get(candidate.name);
    if (!record) {
      record = { candidate, status: 'discovered' };
      this.records.set(candidate.name, record);
    }
    return record;
  }

  /**
   * A dependency is satisfied when it has a record from discovery, or is
   * discoverable in the plugin directory now.
   */
  private async isAvailable(name: string): Promise<boolean> {
    return this.records.has(name) || this.store.has(this.config.pluginDir, name);
  }

  private fail(record: PluginRecord, err: unknown, message: string): void {
    const error = normalizeError(err);
    record.status = 'failed';
    record.error = error.message;
    this.config.logger.child(record.candidate.name).error(message, error);
    this.emit('plugin:failed', record.candidate.name, error);
  }

  private createHostHandle(name: string): HostHandle {
    const { attribution, logger } = this.config;
    return {
      version: this.config.version ?? '0.0.0',
      installRoot: this.config.installRoot ?? process.cwd(),
      logger: logger.child(name),
      listPlugins: () => this.listPlugins(),
      detach: (task) => attribution.detach(task),
    };
  }

  private countByStatus(): Record<PluginStatus, number> {
    const counts: Record<PluginStatus, number> = {
      discovered: 0,
      validated: 0,
      'dependency-wait': 0,
      loaded: 0,
      started: 0,
      failed: 0,
      stopped: 0,
    };
    for (const record of this.records.values()) counts[record.status] += 1;
    return counts;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPluginHost(config: PluginHostConfig): PluginHost {
  return new PluginHost(config);
}
