/**
 * Plugin system types
 */

import type { PluginManifest } from './manifest.js';
import type { CapabilityRegistry } from './registry.js';
import type { Logger } from '../logging/logger.js';

/** A validated manifest found during a directory scan. */
export interface PluginCandidate {
  /** Manifest pluginName */
  name: string;
  /** Absolute path to the plugin directory */
  dir: string;
  manifest: PluginManifest;
  /** Position in discovery order */
  index: number;
}

export type PluginStatus =
  | 'discovered'
  | 'validated'
  | 'dependency-wait'
  | 'loaded'
  | 'started'
  | 'failed'
  | 'stopped';

/** What a plugin's code unit may export. Both entry points are optional. */
export interface PluginModule {
  start_plugin?: (registry: CapabilityRegistry, host: HostHandle) => unknown;
  stop_plugin?: () => unknown;
}

/** Runtime representation of a plugin, owned by the PluginHost. */
export interface PluginRecord {
  candidate: PluginCandidate;
  status: PluginStatus;
  /** Set once the code unit has been loaded */
  module?: PluginModule;
  /** Message of the last failure, if any */
  error?: string;
}

/** Read-only view of a record, safe to hand to plugins. */
export interface PluginSummary {
  name: string;
  version: string;
  developer: string;
  permission: PluginManifest['Permission'];
  installationLevel: PluginManifest['InstallationLevel'];
  dependencies: string[];
  status: PluginStatus;
}

/** Second argument of start_plugin. */
export interface HostHandle {
  readonly version: string;
  readonly installRoot: string;
  /** Logger bound to the plugin's own scope */
  readonly logger: Logger;
  listPlugins(): PluginSummary[];
  /** Run work outside the current attribution scope. */
  detach<T>(task: () => T): T;
}

export function toSummary(record: PluginRecord): PluginSummary {
  const { manifest } = record.candidate;
  return {
    name: manifest.pluginName,
    version: manifest.version,
    developer: manifest.Developer,
    permission: manifest.Permission,
    installationLevel: manifest.InstallationLevel,
    dependencies: [...manifest.dependencies],
    status: record.status,
  };
}
