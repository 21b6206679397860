/**
 * Shared fixtures for the plugin tests.
 */

import fs from 'fs';
import path from 'path';
import { Logger } from '../../logging/logger.js';
import { OutputAttribution } from '../../logging/attribution.js';
import { MANIFEST_FILE, PluginManifestSchema } from '../manifest.js';
import type { LogEntry, LogLevel, Transport } from '../../logging/logger.js';
import type { HostHandle, PluginCandidate } from '../types.js';

export class CaptureTransport implements Transport {
  entries: LogEntry[] = [];
  constructor(public level?: LogLevel) {}
  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

export function createTestLogger(attribution = new OutputAttribution()) {
  const capture = new CaptureTransport();
  const logger = new Logger({ level: 'debug', transports: [capture], attribution });
  return { logger, capture, attribution };
}

export function manifestFor(name: string, dependencies: string[] = []): Record<string, unknown> {
  return {
    version: '1.0.0',
    pluginName: name,
    Developer: 'Test Dev',
    Permission: 'User',
    InstallationLevel: 'Normal',
    dependencies,
  };
}

export function makeCandidate(name: string, dependencies: string[] = [], index = 0, dir = `/plugins/${name}`): PluginCandidate {
  return { name, dir, index, manifest: PluginManifestSchema.parse(manifestFor(name, dependencies)) };
}

/** Write `<root>/<dirName>/_manifest.json` (and plugin.js when given). */
export function writePlugin(
  root: string,
  dirName: string,
  manifest: Record<string, unknown> | string,
  code?: string,
): string {
  const dir = path.join(root, dirName);
  fs.mkdirSync(dir, { recursive: true });
  const content = typeof manifest === 'string' ? manifest : JSON.stringify(manifest, null, 2);
  fs.writeFileSync(path.join(dir, MANIFEST_FILE), content);
  if (code !== undefined) {
    fs.writeFileSync(path.join(dir, 'plugin.js'), code);
  }
  return dir;
}

export function stubHostHandle(logger = createTestLogger().logger): HostHandle {
  return {
    version: '0.0.0-test',
    installRoot: '/srv/host',
    logger,
    listPlugins: () => [],
    detach: (task) => task(),
  };
}
