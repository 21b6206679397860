/**
 * Manifest Store
 *
 * Scans a plugin directory: every immediate sub-directory holding a
 * `_manifest.json` is a candidate. Manifests that cannot be read, parsed or
 * validated are logged and dropped; nothing here throws for a bad plugin.
 *
 * Sub-directories are visited in name order, which fixes discovery order and
 * with it the order the resolver breaks ties in.
 */

import { readdir, readFile, lstat } from 'fs/promises';
import type { Stats } from 'fs';
import { join, resolve } from 'path';
import { MANIFEST_FILE, safeParseManifest } from './manifest.js';
import type { PluginCandidate } from './types.js';
import type { Logger } from '../logging/logger.js';

export class ManifestStore {
  constructor(private readonly logger: Logger) {}

  /**
   * Return validated candidates in discovery order. A directory that is
   * missing or cannot be listed yields an empty list.
   */
  async scan(directory: string): Promise<PluginCandidate[]> {
    const root = resolve(directory);

    let entries: string[];
    try {
      entries = await readdir(root);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.warn(`Plugin directory ${root} does not exist`);
        return [];
      }
      this.logger.error(`Cannot read plugin directory ${root}`, err);
      return [];
    }

    const candidates: PluginCandidate[] = [];
    const seen = new Set<string>();

    for (const entryName of [...entries].sort()) {
      const dir = join(root, entryName);

      let stats: Stats;
      try {
        stats = await lstat(dir);
      } catch (err) {
        this.logger.error(`Cannot stat ${dir}, skipping`, err);
        continue;
      }
      if (stats.isSymbolicLink()) {
        this.logger.warn(`Skipping ${dir}: plugin directories may not be symlinks`);
        continue;
      }
      if (!stats.isDirectory()) continue;

      const raw = await this.readManifest(dir);
      if (raw === undefined) continue;

      const parsed = safeParseManifest(raw);
      if (!parsed.success) {
        for (const issue of parsed.issues) {
          this.logger.warn(`Invalid manifest in ${dir}: ${issue}`);
        }
        continue;
      }

      const name = parsed.data.pluginName;
      if (seen.has(name)) {
        this.logger.warn(`Duplicate plugin name "${name}" in ${dir}; keeping the first one found`);
        continue;
      }
      seen.add(name);

      candidates.push({ name, dir, manifest: parsed.data, index: candidates.length });
      this.logger.debug(`Discovered plugin ${name} v${parsed.data.version}`);
    }

    return candidates;
  }

  /** Whether a plugin named `name` is discoverable in `directory`. */
  async has(directory: string, name: string): Promise<boolean> {
    const candidates = await this.scan(directory);
    return candidates.some((c) => c.name === name);
  }

  /**
   * Read and JSON-parse the manifest of one plugin directory. Returns
   * undefined (after logging) when there is nothing usable.
   */
  private async readManifest(dir: string): Promise<unknown> {
    const manifestPath = join(dir, MANIFEST_FILE);

    let content: string;
    try {
      content = await readFile(manifestPath, 'utf8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.debug(`No ${MANIFEST_FILE} in ${dir}, skipping`);
      } else {
        this.logger.error(`Failed to read manifest in ${dir}`, err);
      }
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      this.logger.error(`Failed to parse manifest in ${dir}`, err);
      return undefined;
    }
  }
}
