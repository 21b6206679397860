/**
 * Capability Registry
 *
 * The one channel through which plugins reach each other and the host.
 * Capabilities are stored under (namespace, name); plugins only ever receive
 * this registry, never each other's modules.
 *
 *   registry.register('Weather', 'forecast', (city) => ...);
 *   const forecast = registry.lookup('Weather', 'forecast');
 *   if (forecast) await forecast('Berlin');
 *
 * Every operation is synchronous, so each one completes without interleaving
 * under the event loop. Registering an existing key replaces it.
 */

import type { Logger } from '../logging/logger.js';

/** An opaque callable. Arguments arrive untyped from plugin code. */
export type Capability = (...args: unknown[]) => unknown;

export class CapabilityRegistry {
  private readonly namespaces = new Map<string, Map<string, Capability>>();

  constructor(private readonly logger?: Logger) {}

  /**
   * Insert or overwrite `namespace.name`. Unless `silent`, an info line
   * names the registered key.
   */
  register(namespace: string, name: string, handle: Capability, silent = false): void {
    let entries = this.namespaces.get(namespace);
    if (!entries) {
      entries = new Map();
      this.namespaces.set(namespace, entries);
    }
    entries.set(name, handle);

    if (!silent) {
      this.logger?.info(`Capability registered: ${namespace}.${name}`);
    }
  }

  /** The handle for `namespace.name`, or undefined. Never throws. */
  lookup(namespace: string, name: string): Capability | undefined {
    return this.namespaces.get(namespace)?.get(name);
  }

  has(namespace: string, name: string): boolean {
    return this.lookup(namespace, name) !== undefined;
  }

  /** Capability names in one namespace (empty when unknown). */
  list(namespace: string): string[];
  /** Every namespace with its capability names. */
  list(): Record<string, string[]>;
  list(namespace?: string): string[] | Record<string, string[]> {
    if (namespace !== undefined) {
      return Array.from(this.namespaces.get(namespace)?.keys() ?? []);
    }
    const snapshot: Record<string, string[]> = {};
    for (const [ns, entries] of this.namespaces) {
      snapshot[ns] = Array.from(entries.keys());
    }
    return snapshot;
  }

  /** Total number of registered capabilities across namespaces. */
  get size(): number {
    let total = 0;
    for (const entries of this.namespaces.values()) total += entries.size;
    return total;
  }
}
