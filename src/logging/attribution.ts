/**
 * Output attribution - which plugin is producing output right now.
 *
 * A scope id is bound to the current async execution chain via
 * AsyncLocalStorage. Anything that chain logs while the scope is active is
 * tagged with it; concurrently running chains (and worker threads) never see
 * it. Outside any scope the current scope is `core`.
 *
 * Usage:
 *   const attribution = new OutputAttribution();
 *   await attribution.run('my-plugin', () => plugin.start_plugin(registry, host));
 *   attribution.current(); // 'core' again, even if start_plugin threw
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/** Tag used for output produced outside any plugin scope. */
export const CORE_SCOPE = 'core';

export class OutputAttribution {
  private readonly storage = new AsyncLocalStorage<string>();

  /**
   * Enter `scopeId`, run `fn`, and leave the scope again on every exit path.
   * If `fn` returns a promise the scope covers its whole async continuation.
   */
  run<T>(scopeId: string, fn: () => T): T {
    return this.storage.run(scopeId, fn);
  }

  /** Run `fn` with no active scope, e.g. for background work a plugin hands off. */
  detach<T>(fn: () => T): T {
    return this.storage.exit(fn);
  }

  /** Active scope id, or undefined outside any scope. */
  active(): string | undefined {
    return this.storage.getStore();
  }

  /** Active scope id, falling back to `core`. */
  current(): string {
    return this.storage.getStore() ?? CORE_SCOPE;
  }
}
