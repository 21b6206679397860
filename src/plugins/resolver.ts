/**
 * Dependency Resolver - orders plugin candidates so that every dependency is
 * loaded before its dependents.
 *
 * Depth-first topological sort with three colours per plugin name. Both the
 * outer loop and each dependency list are walked in discovery order; that is
 * the only tie-break. Resolution never fails:
 *
 *   - a dependency that is not among the candidates is reported and ignored
 *   - an edge that leads back to a plugin still on the DFS stack closes a
 *     cycle; it is reported and dropped, the walk carries on
 *
 * so the returned order is always a permutation of the input. Whether a
 * plugin may actually load with a missing dependency is decided later by the
 * PluginHost, not here.
 *
 * Example: A ← B ← C (B depends on A, C on B) discovered as C, B, A resolves
 * to A, B, C. A → B → C → A resolves to C, B, A with one dropped edge C → A.
 */

import type { PluginCandidate } from './types.js';
import type { Logger } from '../logging/logger.js';

export type ResolutionIssue =
  | { kind: 'missing-dependency'; plugin: string; dependency: string }
  | { kind: 'cycle'; plugin: string; dependency: string; path: string[] };

export interface ResolutionResult {
  order: PluginCandidate[];
  issues: ResolutionIssue[];
}

const WHITE = 0; // not visited
const GRAY = 1; // in progress (on the stack)
const BLACK = 2; // done

export function resolveLoadOrder(candidates: PluginCandidate[], logger?: Logger): ResolutionResult {
  const byName = new Map<string, PluginCandidate>();
  for (const candidate of candidates) {
    if (!byName.has(candidate.name)) byName.set(candidate.name, candidate);
  }

  const color = new Map<string, number>();
  const order: PluginCandidate[] = [];
  const issues: ResolutionIssue[] = [];

  const visit = (candidate: PluginCandidate, stack: string[]): void => {
    color.set(candidate.name, GRAY);
    stack.push(candidate.name);

    for (const dep of candidate.manifest.dependencies) {
      const target = byName.get(dep);
      if (!target) {
        logger?.warn(`Plugin "${candidate.name}" depends on "${dep}", which was not found`);
        issues.push({ kind: 'missing-dependency', plugin: candidate.name, dependency: dep });
        continue;
      }

      const state = color.get(dep) ?? WHITE;
      if (state === GRAY) {
        const path = [...stack.slice(stack.indexOf(dep)), dep];
        logger?.warn(
          `Dependency cycle detected at plugin "${dep}" (${path.join(' → ')}); ignoring edge "${candidate.name}" → "${dep}"`,
        );
        issues.push({ kind: 'cycle', plugin: candidate.name, dependency: dep, path });
        continue;
      }
      if (state === WHITE) {
        visit(target, stack);
      }
    }

    stack.pop();
    color.set(candidate.name, BLACK);
    order.push(candidate);
  };

  for (const candidate of candidates) {
    // A repeated name cannot be a graph node; keep it in place so nothing is lost.
    if (byName.get(candidate.name) !== candidate) {
      logger?.warn(`Plugin name "${candidate.name}" appears more than once; later copies are not ordered`);
      order.push(candidate);
      continue;
    }
    if ((color.get(candidate.name) ?? WHITE) === WHITE) {
      visit(candidate, []);
    }
  }

  return { order, issues };
}
