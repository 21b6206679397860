/**
 * Plugin Manifest
 *
 * Zod schema for the `_manifest.json` file every plugin directory carries.
 *
 * Fields:
 *   version           - Plugin version string (free-form, not solved against)
 *   pluginName        - Unique plugin identifier, used as the dependency key
 *   Developer         - Author name or contact
 *   Permission        - System | User | Visitor
 *   InstallationLevel - Admin | Normal
 *   dependencies      - Names of plugins that must load first (optional)
 *
 * Any other keys are kept on the parsed manifest and otherwise ignored.
 */

import { z } from 'zod';
import type { Logger } from '../logging/logger.js';

/** File name looked up in each plugin directory. */
export const MANIFEST_FILE = '_manifest.json';

export const PERMISSION_LEVELS = ['System', 'User', 'Visitor'] as const;
export const INSTALLATION_LEVELS = ['Admin', 'Normal'] as const;

export const PluginManifestSchema = z
  .object({
    version: z.string().min(1),
    pluginName: z.string().min(1),
    Developer: z.string().min(1),
    Permission: z.enum(PERMISSION_LEVELS),
    InstallationLevel: z.enum(INSTALLATION_LEVELS),
    dependencies: z.array(z.string().min(1)).default([]),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

export type PluginManifest = z.infer<typeof PluginManifestSchema>;
export type PermissionLevel = (typeof PERMISSION_LEVELS)[number];
export type InstallationLevel = (typeof INSTALLATION_LEVELS)[number];

export type ManifestParseResult =
  | { success: true; data: PluginManifest }
  | { success: false; issues: string[] };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Safely parse a raw manifest object. Failures come back as one readable line
 * per offending field, e.g. `Permission: Invalid enum value...`.
 */
export function safeParseManifest(raw: unknown): ManifestParseResult {
  const result = PluginManifestSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : '(manifest)';
      return `${field}: ${issue.message}`;
    }),
  };
}

/**
 * Check a raw manifest. Each problem is logged as a warning; returns false
 * when the manifest must not enter the dependency graph.
 */
export function validateManifest(raw: unknown, logger?: Logger): boolean {
  const result = safeParseManifest(raw);
  if (result.success) return true;

  for (const issue of result.issues) {
    logger?.warn(`Invalid manifest field ${issue}`);
  }
  return false;
}
