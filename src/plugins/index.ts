/**
 * Plugins module exports
 *
 *   - manifest - Zod schema for `_manifest.json` + helpers
 *   - store - ManifestStore, directory scanning
 *   - resolver - dependency ordering
 *   - registry - CapabilityRegistry
 *   - loader - SourceCodeLoader / StaticCodeLoader
 *   - host - PluginHost lifecycle orchestration
 *   - system-capabilities - the host's own `System` namespace
 */

export * from './manifest.js';
export * from './store.js';
export * from './resolver.js';
export * from './registry.js';
export * from './loader.js';
export * from './host.js';
export * from './system-capabilities.js';
export * from './types.js';
