import { describe, it, expect } from 'vitest';
import { safeParseManifest, validateManifest } from '../manifest.js';
import { createTestLogger, manifestFor } from './helpers.js';

describe('PluginManifestSchema', () => {
  it('accepts a complete manifest', () => {
    const result = safeParseManifest(manifestFor('Alpha', ['Beta']));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.pluginName).toBe('Alpha');
      expect(result.data.dependencies).toEqual(['Beta']);
    }
  });

  it('defaults dependencies to an empty list', () => {
    const { dependencies: _omitted, ...raw } = manifestFor('Alpha');
    const result = safeParseManifest(raw);
    expect(result.success && result.data.dependencies).toEqual([]);
  });

  it('keeps unknown keys', () => {
    const result = safeParseManifest({ ...manifestFor('Alpha'), homepage: 'https://example.test' });
    expect(result.success && result.data['homepage']).toBe('https://example.test');
  });

  it.each(['version', 'pluginName', 'Developer', 'Permission', 'InstallationLevel'])(
    'rejects a manifest without %s',
    (field) => {
      const raw = manifestFor('Alpha');
      delete raw[field];
      const result = safeParseManifest(raw);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.issues).toHaveLength(1);
        expect(result.issues[0]).toMatch(new RegExp(`^${field}: `));
      }
    },
  );

  it('rejects values outside the permission enums', () => {
    const result = safeParseManifest({ ...manifestFor('Alpha'), Permission: 'Root', InstallationLevel: 'Super' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues.map((i) => i.split(':')[0])).toEqual(['Permission', 'InstallationLevel']);
    }
  });

  it('rejects an empty plugin name', () => {
    expect(safeParseManifest({ ...manifestFor('Alpha'), pluginName: '' }).success).toBe(false);
  });

  it('rejects non-object input', () => {
    const result = safeParseManifest('not a manifest');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0]).toMatch(/^\(manifest\): /);
    }
  });
});

describe('validateManifest', () => {
  it('returns true without logging for a valid manifest', () => {
    const { logger, capture } = createTestLogger();
    expect(validateManifest(manifestFor('Alpha'), logger)).toBe(true);
    expect(capture.entries).toHaveLength(0);
  });

  it('warns once per invalid field', () => {
    const { logger, capture } = createTestLogger();
    const raw = manifestFor('Alpha');
    delete raw['Developer'];
    delete raw['version'];

    expect(validateManifest(raw, logger)).toBe(false);
    const warnings = capture.messages('warn');
    expect(warnings).toHaveLength(2);
    expect(warnings.every((m) => m.startsWith('Invalid manifest field '))).toBe(true);
  });
});
