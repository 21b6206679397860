/**
 * PluginHost bring-up: ordering, isolation of failures, missing
 * dependencies, output attribution and shutdown.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PluginHost } from '../host.js';
import { CapabilityRegistry } from '../registry.js';
import { StaticCodeLoader } from '../loader.js';
import { createTestLogger, manifestFor, writePlugin } from './helpers.js';
import type { HostHandle } from '../types.js';

describe('PluginHost', () => {
  let root: string;
  let test: ReturnType<typeof createTestLogger>;
  let registry: CapabilityRegistry;
  let code: StaticCodeLoader;

  const createHost = () =>
    new PluginHost({
      pluginDir: root,
      registry,
      logger: test.logger,
      attribution: test.attribution,
      codeLoader: code,
      version: '9.9.9',
      installRoot: '/srv/host',
    });

  /** [component, message] pairs at one level */
  const tagged = (level: 'info' | 'warn' | 'error') =>
    test.capture.entries.filter((e) => e.level === level).map((e) => [e.component, e.message]);

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'plugin-host-'));
    test = createTestLogger();
    registry = new CapabilityRegistry(test.logger);
    code = new StaticCodeLoader();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('starts plugins dependencies first', async () => {
    const started: string[] = [];
    writePlugin(root, 'a-app', manifestFor('App', ['Storage']));
    writePlugin(root, 'b-storage', manifestFor('Storage', ['Core']));
    writePlugin(root, 'c-core', manifestFor('Core'));
    for (const name of ['App', 'Storage', 'Core']) {
      code.define(name, () => ({ start_plugin: () => { started.push(name); } }));
    }

    const summary = await createHost().bringUp();

    expect(summary.order).toEqual(['Core', 'Storage', 'App']);
    expect(started).toEqual(['Core', 'Storage', 'App']);
    expect(summary.counts.started).toBe(3);
  });

  it('lets a dependency register capabilities its dependent uses at start', async () => {
    writePlugin(root, 'consumer', manifestFor('Consumer', ['Provider']));
    writePlugin(root, 'provider', manifestFor('Provider'));
    let answer: unknown;
    code.define('Provider', () => ({
      start_plugin: (reg: CapabilityRegistry) => reg.register('Provider', 'answer', () => 42),
    }));
    code.define('Consumer', () => ({
      start_plugin: (reg: CapabilityRegistry) => { answer = reg.lookup('Provider', 'answer')?.(); },
    }));

    await createHost().bringUp();

    expect(answer).toBe(42);
  });

  it('holds back a plugin with a missing dependency and starts the rest', async () => {
    writePlugin(root, 'd', manifestFor('D', ['Z']));
    writePlugin(root, 'e', manifestFor('E'));
    const started: string[] = [];
    code.define('D', () => ({ start_plugin: () => { started.push('D'); } }));
    code.define('E', () => ({ start_plugin: () => { started.push('E'); } }));

    const host = createHost();
    const skipped: Array<[string, string[]]> = [];
    host.on('plugin:skipped', (name: string, missing: string[]) => skipped.push([name, missing]));

    const summary = await host.bringUp();

    expect(started).toEqual(['E']);
    expect(host.getPlugin('D')?.status).toBe('dependency-wait');
    expect(host.getPlugin('D')?.error).toBe('Missing dependencies: Z');
    expect(host.getPlugin('E')?.status).toBe('started');
    expect(skipped).toEqual([['D', ['Z']]]);
    expect(summary.issues).toEqual([{ kind: 'missing-dependency', plugin: 'D', dependency: 'Z' }]);
    expect(tagged('warn')).toContainEqual(['D', 'Plugin "D" declares missing dependencies (Z); not loading it']);
  });

  it('isolates a start failure to its own plugin', async () => {
    writePlugin(root, 'e', manifestFor('E'));
    writePlugin(root, 'f', manifestFor('F'));
    code.define('E', () => ({ start_plugin: () => { throw new Error('E exploded'); } }));
    code.define('F', () => ({ start_plugin: async () => undefined }));

    const host = createHost();
    const failures: string[] = [];
    host.on('plugin:failed', (name: string, error: Error) => failures.push(`${name}: ${error.message}`));

    const summary = await host.bringUp();

    expect(host.getPlugin('E')?.status).toBe('failed');
    expect(host.getPlugin('E')?.error).toBe('E exploded');
    expect(host.getPlugin('F')?.status).toBe('started');
    expect(failures).toEqual(['E: E exploded']);
    expect(tagged('error')).toEqual([['E', 'Plugin "E" failed to start']]);
    expect(summary.counts).toMatchObject({ started: 1, failed: 1 });
  });

  it('marks a plugin whose code fails to load as failed and carries on', async () => {
    writePlugin(root, 'bad', manifestFor('Bad'));
    writePlugin(root, 'good', manifestFor('Good'));
    code.define('Bad', () => { throw new Error('cannot compile'); });
    code.define('Good', () => ({ start_plugin: () => undefined }));

    const host = createHost();
    await host.bringUp();

    expect(host.getPlugin('Bad')?.status).toBe('failed');
    expect(host.getPlugin('Good')?.status).toBe('started');
    expect(tagged('error')).toEqual([['Bad', 'Failed to load plugin "Bad"']]);
  });

  it('leaves a plugin without start_plugin loaded', async () => {
    writePlugin(root, 'passive', manifestFor('Passive'));
    code.define('Passive', () => ({}));

    const host = createHost();
    await host.bringUp();

    expect(host.getPlugin('Passive')?.status).toBe('loaded');
    expect(tagged('warn')).toContainEqual(['core', 'Plugin "Passive" has no start_plugin entry point']);
  });

  it('tags plugin output with the plugin name and host output with core', async () => {
    writePlugin(root, 'talker', manifestFor('Talker'));
    code.define('Talker', (ctx) => {
      ctx.console.log('loading');
      return { start_plugin: () => { ctx.console.log('hello from %s', 'Talker'); } };
    });

    await createHost().bringUp();

    const info = tagged('info');
    expect(info).toContainEqual(['Talker', 'loading']);
    expect(info).toContainEqual(['Talker', 'hello from Talker']);
    expect(info).toContainEqual(['core', 'Starting plugin: Talker']);
    expect(info).toContainEqual(['core', 'Plugin system ready: 1 of 1 plugin(s) started']);
  });

  it('keeps the scope on background work and drops it when detached', async () => {
    writePlugin(root, 'worker', manifestFor('Worker'));
    let background: Promise<void> = Promise.resolve();
    code.define('Worker', (ctx) => ({
      start_plugin: (_reg: CapabilityRegistry, host: HostHandle) => {
        background = Promise.all([
          new Promise<void>((resolve) => setTimeout(() => { ctx.console.log('tick'); resolve(); }, 5)),
          host.detach(() => new Promise<void>((resolve) => setTimeout(() => { ctx.console.log('detached tick'); resolve(); }, 5))),
        ]).then(() => undefined);
      },
    }));

    await createHost().bringUp();
    await background;

    const info = tagged('info');
    expect(info).toContainEqual(['Worker', 'tick']);
    expect(info).toContainEqual(['core', 'detached tick']);
  });

  it('hands each plugin a host handle bound to its name', async () => {
    writePlugin(root, 'inspector', manifestFor('Inspector'));
    let seen: { version: string; installRoot: string; names: string[] } | undefined;
    code.define('Inspector', () => ({
      start_plugin: (_reg: CapabilityRegistry, host: HostHandle) => {
        host.logger.info('via handle');
        seen = { version: host.version, installRoot: host.installRoot, names: host.listPlugins().map((p) => p.name) };
      },
    }));

    await createHost().bringUp();

    expect(seen).toEqual({ version: '9.9.9', installRoot: '/srv/host', names: ['Inspector'] });
    expect(tagged('info')).toContainEqual(['Inspector', 'via handle']);
  });

  it('stops started plugins in reverse order', async () => {
    const stopped: string[] = [];
    writePlugin(root, 'a', manifestFor('A'));
    writePlugin(root, 'b', manifestFor('B', ['A']));
    writePlugin(root, 'c', manifestFor('C'));
    for (const name of ['A', 'B', 'C']) {
      code.define(name, () => ({
        start_plugin: () => undefined,
        stop_plugin: () => { stopped.push(name); },
      }));
    }

    const host = createHost();
    await host.bringUp();
    await host.stopAll();

    expect(host.getLoadOrder()).toEqual(['A', 'B', 'C']);
    expect(stopped).toEqual(['C', 'B', 'A']);
    expect(host.listPlugins().map((p) => p.status)).toEqual(['stopped', 'stopped', 'stopped']);
  });

  it('reports every plugin in listPlugins', async () => {
    writePlugin(root, 'one', manifestFor('One', ['Missing']));
    writePlugin(root, 'two', manifestFor('Two'));
    code.define('Two', () => ({ start_plugin: () => undefined }));

    const host = createHost();
    await host.bringUp();

    expect(host.listPlugins()).toEqual([
      {
        name: 'One',
        version: '1.0.0',
        developer: 'Test Dev',
        permission: 'User',
        installationLevel: 'Normal',
        dependencies: ['Missing'],
        status: 'dependency-wait',
      },
      {
        name: 'Two',
        version: '1.0.0',
        developer: 'Test Dev',
        permission: 'User',
        installationLevel: 'Normal',
        dependencies: [],
        status: 'started',
      },
    ]);
  });

  it('comes up empty when the plugin path is not a directory', async () => {
    fs.rmSync(root, { recursive: true, force: true });
    fs.writeFileSync(root, 'not a directory');

    const summary = await createHost().bringUp();

    expect(summary.order).toEqual([]);
    expect(tagged('error')).toEqual([['core', `Cannot read plugin directory ${root}`]]);
  });

  it('accepts a dependency that became discoverable after the scan', async () => {
    writePlugin(root, 'late-user', manifestFor('LateUser', ['Late']));
    code.define('LateUser', () => ({ start_plugin: () => undefined }));

    const host = createHost();
    const { order } = host.resolve(await host.discover());
    writePlugin(root, 'late', manifestFor('Late'));
    await host.loadAll(order);

    expect(host.getPlugin('LateUser')?.status).toBe('loaded');
    expect(host.getPlugin('Late')).toBeUndefined();
  });

  it('comes up empty when the plugin directory is missing', async () => {
    fs.rmSync(root, { recursive: true, force: true });

    const summary = await createHost().bringUp();

    expect(summary.order).toEqual([]);
    expect(summary.counts.started).toBe(0);
  });
});
