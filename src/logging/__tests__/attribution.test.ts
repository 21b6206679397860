import { describe, it, expect } from 'vitest';
import { OutputAttribution, CORE_SCOPE } from '../attribution.js';
import { Logger } from '../logger.js';
import { CaptureTransport } from '../../plugins/__tests__/helpers.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('OutputAttribution', () => {
  it('reports core outside any scope', () => {
    const attribution = new OutputAttribution();
    expect(attribution.current()).toBe(CORE_SCOPE);
    expect(attribution.active()).toBeUndefined();
  });

  it('binds the scope for the duration of run()', () => {
    const attribution = new OutputAttribution();
    const seen = attribution.run('alpha', () => attribution.current());
    expect(seen).toBe('alpha');
    expect(attribution.current()).toBe(CORE_SCOPE);
  });

  it('releases the scope when the wrapped call throws', () => {
    const attribution = new OutputAttribution();
    expect(() =>
      attribution.run('alpha', () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(attribution.active()).toBeUndefined();
  });

  it('releases the scope when the wrapped promise rejects', async () => {
    const attribution = new OutputAttribution();
    await expect(
      attribution.run('alpha', async () => {
        await tick();
        throw new Error('late boom');
      }),
    ).rejects.toThrow('late boom');
    expect(attribution.active()).toBeUndefined();
  });

  it('keeps the scope across awaits inside run()', async () => {
    const attribution = new OutputAttribution();
    const seen = await attribution.run('alpha', async () => {
      await tick();
      return attribution.current();
    });
    expect(seen).toBe('alpha');
  });

  it('detach() runs work with no active scope', () => {
    const attribution = new OutputAttribution();
    const seen = attribution.run('alpha', () => attribution.detach(() => attribution.current()));
    expect(seen).toBe(CORE_SCOPE);
  });

  it('does not leak a scope into a concurrently running chain', async () => {
    const attribution = new OutputAttribution();
    const cap = new CaptureTransport();
    const log = new Logger({ transports: [cap], attribution });

    const scoped = attribution.run('X', async () => {
      log.info('x-1');
      await tick();
      log.info('x-2');
    });
    const unscoped = (async () => {
      log.info('core-1');
      await tick();
      log.info('core-2');
    })();
    await Promise.all([scoped, unscoped]);

    const byMessage = Object.fromEntries(cap.entries.map((e) => [e.message, e.component]));
    expect(byMessage).toEqual({ 'x-1': 'X', 'x-2': 'X', 'core-1': 'core', 'core-2': 'core' });
  });
});
