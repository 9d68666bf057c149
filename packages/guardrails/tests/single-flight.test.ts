import { describe, it, expect, vi } from 'vitest';
import { SingleFlight } from '../src/cache/single-flight.js';

describe('SingleFlight', () => {
  it('shares one run between concurrent callers of the same key', async () => {
    const flight = new SingleFlight<number>();
    let release: (value: number) => void = () => {};
    const fn = vi.fn(() => new Promise<number>((resolve) => { release = resolve; }));

    const a = flight.run('k', fn);
    const b = flight.run('k', fn);
    expect(flight.pending).toBe(1);
    release(7);

    expect(await a).toBe(7);
    expect(await b).toBe(7);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(flight.pending).toBe(0);
  });

  it('runs different keys independently', async () => {
    const flight = new SingleFlight<string>();
    const results = await Promise.all([
      flight.run('a', async () => 'A'),
      flight.run('b', async () => 'B'),
    ]);
    expect(results).toEqual(['A', 'B']);
  });

  it('clears the key after a rejection so the next call runs fresh', async () => {
    const flight = new SingleFlight<string>();
    await expect(flight.run('k', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(flight.pending).toBe(0);
    await expect(flight.run('k', async () => 'ok')).resolves.toBe('ok');
  });
});
