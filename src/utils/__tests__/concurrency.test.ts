import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter, KeyedMutex } from '../concurrency.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('ConcurrencyLimiter', () => {
  it('never runs more than the limit at once and starts work in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const started: number[] = [];
    let active = 0;
    let maxActive = 0;

    const results = await Promise.all(
      [0, 1, 2, 3, 4].map(index =>
        limiter.run(async () => {
          started.push(index);
          active++;
          maxActive = Math.max(maxActive, active);
          await delay(5);
          active--;
          return index * 10;
        })
      )
    );

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(maxActive).toBe(2);
    expect(started).toEqual([0, 1, 2, 3, 4]);
    expect(limiter.activeCount).toBe(0);
    expect(limiter.pendingCount).toBe(0);
  });

  it('frees the slot when an operation rejects', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  it('rejects a limit below one', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(TypeError);
  });
});

describe('KeyedMutex', () => {
  it('serializes callers of the same key', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}-start`);
      await delay(5);
      events.push(`${name}-end`);
    };

    await Promise.all([mutex.runExclusive('k', task('a')), mutex.runExclusive('k', task('b'))]);

    expect(events).toEqual(['a-start', 'a-end', 'b-start', 'b-end']);
    expect(mutex.isLocked('k')).toBe(false);
  });

  it('runs different keys concurrently', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}-start`);
      await delay(5);
      events.push(`${name}-end`);
    };

    await Promise.all([mutex.runExclusive('x', task('a')), mutex.runExclusive('y', task('b'))]);

    expect(events.slice(0, 2)).toEqual(['a-start', 'b-start']);
  });

  it('releases the key after a failure', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('k', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive('k', async () => 'ok')).resolves.toBe('ok');
  });
});
