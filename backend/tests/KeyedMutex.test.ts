import { describe, test, expect } from 'vitest';
import { KeyedMutex } from '../src/utils/KeyedMutex';

function tick(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 1));
}

describe('KeyedMutex', () => {
  test('runs tasks on the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) => mutex.runExclusive('session-1', async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    });

    const results = await Promise.all([task('a'), task('b'), task('c')]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  test('lets different keys interleave', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (key: string) => mutex.runExclusive(key, async () => {
      events.push(`${key}:start`);
      await tick();
      events.push(`${key}:end`);
    });

    await Promise.all([task('x'), task('y')]);

    expect(events.slice(0, 2)).toEqual(['x:start', 'y:start']);
  });

  test('releases the lock when a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(mutex.isLocked('k')).toBe(false);
    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
  });
});
