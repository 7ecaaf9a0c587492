import { describe, it, expect } from 'vitest';
import { LockTable, Mutex } from '../src/concurrency/mutex.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('Mutex', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive(task('a')),
      mutex.runExclusive(task('b')),
      mutex.runExclusive(task('c')),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when a task rejects', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked).toBe(false);
  });

  it('reports whether work is running or queued', async () => {
    const mutex = new Mutex();
    expect(mutex.isLocked).toBe(false);

    const running = mutex.runExclusive(tick);
    expect(mutex.isLocked).toBe(true);

    await running;
    expect(mutex.isLocked).toBe(false);
  });

  it('keeps a read-modify-write sequence atomic', async () => {
    const mutex = new Mutex();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 20 }, () =>
        mutex.runExclusive(async () => {
          const current = counter;
          await tick();
          counter = current + 1;
        })
      )
    );

    expect(counter).toBe(20);
  });
});

describe('LockTable', () => {
  it('returns the same mutex for the same name', () => {
    const locks = new LockTable();

    expect(locks.get('patients')).toBe(locks.get('patients'));
    expect(locks.get('patients')).not.toBe(locks.get('providers'));
    expect(locks.size).toBe(2);
  });

  it('lets different names proceed independently', async () => {
    const locks = new LockTable();
    const events: string[] = [];

    await Promise.all([
      locks.get('patients').runExclusive(async () => {
        events.push('patients:start');
        await tick();
        await tick();
        events.push('patients:end');
      }),
      locks.get('providers').runExclusive(async () => {
        events.push('providers:start');
        events.push('providers:end');
      }),
    ]);

    expect(events.indexOf('providers:end')).toBeLessThan(events.indexOf('patients:end'));
  });
});
