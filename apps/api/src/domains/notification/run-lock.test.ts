import { describe, it, expect } from 'vitest';
import { createRunLock } from './run-lock.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createRunLock', () => {
  it('serialises work under the same key', async () => {
    const lock = createRunLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('BATCHED', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = lock.run('BATCHED', async () => {
      order.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block other keys', async () => {
    const lock = createRunLock();
    const gate = deferred();
    const blocked = lock.run('BATCHED', () => gate.promise);

    await expect(lock.run('WEEKLY', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('keeps running after a failed run and surfaces the error', async () => {
    const lock = createRunLock();

    const failing = lock.run('BATCHED', async () => {
      throw new Error('adapter exploded');
    });
    const next = lock.run('BATCHED', async () => 'recovered');

    await expect(failing).rejects.toThrow('adapter exploded');
    await expect(next).resolves.toBe('recovered');
  });

  it('accepts new work under a key once earlier runs have drained', async () => {
    const lock = createRunLock();
    await lock.run('WEEKLY', async () => undefined);
    await expect(lock.run('WEEKLY', async () => 'again')).resolves.toBe('again');
  });
});
