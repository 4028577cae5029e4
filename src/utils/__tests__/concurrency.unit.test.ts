import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { SerialQueue } from '@/utils/concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

void describe('SerialQueue', () => {
  void it('runs operations one at a time in call order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const slow = queue.run(async () => {
      events.push('slow:start');
      await delay(20);
      events.push('slow:end');
      return 'slow';
    });
    const fast = queue.run(async () => {
      events.push('fast:start');
      await Promise.resolve();
      events.push('fast:end');
      return 'fast';
    });

    assert.deepEqual(await Promise.all([slow, fast]), ['slow', 'fast']);
    assert.deepEqual(events, ['slow:start', 'slow:end', 'fast:start', 'fast:end']);
  });

  void it('keeps going after a rejected operation', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(() => Promise.reject(new Error('boom')));
    const next = queue.run(() => Promise.resolve(42));

    await assert.rejects(failing, /boom/);
    assert.equal(await next, 42);
  });

  void it('turns a synchronous throw into a rejection of that call only', async () => {
    const queue = new SerialQueue();

    const failing = queue.run((): Promise<number> => {
      throw new Error('sync');
    });

    await assert.rejects(failing, /sync/);
    assert.equal(await queue.run(() => Promise.resolve('after')), 'after');
  });

  void it('reports queued and running operations in size', async () => {
    const queue = new SerialQueue();
    const first = queue.run(() => delay(10));
    const second = queue.run(() => delay(10));

    assert.equal(queue.size, 2);
    await Promise.all([first, second]);
    assert.equal(queue.size, 0);
  });
});
