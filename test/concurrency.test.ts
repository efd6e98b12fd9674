import { Lock, PromisePool } from '../lib/util/concurrency';
import { deferred } from './util';

test('pool runs no more than its limit at once', async () => {
  const pool = new PromisePool(2);
  let active = 0;
  let maxActive = 0;

  const results = await pool.all([1, 2, 3, 4, 5].map(n => async () => {
    active += 1;
    maxActive = Math.max(maxActive, active);
    await new Promise(ok => setTimeout(ok, 5));
    active -= 1;
    return n * 10;
  }));

  expect(results).toEqual([10, 20, 30, 40, 50]);
  expect(maxActive).toEqual(2);
});

test('a thunk that throws synchronously rejects its own promise only', async () => {
  const pool = new PromisePool(1);

  const failing = pool.queue((): Promise<number> => { throw new Error('boom'); });
  const succeeding = pool.queue(() => Promise.resolve(3));

  await expect(failing).rejects.toThrow('boom');
  await expect(succeeding).resolves.toEqual(3);
});

test('allSettled waits for every thunk', async () => {
  const pool = new PromisePool(3);

  const results = await pool.allSettled([
    () => Promise.resolve('a'),
    () => Promise.reject(new Error('b')),
    () => Promise.resolve('c'),
  ]);

  expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
});

test('pool needs a positive size', () => {
  expect(() => new PromisePool(0)).toThrow('Need a positive integer, got: 0');
});

test('lock runs blocks one after the other', async () => {
  const lock = new Lock();
  const order = new Array<string>();
  const gate = deferred();

  const first = lock.withLock(async () => {
    order.push('first start');
    await gate.promise;
    order.push('first end');
  });
  const second = lock.withLock(async () => {
    order.push('second');
  });

  await new Promise(ok => setTimeout(ok, 5));
  expect(order).toEqual(['first start']);

  gate.resolve();
  await Promise.all([first, second]);
  expect(order).toEqual(['first start', 'first end', 'second']);
});

test('lock is released when a block fails', async () => {
  const lock = new Lock();

  await expect(lock.withLock(() => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
  await expect(lock.withLock(() => Promise.resolve('yes'))).resolves.toEqual('yes');
});
