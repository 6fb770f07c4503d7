import { describe, test, expect } from 'vitest';
import { ERR_CONSUMED } from '../util/consumable';
import { oneshot } from './oneshot';

describe('oneshot', () => {
  test('delivers the sent value', async () => {
    const [tx, rx] = oneshot<number>();
    expect(rx.isResolved).toBe(false);

    tx.send(42);
    expect(await rx.recv()).toBe(42);
    expect(rx.isResolved).toBe(true);
  });

  test('sender is consumed by sending', () => {
    const [tx] = oneshot();
    expect(tx._isConsumed).toBe(false);

    tx.send();
    expect(tx._isConsumed).toBe(true);
  });

  test('sending twice throws', () => {
    const [tx] = oneshot();
    tx.send();

    expect(() => tx.send()).toThrow(ERR_CONSUMED);
  });

  test('receiver can be awaited more than once', async () => {
    const [tx, rx] = oneshot<string>();
    tx.send('stop');

    expect(await rx.recv()).toBe('stop');
    expect(await rx.recv()).toBe('stop');
  });

  test('receiver stays pending while nothing is sent', async () => {
    const [, rx] = oneshot();
    const winner = await Promise.race([
      rx.recv().then(() => 'received'),
      new Promise((resolve) => setImmediate(() => resolve('pending'))),
    ]);

    expect(winner).toBe('pending');
  });
});
