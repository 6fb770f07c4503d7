import { afterEach, describe, test, expect, vi } from 'vitest';
import { TaskSet } from './taskSet';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });

  return { promise, resolve };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('TaskSet', () => {
  test('tasks remove themselves once settled', async () => {
    const tasks = new TaskSet();
    const first = deferred<number>();
    const second = deferred<number>();

    const tracked = tasks.spawn(first.promise);
    const failing = tasks.spawn(second.promise.then(() => {
      throw new Error('task failed');
    }));
    expect(tasks.size).toBe(2);

    first.resolve(1);
    await expect(tracked).resolves.toBe(1);
    expect(tasks.size).toBe(1);

    second.resolve(2);
    await expect(failing).rejects.toThrow('task failed');
    expect(tasks.size).toBe(0);
  });

  test('drain resolves true once every task settles', async () => {
    const tasks = new TaskSet();
    const first = deferred<void>();
    const late = deferred<void>();

    void tasks.spawn(
      first.promise.then(() => {
        void tasks.spawn(late.promise);
      }),
    );

    const drained = tasks.drain(1_000);
    first.resolve();
    await Promise.resolve();
    late.resolve();

    await expect(drained).resolves.toBe(true);
    expect(tasks.size).toBe(0);
  });

  test('drain gives up after the timeout', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const tasks = new TaskSet();
    void tasks.spawn(new Promise<void>(() => undefined));

    const drained = tasks.drain(250);
    await vi.advanceTimersByTimeAsync(250);

    await expect(drained).resolves.toBe(false);
    expect(tasks.size).toBe(1);
  });

  test('drain of an empty set is immediate', async () => {
    await expect(new TaskSet().drain(0)).resolves.toBe(true);
  });
});
