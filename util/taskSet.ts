/**
 * Tracks spawned background tasks so they can be awaited as a group.
 * Tasks remove themselves once settled.
 */
export class TaskSet {
  private tasks = new Set<Promise<unknown>>();

  get size(): number {
    return this.tasks.size;
  }

  spawn<T>(task: Promise<T>): Promise<T> {
    const tracked = task.finally(() => {
      this.tasks.delete(tracked);
    });
    this.tasks.add(tracked);

    return tracked;
  }

  /**
   * Waits for every task currently tracked (and any spawned while waiting)
   * to settle, or for `timeoutMs` to elapse.
   * @returns true if the set drained within the bound.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const settled = (async () => {
      while (this.tasks.size > 0) {
        await Promise.allSettled([...this.tasks]);
      }

      return true as const;
    })();

    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
