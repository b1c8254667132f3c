/**
 * Counting semaphore.
 *
 * Holds a fixed number of permits; acquire() resolves once a permit is free
 * and release() hands it to the longest waiter.
 */
export interface Semaphore {
  acquire(): Promise<void>;
  release(): void;
  /** Run fn while holding a permit; the permit is released when fn settles */
  run<T>(fn: () => T | Promise<T>): Promise<T>;
  readonly activeCount: number;
  readonly pendingCount: number;
}

export function createSemaphore(permits: number): Semaphore {
  if (!(Number.isInteger(permits) && permits > 0)) {
    throw new TypeError(`Semaphore needs a positive integer number of permits, got ${permits}`);
  }

  const queue: (() => void)[] = [];
  let activeCount = 0;

  const acquire = (): Promise<void> => {
    if (activeCount < permits) {
      activeCount++;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      queue.push(() => {
        activeCount++;
        resolve();
      });
    });
  };

  const release = (): void => {
    activeCount--;
    const next = queue.shift();
    if (next) {
      next();
    }
  };

  const run = async <T>(fn: () => T | Promise<T>): Promise<T> => {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  };

  return {
    acquire,
    release,
    run,
    get activeCount() {
      return activeCount;
    },
    get pendingCount() {
      return queue.length;
    },
  };
}
