// ---------------------------------------------------------------------------
// Keyed lock: per-entity mutual exclusion.
//
// Work for the same key runs strictly one at a time in arrival order; work
// for different keys never waits on each other. A key's entry is dropped
// once its queue drains, so the map only holds keys with work in flight.
// ---------------------------------------------------------------------------

export interface KeyedLock {
  run<T>(key: string, fn: () => Promise<T>): Promise<T>;
  /** Number of keys with queued or running work. */
  size(): number;
}

export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => {};
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await fn();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },

    size(): number {
      return tails.size;
    },
  };
}
