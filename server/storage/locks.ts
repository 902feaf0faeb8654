export interface KeyedLock {
  runExclusive<T>(key: string, operation: () => Promise<T>): Promise<T>;
  isLocked(key: string): boolean;
}

/**
 * Serializes async operations that share a key. Waiters run in arrival order and
 * a failing operation releases the key like a successful one.
 */
export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    async runExclusive<T>(key: string, operation: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await operation();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
    isLocked(key: string): boolean {
      return tails.has(key);
    }
  };
}
