export type KeyedLock = {
  runExclusive: <T>(key: string, task: () => Promise<T>) => Promise<T>;
  pendingKeys: () => number;
};

/**
 * Serializes tasks per key. Tasks for different keys run concurrently;
 * tasks for the same key run one at a time in arrival order.
 */
export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  async function runExclusive<T>(
    key: string,
    task: () => Promise<T>,
  ): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (tails.get(key) === tail) {
        tails.delete(key);
      }
    }
  }

  function pendingKeys(): number {
    return tails.size;
  }

  return { runExclusive, pendingKeys };
}
