// ---------------------------------------------------------------------------
// Keyed run lock: work submitted under the same key runs one at a time, in
// submission order. Different keys do not block each other.
// ---------------------------------------------------------------------------

export function createRunLock() {
  const tails = new Map<string, Promise<void>>();

  return {
    async run<T>(key: string, work: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const current = previous.then(work);
      // The chain continues past a failed run; the caller still sees the error.
      const tail = current.then(
        () => undefined,
        () => undefined,
      );
      tails.set(key, tail);

      try {
        return await current;
      } finally {
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
  };
}

export type RunLock = ReturnType<typeof createRunLock>;
