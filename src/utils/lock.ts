const locks = new Map<string, Promise<unknown>>();

/**
 * Runs `fn` once every earlier task queued under the same key has settled.
 * A rejected task does not block the queue; its error reaches its own caller.
 */
export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const last = locks.get(key) ?? Promise.resolve();
  const run = last.then(fn, fn);
  const tail = run.then(
    () => undefined,
    () => undefined
  );
  locks.set(key, tail);
  try {
    return await run;
  } finally {
    if (locks.get(key) === tail) locks.delete(key);
  }
}
