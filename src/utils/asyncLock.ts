// -----------------------------------------------------------------------------
// Process-wide async mutual exclusion.
// - Callers are served strictly in the order they asked for the lock
// - A failing critical section releases the lock and rejects only its caller
// - Not reentrant: never call the lock from inside a held section
// -----------------------------------------------------------------------------

export type AsyncLock = <T>(fn: () => T | Promise<T>) => Promise<T>;

export function createAsyncLock(): AsyncLock {
  let tail: Promise<void> = Promise.resolve();

  return <T>(fn: () => T | Promise<T>): Promise<T> => {
    const run = tail.then(() => fn());
    tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };
}
