export interface PoolFailure<T> {
  item: T;
  error: unknown;
}

/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 *
 * Each worker pulls the next index from a shared cursor. A task that throws
 * does not stop its worker or its siblings; the failure goes to `onFailure`
 * as it happens and is returned once every item has been attempted.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<void>,
  onFailure?: (failure: PoolFailure<T>) => void
): Promise<PoolFailure<T>[]> {
  const width = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  const failures: PoolFailure<T>[] = [];

  let cursor = 0;
  async function worker(): Promise<void> {
    while (true) {
      const idx = cursor++;
      if (idx >= items.length) break;
      const item = items[idx];
      try {
        await task(item, idx);
      } catch (error) {
        const failure = { item, error };
        failures.push(failure);
        onFailure?.(failure);
      }
    }
  }

  if (items.length === 0) return failures;
  await Promise.all(Array.from({ length: width }, () => worker()));
  return failures;
}
