// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

export type TaskOutcome<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; reason: unknown }
  | { item: T; status: 'skipped' };

/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 * Every item gets its own outcome slot, in input order. Once `signal`
 * aborts, items not yet started are reported as skipped.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
  signal?: AbortSignal,
): Promise<TaskOutcome<T, R>[]> {
  const outcomes = items.map((item): TaskOutcome<T, R> => ({ item, status: 'skipped' }));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      const item = items[index];
      try {
        outcomes[index] = { item, status: 'fulfilled', value: await task(item) };
      } catch (reason) {
        outcomes[index] = { item, status: 'rejected', reason };
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  return outcomes;
}
