/**
 * Runs `worker` over `items` with at most `concurrency` keys in flight. Items that
 * share a key run one after another in input order; a worker owns a whole key
 * until it is drained, so no key is ever handled twice at once. After `signal`
 * aborts, in-flight items finish and nothing new starts. The first worker error
 * stops new work and is rethrown once in-flight items settle.
 */
export async function runPartitioned<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  concurrency: number,
  worker: (item: T) => Promise<unknown>,
  signal?: AbortSignal
): Promise<void> {
  const lanes = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const lane = lanes.get(key);
    if (lane) {
      lane.push(item);
    } else {
      lanes.set(key, [item]);
    }
  }

  const pending = [...lanes.values()];
  const outcome: { failure: { error: unknown } | null } = { failure: null };

  const drain = async (): Promise<void> => {
    for (let lane = pending.shift(); lane; lane = pending.shift()) {
      for (const item of lane) {
        if (outcome.failure || signal?.aborted) {
          return;
        }
        try {
          await worker(item);
        } catch (error) {
          outcome.failure ??= { error };
          return;
        }
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, pending.length));
  await Promise.all(Array.from({ length: workers }, () => drain()));

  if (outcome.failure) {
    throw outcome.failure.error;
  }
}
