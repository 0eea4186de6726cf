/**
 * Runs async jobs with a fixed concurrency limit.
 *
 * At most `concurrency` workers pull items from a shared iterator, so a new
 * item starts as soon as a slot frees up. A failing item does not stop the
 * others: every started item settles, then the first error is rethrown.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  const limit = Math.max(1, Math.floor(concurrency));
  const pending = items.entries();
  const errors: unknown[] = [];

  const lane = async (): Promise<void> => {
    for (const [index, item] of pending) {
      try {
        await worker(item, index);
      } catch (error) {
        errors.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, lane));

  if (errors.length > 0) {
    throw errors[0];
  }
}
