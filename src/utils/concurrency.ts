/**
 * Maps `items` through `task` with at most `limit` tasks in flight. Results
 * keep the order of `items` whatever order the tasks settle in. The first
 * rejection rejects the whole call once in-flight tasks have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;
  const failures: unknown[] = [];

  const worker = async () => {
    while (next < items.length && failures.length === 0) {
      const index = next++;
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
