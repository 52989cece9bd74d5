export interface PageWindow {
  start: number;
  limit: number;
}

/**
 * Collect results from an offset-paginated endpoint.
 *
 * Each request starts at the number of items collected so far, so a server
 * that returns fewer than `limit` items per call (Confluence caps page size
 * per endpoint) is still walked to the end. Stops on an empty batch or once
 * `max` items are held; the result never exceeds `max`.
 */
export async function paginate<T>(
  fetchBatch: (window: PageWindow) => Promise<T[]>,
  limit: number,
  max = Number.POSITIVE_INFINITY,
): Promise<T[]> {
  const items: T[] = [];

  while (items.length < max) {
    const batch = await fetchBatch({ start: items.length, limit: Math.min(limit, max - items.length) });
    if (batch.length === 0) break;
    items.push(...batch);
  }

  return items.length > max ? items.slice(0, max) : items;
}
