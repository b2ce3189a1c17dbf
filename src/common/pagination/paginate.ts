import type { PaginatedResponse } from './pagination.interface.js';

/**
 * Iterate every item of a cursor-paginated collection.
 * `fetchPage` receives `undefined` for the first page, then each `next_cursor`.
 */
export async function* paginate<T>(
  fetchPage: (cursor: string | undefined) => Promise<PaginatedResponse<T>>,
): AsyncGenerator<T, void, undefined> {
  let cursor: string | undefined;

  for (;;) {
    const page = await fetchPage(cursor);
    yield* page.data;

    const next = page.pagination.next_cursor ?? undefined;
    if (!page.pagination.has_more || !next || next === cursor) {
      return;
    }
    cursor = next;
  }
}

/**
 * Drain an async iterable into an array, stopping after `limit` items when given
 */
export async function collectAll<T>(items: AsyncIterable<T>, limit?: number): Promise<T[]> {
  const result: T[] = [];
  if (limit !== undefined && limit <= 0) {
    return result;
  }

  for await (const item of items) {
    result.push(item);
    if (limit !== undefined && result.length >= limit) {
      break;
    }
  }
  return result;
}
