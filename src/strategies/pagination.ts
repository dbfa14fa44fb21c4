/**
 * Page-number pagination over list operations
 */

import { TFEError } from "../core/errors.js";
import type { ListOptions, PaginationNextPrev } from "../core/types.js";

export interface PaginateOptions {
  pageSize?: number;
  /** Stops with an error after this many pages. */
  maxPages?: number;
}

export const DEFAULT_MAX_PAGES = 1000;

/**
 * Yields every item of every page, following nextPage until the server
 * reports there is none.
 *
 * ```ts
 * for await (const ws of paginate((page) => client.workspaces.list("my-org", page))) {
 *   console.log(ws.name);
 * }
 * ```
 */
export async function* paginate<T>(
  fetchPage: (page: ListOptions) => Promise<{ items: T[]; pagination: PaginationNextPrev }>,
  options: PaginateOptions = {}
): AsyncGenerator<T> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const seenPages = new Set<number>();
  let pageNumber = 1;
  let pageCount = 0;

  while (pageNumber !== 0) {
    if (pageCount >= maxPages) {
      throw new TFEError(
        `pagination limit reached: ${maxPages} pages. Narrow the query or raise maxPages.`
      );
    }

    const page: ListOptions = { pageNumber };
    if (options.pageSize !== undefined) {
      page.pageSize = options.pageSize;
    }

    const { items, pagination } = await fetchPage(page);
    seenPages.add(pageNumber);
    pageCount++;

    yield* items;

    const next = pagination.nextPage;
    if (next !== 0 && seenPages.has(next)) {
      throw new TFEError(`pagination cycle detected: page ${next} was requested twice`);
    }
    pageNumber = next;
  }
}
