/**
 * Page-number pagination over GitHub list endpoints.
 *
 * Pages are fetched one at a time through the shared client, so every page
 * passes the same quota gate as any other request.
 */

import { ApiError } from './errors.js';
import type { ApiRequester, QueryParams } from './types.js';

/** GitHub caps per_page at 100 on every list endpoint we walk. */
export const MAX_PER_PAGE = 100;

export interface PaginateOptions {
  /** Largest page the endpoint serves; the cap shrinks it further when smaller */
  maxPerPage?: number;
  /** Stop after yielding this many items */
  maxItems?: number | null;
  query?: QueryParams;
  signal?: AbortSignal;
}

export class Paginator {
  constructor(private client: ApiRequester) {}

  /**
   * Lazily yield raw items from `path`, page 1 onwards.
   *
   * Ends on an empty or short page, or once `maxItems` have been yielded (the
   * last page is fetched whole and truncated). Client errors propagate as-is.
   */
  async *paginate(path: string, options: PaginateOptions = {}): AsyncGenerator<unknown, void, undefined> {
    const maxItems = options.maxItems ?? null;
    if (maxItems !== null && maxItems <= 0) return;

    const perPage = Math.min(options.maxPerPage ?? MAX_PER_PAGE, maxItems ?? Infinity);
    let yielded = 0;

    for (let page = 1; ; page++) {
      options.signal?.throwIfAborted();

      const body = await this.client.request('GET', path, {
        ...options.query,
        page,
        per_page: perPage,
      });
      if (!Array.isArray(body)) {
        throw new ApiError(`Expected a list from ${path}`, 200, 'INVALID_RESPONSE', { path, page });
      }

      for (const item of body) {
        yield item;
        yielded++;
        if (maxItems !== null && yielded >= maxItems) return;
      }

      if (body.length < perPage) return;
    }
  }

  async collect(path: string, options: PaginateOptions = {}): Promise<unknown[]> {
    const items: unknown[] = [];
    for await (const item of this.paginate(path, options)) {
      items.push(item);
    }
    return items;
  }
}
