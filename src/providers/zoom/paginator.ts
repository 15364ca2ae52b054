import { z } from 'zod';
import { parseResponse, type ZoomRequestExecutor } from './request.js';
import { zoomPageSchema, type RequestData } from './types.js';

/**
 * Walks Zoom's page_number based pagination and gathers one array field from every page.
 */
export class ZoomPaginator {
  constructor(
    private readonly executor: ZoomRequestExecutor,
    private readonly pageSize: number
  ) {}

  async paginatedCall<S extends z.ZodTypeAny>(
    path: string,
    data: RequestData | null,
    resultField: string,
    itemSchema: S
  ): Promise<z.infer<S>[]> {
    const params: RequestData = { ...(data ?? {}), page_size: this.pageSize };
    const itemsSchema = z.array(itemSchema);
    const aggregated = new Map<string, z.infer<S>>();
    let anonymous = 0;

    // page_number is 1-indexed. numPages is refreshed after every call so that
    // records added while we are paging are still picked up.
    for (let currentPage = 1, numPages = 1; currentPage <= numPages; currentPage++) {
      params.page_number = currentPage;
      const page = parseResponse(zoomPageSchema, await this.executor.call(path, params), path);
      const items = parseResponse(itemsSchema, page[resultField] ?? [], path);

      for (const item of items) {
        const key = identityOf(item) ?? `#${anonymous++}`;
        aggregated.set(key, item);
      }

      numPages = page.page_count ?? 0;
    }

    return [...aggregated.values()];
  }
}

// Records shift between pages when the listing changes mid-walk; keying on
// identity keeps one copy of each.
function identityOf(item: unknown): string | undefined {
  if (!item || typeof item !== 'object') {
    return undefined;
  }
  for (const field of ['uuid', 'id', 'email']) {
    const value: unknown = Reflect.get(item, field);
    if (typeof value === 'string' || typeof value === 'number') {
      return `${field}:${value}`;
    }
  }
  return undefined;
}
