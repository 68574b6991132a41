import pino from 'pino';
import { nextPageQuery } from '../api/query';
import type { EventQuery, PaginatedEvents, RequestOptions } from '../api/types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

/** The slice of the client the paginator needs. */
export interface EventPageSource {
  getPaginatedEvents(query: EventQuery, options?: RequestOptions): Promise<PaginatedEvents>;
}

export interface PaginateOptions extends RequestOptions {
  maxPages?: number;
}

function sameKey(a: EventQuery, b: EventQuery): boolean {
  return a.lastKeyID === b.lastKeyID
    && a.lastKeyTimestamp?.getTime() === b.lastKeyTimestamp?.getTime();
}

/**
 * Walks continuation keys from `query` onwards, yielding each page.
 * Stops on a page with no key or no events, on a key that repeats, or after
 * `maxPages`. Errors propagate as-is.
 */
export async function* paginateEvents(
  source: EventPageSource,
  query: EventQuery,
  options: PaginateOptions = {},
): AsyncGenerator<PaginatedEvents> {
  const { maxPages, signal } = options;
  let current: EventQuery = query;
  let pageCount = 0;

  while (maxPages === undefined || pageCount < maxPages) {
    const page = await source.getPaginatedEvents(current, { signal });
    pageCount++;
    logger.debug({ pageCount, count: page.events.length, lastKey: page.lastKey?.id }, 'Page fetched');

    yield page;

    const next = nextPageQuery(current, page);
    if (!next || page.events.length === 0) break;
    if (sameKey(current, next)) {
      logger.warn({ lastKeyID: next.lastKeyID }, 'Continuation key did not advance, stopping');
      break;
    }
    current = next;
  }

  logger.debug({ totalPages: pageCount }, 'Pagination complete');
}
