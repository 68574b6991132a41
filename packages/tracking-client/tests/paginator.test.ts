import { describe, it, expect, vi } from 'vitest';
import { paginateEvents, type EventPageSource, type PaginateOptions } from '../src/pagination/paginator';
import type { EventQuery, PaginatedEvents } from '../src/api/types';

const T1 = new Date(Date.UTC(2026, 0, 1, 0, 0, 1));
const T2 = new Date(Date.UTC(2026, 0, 1, 0, 0, 2));
const query: EventQuery = { objectType: 'loc', objectID: '42', limit: 1 };

function page(id: string | null, ts: Date, eventIds: string[]): PaginatedEvents {
  return {
    events: eventIds.map(e => ({ id: e, timestamp: ts })),
    lastKey: id === null ? null : { id, timestamp: ts },
  };
}

function sourceOf(pages: PaginatedEvents[]) {
  const getPaginatedEvents = vi.fn<EventPageSource['getPaginatedEvents']>();
  for (const p of pages) getPaginatedEvents.mockResolvedValueOnce(p);
  return { getPaginatedEvents };
}

async function collect(source: EventPageSource, options: PaginateOptions = {}): Promise<PaginatedEvents[]> {
  const pages: PaginatedEvents[] = [];
  for await (const p of paginateEvents(source, query, options)) pages.push(p);
  return pages;
}

describe('paginateEvents', () => {
  it('follows continuation keys until a page has none', async () => {
    const source = sourceOf([page('e1', T1, ['e1']), page(null, T2, ['e2'])]);

    const pages = await collect(source);

    expect(pages.map(p => p.events[0]?.id)).toEqual(['e1', 'e2']);
    expect(source.getPaginatedEvents).toHaveBeenCalledTimes(2);
    expect(source.getPaginatedEvents.mock.calls[0][0]).toEqual(query);
    expect(source.getPaginatedEvents.mock.calls[1][0]).toEqual({ ...query, lastKeyID: 'e1', lastKeyTimestamp: T1 });
  });

  it('stops at maxPages', async () => {
    const source = sourceOf([page('e1', T1, ['e1']), page('e2', T2, ['e2'])]);
    const pages = await collect(source, { maxPages: 1 });
    expect(pages).toHaveLength(1);
    expect(source.getPaginatedEvents).toHaveBeenCalledTimes(1);
  });

  it('stops on an empty page even if it carries a key', async () => {
    const source = sourceOf([page('e1', T1, []), page('e2', T2, ['e2'])]);
    const pages = await collect(source);
    expect(pages).toHaveLength(1);
  });

  it('stops when the key does not advance', async () => {
    const source = sourceOf([page('e1', T1, ['e1']), page('e1', T1, ['e1']), page('e3', T2, ['e3'])]);
    const pages = await collect(source);
    expect(pages).toHaveLength(2);
    expect(source.getPaginatedEvents).toHaveBeenCalledTimes(2);
  });

  it('passes the signal through', async () => {
    const source = sourceOf([page(null, T1, ['e1'])]);
    const controller = new AbortController();
    await collect(source, { signal: controller.signal });
    expect(source.getPaginatedEvents.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });

  it('propagates errors from the source', async () => {
    const source = sourceOf([page('e1', T1, ['e1'])]);
    source.getPaginatedEvents.mockRejectedValueOnce(new Error('HTTP 503'));
    await expect(collect(source)).rejects.toThrow('HTTP 503');
  });
});
