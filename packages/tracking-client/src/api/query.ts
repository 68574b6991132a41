import { InvalidArgumentError } from './errors';
import type { EventQuery, PaginatedEvents } from './types';

export const EVENTS_ROUTE = 'events';

/** Canonical UTC format: yyyy-MM-ddTHH:mm:ss.SSSZ */
export function formatTimestamp(value: Date, argument = 'timestamp'): string {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidArgumentError(argument, 'is not a valid date');
  }
  return value.toISOString();
}

function addQueryString(uri: string, name: string, value: string): string {
  const separator = uri.includes('?') ? '&' : '?';
  return `${uri}${separator}${encodeURIComponent(name)}=${encodeURIComponent(value)}`;
}

/**
 * Builds the relative URI for a paginated event read.
 *
 * Parameter order is fixed: objectType, objectID, eventType, lastKeyID,
 * lastKeyTS, limit, tsStart, tsEnd. The time window is only sent when both
 * ends are set; a half-open window sends neither.
 */
export function buildEventsQuery(query: EventQuery): string {
  if (query == null) throw new InvalidArgumentError('query');
  if (query.objectType == null) throw new InvalidArgumentError('objectType');
  if (query.objectID == null) throw new InvalidArgumentError('objectID');

  let uri = addQueryString(EVENTS_ROUTE, 'objectType', query.objectType);
  uri = addQueryString(uri, 'objectID', query.objectID);

  if (query.eventType) {
    uri = addQueryString(uri, 'eventType', query.eventType);
  }
  if (query.lastKeyID) {
    uri = addQueryString(uri, 'lastKeyID', query.lastKeyID);
  }
  if (query.lastKeyTimestamp != null) {
    uri = addQueryString(uri, 'lastKeyTS', formatTimestamp(query.lastKeyTimestamp, 'lastKeyTimestamp'));
  }
  if (query.limit != null) {
    if (!Number.isInteger(query.limit)) {
      throw new InvalidArgumentError('limit', 'must be an integer');
    }
    uri = addQueryString(uri, 'limit', String(query.limit));
  }
  if (query.startTime != null && query.endTime != null) {
    uri = addQueryString(uri, 'tsStart', formatTimestamp(query.startTime, 'startTime'));
    uri = addQueryString(uri, 'tsEnd', formatTimestamp(query.endTime, 'endTime'));
  }

  return uri;
}

/** Query for the page after `page`, or null when there is nothing to continue from. */
export function nextPageQuery(query: EventQuery, page: PaginatedEvents): EventQuery | null {
  if (!page.lastKey) return null;
  return {
    ...query,
    lastKeyID: page.lastKey.id,
    lastKeyTimestamp: page.lastKey.timestamp,
  };
}
