export { TrackingClient, createTrackingClient } from './api/client';
export {
  TrackingApiError,
  InvalidArgumentError,
  NotAuthenticatedError,
  AuthenticationError,
  TransportError,
  RemoteRequestError,
  DecodingError,
  describeResponse,
} from './api/errors';
export type { ResponseDiagnostics } from './api/errors';
export { buildEventsQuery, formatTimestamp, nextPageQuery } from './api/query';
export { encodeEventBatch } from './api/batch';
export { unwrapResponse } from './api/unwrap';
export type { SendRequest } from './api/unwrap';
export { paginateEvents } from './pagination/paginator';
export type { EventPageSource, PaginateOptions } from './pagination/paginator';
export { loadClientConfig, loadCredentials } from './config';
export type {
  ClientConfig,
  ContinuationKey,
  Credentials,
  EventBatch,
  EventInfo,
  EventPayload,
  EventQuery,
  EventRecord,
  PaginatedEvents,
  RequestOptions,
} from './api/types';
