import type { AxiosRequestConfig } from 'axios';
import type { Logger } from 'pino';

/** Caller-owned structured data forwarded verbatim in a batch. */
export type EventPayload = Record<string, unknown>;

export interface EventInfo<T extends EventPayload = EventPayload> {
  payload: T;
}

/** Wire body for `POST /events`. */
export interface EventBatch<T extends EventPayload = EventPayload> {
  edgeMAC: string;
  events: T[];
}

export interface EventQuery {
  objectType: string;
  objectID: string;
  eventType?: string;
  lastKeyID?: string;
  lastKeyTimestamp?: Date;
  limit?: number;
  startTime?: Date;
  endTime?: Date;
}

export interface EventRecord {
  id: string;
  timestamp: Date;
  objectType?: string;
  objectID?: string;
  eventType?: string;
  data?: Record<string, unknown>;
  [extra: string]: unknown;
}

/** Continuation key: last item's id and timestamp. */
export interface ContinuationKey {
  id: string;
  timestamp: Date;
}

export interface PaginatedEvents {
  events: EventRecord[];
  lastKey: ContinuationKey | null;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  logger?: Logger;
  // Transport override, used by tests to stay in-process
  adapter?: AxiosRequestConfig['adapter'];
}
