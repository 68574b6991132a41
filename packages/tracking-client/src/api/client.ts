import http from 'http';
import https from 'https';
import axios, { type AxiosInstance } from 'axios';
import pino, { type Logger } from 'pino';
import { encodeEventBatch } from './batch';
import { AuthenticationError, InvalidArgumentError } from './errors';
import { buildEventsQuery, EVENTS_ROUTE } from './query';
import { decodeBody, decodePaginatedEvents, loginResponseSchema } from './schemas';
import { Session } from './session';
import { unwrapResponse } from './unwrap';
import type {
  ClientConfig,
  EventInfo,
  EventPayload,
  EventQuery,
  PaginatedEvents,
  RequestOptions,
} from './types';

const LOGIN_ROUTE = 'login';
const DEFAULT_TIMEOUT_MS = 30000;

const keepAliveHttpAgent = new http.Agent({ keepAlive: true, maxSockets: 4 });
const keepAliveHttpsAgent = new https.Agent({ keepAlive: true, maxSockets: 4 });

const defaultLogger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

function parseBaseUrl(baseUrl: string): string {
  if (baseUrl == null) throw new InvalidArgumentError('baseUrl');
  try {
    return new URL(baseUrl).toString();
  } catch {
    throw new InvalidArgumentError('baseUrl', `"${baseUrl}" is not an absolute URL`);
  }
}

/**
 * Async client for the event-tracking API.
 *
 * Call `login` once; every other call requires the session it establishes.
 * Nothing is retried here: callers own their retry policy.
 */
export class TrackingClient {
  private readonly http: AxiosInstance;
  private readonly session = new Session();
  private readonly logger: Logger;

  constructor(config: ClientConfig) {
    if (config == null) throw new InvalidArgumentError('config');
    const baseURL = parseBaseUrl(config.baseUrl);
    this.logger = config.logger ?? defaultLogger;
    this.http = axios.create({
      baseURL,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        Accept: 'application/json',
        'X-API-HEADER': '1',
      },
      httpAgent: keepAliveHttpAgent,
      httpsAgent: keepAliveHttpsAgent,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      // Status classification happens in unwrapResponse
      validateStatus: () => true,
      adapter: config.adapter,
    });
  }

  get isAuthenticated(): boolean {
    return this.session.isAuthenticated;
  }

  async login(email: string, password: string, options: RequestOptions = {}): Promise<void> {
    if (email == null) throw new InvalidArgumentError('email');
    if (password == null) throw new InvalidArgumentError('password');

    const body = await this.send('POST', LOGIN_ROUTE, () =>
      unwrapResponse(signal => this.http.post(LOGIN_ROUTE, { email, password }, { signal }), options),
    );
    const { auth } = decodeBody(loginResponseSchema, body, 'login');

    if (!this.session.establish(auth)) {
      this.logger.warn('Login response carried no auth token');
      throw new AuthenticationError();
    }
    this.logger.info('Logged in');
  }

  async getPaginatedEvents(query: EventQuery, options: RequestOptions = {}): Promise<PaginatedEvents> {
    const headers = this.session.authHeaders();
    const uri = buildEventsQuery(query);

    this.logger.debug({ uri }, 'Fetching events page');
    const body = await this.send('GET', uri, () =>
      unwrapResponse(signal => this.http.get(uri, { headers, signal }), options),
    );

    const page = decodePaginatedEvents(body);
    this.logger.debug({ count: page.events.length, hasNextPage: page.lastKey !== null }, 'Events page fetched');
    return page;
  }

  /** Posts a batch reported by `edgeMAC`; resolves to the raw response body. */
  async postEvents<T extends EventPayload>(
    edgeMAC: string,
    eventInfos: readonly EventInfo<T>[],
    options: RequestOptions = {},
  ): Promise<string> {
    const headers = this.session.authHeaders();
    const batch = encodeEventBatch(edgeMAC, eventInfos);

    this.logger.debug({ edgeMAC, count: batch.events.length }, 'Posting events');
    return this.send('POST', EVENTS_ROUTE, () =>
      unwrapResponse(signal => this.http.post(EVENTS_ROUTE, batch, { headers, signal }), options),
    );
  }

  private async send(method: string, uri: string, run: () => Promise<string>): Promise<string> {
    try {
      return await run();
    } catch (err) {
      this.logger.warn({ err, method, uri }, 'Request failed');
      throw err;
    }
  }
}

export function createTrackingClient(config: ClientConfig): TrackingClient {
  return new TrackingClient(config);
}
