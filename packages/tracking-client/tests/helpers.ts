import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import pino, { type Logger } from 'pino';
import { TrackingClient } from '../src/api/client';

export const silentLogger = pino({ level: 'silent' });

export const BASE_URL = 'https://tracking.test/api/';

export interface FakeReply {
  status?: number;
  statusText?: string;
  body?: string;
  headers?: Record<string, string>;
}

export type FakeHandler = (config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

/** In-process axios adapter: records every request and answers from `handler`. */
export function fakeTransport(handler: FakeHandler) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const reply = await handler(config);
    return {
      data: reply.body ?? '',
      status: reply.status ?? 200,
      statusText: reply.statusText ?? 'OK',
      headers: reply.headers ?? {},
      config,
    };
  };
  return { adapter, requests };
}

/** Answers by `"METHOD path"`, e.g. `"POST login"`; unknown routes get a 404. */
export function routes(table: Record<string, FakeReply | ((config: InternalAxiosRequestConfig) => FakeReply)>): FakeHandler {
  return config => {
    const method = (config.method ?? 'get').toUpperCase();
    const path = (config.url ?? '').split('?')[0];
    const entry = table[`${method} ${path}`];
    if (entry === undefined) return { status: 404, statusText: 'Not Found', body: 'no route' };
    return typeof entry === 'function' ? entry(config) : entry;
  };
}

export function connectionRefused(config: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
}

export function makeClient(handler: FakeHandler, logger: Logger = silentLogger) {
  const transport = fakeTransport(handler);
  const client = new TrackingClient({ baseUrl: BASE_URL, logger, adapter: transport.adapter });
  return { client, requests: transport.requests };
}

export const LOGIN_OK: FakeReply = { body: '{"auth":"tok-1"}' };

/** A pino logger whose output lines are kept for assertions. */
export function capturingLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ level: 'debug' }, { write: (line: string) => { lines.push(JSON.parse(line)); } });
  return { logger, lines };
}
