import axios, { type AxiosResponse } from 'axios';
import { RemoteRequestError, TransportError, type ResponseDiagnostics } from './errors';
import type { RequestOptions } from './types';

export type SendRequest = (signal: AbortSignal) => Promise<AxiosResponse<unknown>>;

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function bodyAsText(data: unknown): string {
  if (data == null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}

function headerValue(value: unknown): string {
  if (Array.isArray(value)) return value.map(String).join(', ');
  return String(value);
}

function responseDiagnostics(response: AxiosResponse<unknown>): ResponseDiagnostics {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(response.headers ?? {})) {
    if (value == null) continue;
    headers[key.toLowerCase()] = headerValue(value);
  }
  return {
    status: response.status,
    statusText: response.statusText ?? '',
    method: (response.config?.method ?? 'get').toUpperCase(),
    url: response.config?.url ?? '',
    headers,
    body: bodyAsText(response.data),
  };
}

/**
 * Sends a request and classifies the outcome.
 *
 * 2xx: the raw body as text. Any other status: RemoteRequestError with the
 * response diagnostics. No response at all: TransportError wrapping the
 * original error. The signal handed to `send` is aborted on every exit path,
 * which releases the underlying request whatever happened.
 */
export async function unwrapResponse(send: SendRequest, options: RequestOptions = {}): Promise<string> {
  const controller = new AbortController();
  const { signal } = options;
  const onAbort = () => controller.abort(signal?.reason);

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    let response: AxiosResponse<unknown>;
    try {
      response = await send(controller.signal);
    } catch (err) {
      if (!axios.isAxiosError(err)) throw err;
      if (err.response) throw new RemoteRequestError(responseDiagnostics(err.response));
      throw new TransportError(err.message, err.code, err);
    }

    if (!isSuccessStatus(response.status)) {
      throw new RemoteRequestError(responseDiagnostics(response));
    }
    return bodyAsText(response.data);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    controller.abort();
  }
}
