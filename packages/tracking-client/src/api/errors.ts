export class TrackingApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrackingApiError';
  }
}

export class InvalidArgumentError extends TrackingApiError {
  constructor(readonly argument: string, reason = 'must not be null or undefined') {
    super(`Invalid argument "${argument}": ${reason}`);
    this.name = 'InvalidArgumentError';
  }
}

export class NotAuthenticatedError extends TrackingApiError {
  constructor() {
    super('Must login before API request');
    this.name = 'NotAuthenticatedError';
  }
}

/** Login went through at the HTTP level but yielded no usable token. */
export class AuthenticationError extends TrackingApiError {
  constructor(message = 'Received an empty auth token') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/** No response was received at all. */
export class TransportError extends TrackingApiError {
  constructor(message: string, readonly code: string | undefined, cause: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export interface ResponseDiagnostics {
  status: number;
  statusText: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string;
}

const MAX_BODY_IN_MESSAGE = 500;

export function describeResponse(d: ResponseDiagnostics): string {
  const headerLines = Object.entries(d.headers).map(([k, v]) => `  ${k}: ${v}`);
  const body = d.body.length > MAX_BODY_IN_MESSAGE
    ? `${d.body.slice(0, MAX_BODY_IN_MESSAGE)}...`
    : d.body;
  return [
    '[ Response ]',
    `StatusCode: ${d.status}, ReasonPhrase: '${d.statusText}', Method: ${d.method}, Url: ${d.url}`,
    'Headers:',
    ...headerLines,
    `Body: ${body}`,
  ].join('\n');
}

/** A response arrived but its status signalled failure. */
export class RemoteRequestError extends TrackingApiError implements ResponseDiagnostics {
  readonly status: number;
  readonly statusText: string;
  readonly method: string;
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: string;

  constructor(diagnostics: ResponseDiagnostics) {
    super(`Request failed with status ${diagnostics.status}\n${describeResponse(diagnostics)}`);
    this.name = 'RemoteRequestError';
    this.status = diagnostics.status;
    this.statusText = diagnostics.statusText;
    this.method = diagnostics.method;
    this.url = diagnostics.url;
    this.headers = diagnostics.headers;
    this.body = diagnostics.body;
  }
}

export class DecodingError extends TrackingApiError {
  constructor(message: string, readonly body: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DecodingError';
  }
}
