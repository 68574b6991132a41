import { z } from 'zod';
import { DecodingError } from './errors';
import type { PaginatedEvents } from './types';

const timestamp = z
  .string()
  .datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' })
  .transform(s => new Date(s));

// Numeric tokens are taken as their string form; any other non-string is no token.
export const loginResponseSchema = z.object({
  auth: z.unknown().transform(value => {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return null;
  }),
});

export const eventRecordSchema = z
  .object({
    id: z.string(),
    timestamp,
    objectType: z.string().optional(),
    objectID: z.string().optional(),
    eventType: z.string().optional(),
    data: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export const paginatedEventsSchema = z.object({
  events: z.array(eventRecordSchema),
  lastKey: z
    .object({ id: z.string(), timestamp })
    .nullish()
    .transform(key => key ?? null),
});

function parseJson(body: string, what: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new DecodingError(`Could not parse ${what} response as JSON`, body, err);
  }
}

/** Parses `body` as JSON and validates it against `schema`. */
export function decodeBody<S extends z.ZodTypeAny>(schema: S, body: string, what: string): z.output<S> {
  const result = schema.safeParse(parseJson(body, what));
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new DecodingError(`Unexpected ${what} response shape: ${issues}`, body, result.error);
  }
  return result.data;
}

export function decodePaginatedEvents(body: string): PaginatedEvents {
  return decodeBody(paginatedEventsSchema, body, 'events');
}
