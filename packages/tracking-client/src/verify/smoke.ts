import 'dotenv/config';
import pino from 'pino';
import { createTrackingClient } from '../api/client';
import type { Credentials, EventQuery } from '../api/types';
import { loadClientConfig, loadCredentials } from '../config';

export interface SmokeClient {
  login(email: string, password: string): Promise<void>;
  getPaginatedEvents(query: EventQuery): Promise<{ events: unknown[]; lastKey: unknown }>;
}

export interface SmokeCheckOptions {
  credentials: Credentials;
  objectType: string;
  objectID: string;
  limit?: number;
}

export interface SmokeCheckResult {
  eventCount: number;
  hasNextPage: boolean;
}

/** Logs in and reads a single page. */
export async function runSmokeCheck(client: SmokeClient, options: SmokeCheckOptions): Promise<SmokeCheckResult> {
  await client.login(options.credentials.email, options.credentials.password);
  const page = await client.getPaginatedEvents({
    objectType: options.objectType,
    objectID: options.objectID,
    limit: options.limit ?? 10,
  });
  return { eventCount: page.events.length, hasNextPage: page.lastKey !== null };
}

async function main(): Promise<void> {
  const logger = pino({ transport: { target: 'pino-pretty' } });
  const objectType = process.env.SMOKE_OBJECT_TYPE ?? 'location';
  const objectID = process.env.SMOKE_OBJECT_ID;
  if (!objectID) throw new Error('SMOKE_OBJECT_ID is required');

  const client = createTrackingClient({ ...loadClientConfig(), logger });
  const result = await runSmokeCheck(client, {
    credentials: loadCredentials(),
    objectType,
    objectID,
  });
  logger.info(result, 'Smoke check PASSED');
}

if (typeof require !== 'undefined' && require.main === module) {
  main().catch(err => {
    pino().error(err, 'Smoke check FAILED');
    process.exit(1);
  });
}
