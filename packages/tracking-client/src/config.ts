import { z } from 'zod';
import type { ClientConfig, Credentials } from './api/types';

type Env = Record<string, string | undefined>;

const clientEnvSchema = z.object({
  TRACKING_API_BASE_URL: z.string().url(),
  TRACKING_API_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

const credentialsEnvSchema = z.object({
  TRACKING_API_EMAIL: z.string().min(1),
  TRACKING_API_PASSWORD: z.string().min(1),
});

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: Env): z.output<S> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const keys = result.error.issues.map(i => `${i.path.join('.')} (${i.message})`).join(', ');
    throw new Error(`Invalid configuration: ${keys}`);
  }
  return result.data;
}

export function loadClientConfig(env: Env = process.env): ClientConfig {
  const parsed = parseEnv(clientEnvSchema, env);
  const config: ClientConfig = { baseUrl: parsed.TRACKING_API_BASE_URL };
  if (parsed.TRACKING_API_TIMEOUT_MS !== undefined) config.timeoutMs = parsed.TRACKING_API_TIMEOUT_MS;
  return config;
}

export function loadCredentials(env: Env = process.env): Credentials {
  const parsed = parseEnv(credentialsEnvSchema, env);
  return { email: parsed.TRACKING_API_EMAIL, password: parsed.TRACKING_API_PASSWORD };
}
