import { z } from 'zod';
import type { ConnectionParams } from './types';

const ClientEnvSchema = z.object({
  ASPACE_PROTOCOL: z.enum(['http', 'https']).default('http'),
  ASPACE_HOST: z.string().min(1).default('localhost'),
  ASPACE_PORT: z.string()
    .default('8089')
    .transform(val => parseInt(val, 10))
    .pipe(z.number().int().min(1).max(65535)),
  ASPACE_USERNAME: z.string().min(1),
  ASPACE_PASSWORD: z.string().min(1),
});

/**
 * Read connection parameters from the environment.
 * Throws a ZodError when a setting is missing or out of range.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ConnectionParams {
  const parsed = ClientEnvSchema.parse(env);

  return {
    protocol: parsed.ASPACE_PROTOCOL,
    host: parsed.ASPACE_HOST,
    port: parsed.ASPACE_PORT,
    username: parsed.ASPACE_USERNAME,
    password: parsed.ASPACE_PASSWORD,
  };
}
