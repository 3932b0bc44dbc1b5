import { z } from 'zod';
import { ConfigError, describeIssue } from './utils/errors';

const envSchema = z.object({
  // An empty PORT= means unset, not port 0.
  PORT: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().min(1).max(65535).default(8080),
  ),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_REQUESTS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export interface Config {
  port: number;
  host: string;
  logRequests: boolean;
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(describeIssue(parsed.error));
  }
  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    logRequests: parsed.data.LOG_REQUESTS,
  };
};
