import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Server
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8080),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // National Weather Service
  nwsBaseUrl: z.string().url().default('https://api.weather.gov'),
  nwsUserAgent: z.string().min(1).default('nws-weather-proxy (contact@example.com)'),
  upstreamTimeoutMs: z.coerce.number().int().positive().default(10000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    host: env('HOST'),
    port: env('PORT'),
    logLevel: env('LOG_LEVEL'),
    nwsBaseUrl: env('NWS_BASE_URL'),
    nwsUserAgent: env('NWS_USER_AGENT'),
    upstreamTimeoutMs: env('UPSTREAM_TIMEOUT_MS'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
