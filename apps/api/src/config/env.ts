/**
 * API configuration, read from environment variables:
 *   PORT             — listen port (default: 3001)
 *   CORS_ORIGIN      — allowed origin (default: *)
 *   HTTP_LOG_FORMAT  — morgan format, or "off" to disable (default: combined)
 *   MAX_CITIES       — largest city collection accepted per request (default: 10000)
 */

import { z } from 'zod';

// `KEY=` in a .env file means unset, not 0 or ''
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const apiEnvSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65_535).default(3001)),
  CORS_ORIGIN: z.preprocess(blankAsUnset, z.string().min(1).default('*')),
  HTTP_LOG_FORMAT: z.preprocess(blankAsUnset, z.string().min(1).default('combined')),
  MAX_CITIES: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(10_000)),
});

export interface ApiConfig {
  port: number;
  corsOrigin: string;
  /** null when request logging is off */
  httpLogFormat: string | null;
  maxCities: number;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = apiEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    httpLogFormat: parsed.HTTP_LOG_FORMAT.toLowerCase() === 'off' ? null : parsed.HTTP_LOG_FORMAT,
    maxCities: parsed.MAX_CITIES,
  };
}
