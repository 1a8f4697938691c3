/**
 * CLI defaults, read from environment variables:
 *   TOUR_START_ID          — start city when none is given on the command line (default: 1)
 *   TOUR_ON_MISSING_START  — reject | first (default: reject)
 */

import { z } from 'zod';
import type { MissingStartPolicy } from '@nn-tour/domain';

// `KEY=` in a .env file means unset, not 0
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const cliEnvSchema = z.object({
  TOUR_START_ID: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(1)),
  TOUR_ON_MISSING_START: z.preprocess(
    blankAsUnset,
    z.enum(['reject', 'first']).default('reject'),
  ),
});

export interface CliConfig {
  startId: number;
  onMissingStart: MissingStartPolicy;
}

export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = cliEnvSchema.parse(env);
  return { startId: parsed.TOUR_START_ID, onMissingStart: parsed.TOUR_ON_MISSING_START };
}
