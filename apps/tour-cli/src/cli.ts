import { parseArgs } from 'node:util';

import { NearestNeighborTourPlanner, TourDomainError } from '@nn-tour/domain';
import type { CitySourcePort, MissingStartPolicy, TourPlanningPort } from '@nn-tour/domain';
import {
  CitySourceMalformedError,
  CitySourceUnreadableError,
  TextTourRenderer,
  TsplibCitySource,
} from '@nn-tour/adapters';

import { ZodError } from 'zod';

import { loadCliConfig } from './config.js';
import type { CliConfig } from './config.js';

// sysexits.h
export const EXIT_OK = 0;
export const EXIT_USAGE = 64;
export const EXIT_DATA_ERROR = 65;
export const EXIT_NO_INPUT = 66;
export const EXIT_TOUR_FAILED = 70;
export const EXIT_CONFIG = 78;

const MAX_PRECISION = 20;

export const USAGE = 'usage: nn-tour <file.tsp> [startId] [--first-fallback] [--precision N]';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  /** Taken from `env` when not given. */
  config?: CliConfig;
  env?: NodeJS.ProcessEnv;
  source?: CitySourcePort;
  planner?: TourPlanningPort;
}

interface CliArgs {
  file: string;
  startId: number;
  onMissingStart: MissingStartPolicy;
  precision?: number;
}

class UsageError extends Error {}

function parseNonNegativeInt(raw: string, what: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw new UsageError(`${what} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parsePrecision(raw: string): number {
  const value = parseNonNegativeInt(raw, '--precision');
  if (value > MAX_PRECISION) {
    throw new UsageError(`--precision must be at most ${MAX_PRECISION}, got ${value}`);
  }
  return value;
}

const CLI_OPTIONS = {
  'first-fallback': { type: 'boolean' },
  precision: { type: 'string' },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseCliArgs(argv: string[], config: CliConfig): CliArgs {
  const parsed = readArgs(argv);

  const [file, rawStart, ...extra] = parsed.positionals;
  if (file === undefined) throw new UsageError('missing <file.tsp>');
  if (extra.length > 0) throw new UsageError(`unexpected argument "${extra[0]}"`);

  const precision = parsed.values.precision;
  return {
    file,
    startId: rawStart === undefined ? config.startId : parseNonNegativeInt(rawStart, 'startId'),
    onMissingStart: parsed.values['first-fallback'] ? 'first' : config.onMissingStart,
    precision: precision === undefined ? undefined : parsePrecision(precision),
  };
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(argv: string[], io: CliIo, deps: CliDeps): Promise<number> {
  let config: CliConfig;
  try {
    config = deps.config ?? loadCliConfig(deps.env ?? process.env);
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    const issues = err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    io.err(`[nn-tour] invalid configuration: ${issues.join('; ')}`);
    return EXIT_CONFIG;
  }

  let args: CliArgs;
  try {
    args = parseCliArgs(argv, config);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.err(`[nn-tour] ${err.message}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }

  const source = deps.source ?? new TsplibCitySource();
  const planner = deps.planner ?? new NearestNeighborTourPlanner();
  const renderer = new TextTourRenderer({ precision: args.precision });

  try {
    const cities = await source.loadCities(args.file);
    const tour = planner.planTour({
      cities,
      startId: args.startId,
      onMissingStart: args.onMissingStart,
    });
    io.out(renderer.render(tour));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof CitySourceUnreadableError) {
      io.err(`[nn-tour] ${err.message}`);
      return EXIT_NO_INPUT;
    }
    if (err instanceof CitySourceMalformedError) {
      io.err(`[nn-tour] malformed ${err.source}: ${err.message}`);
      return EXIT_DATA_ERROR;
    }
    if (err instanceof TourDomainError) {
      io.err(`[nn-tour] cannot build tour: ${err.message}`);
      return EXIT_TOUR_FAILED;
    }
    throw err;
  }
}
