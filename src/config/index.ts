import { DEFAULT_EPSILON, DEFAULT_MAX_STEPS, DEFAULT_TIME_STEP } from '../types';
import { InvalidParameterError } from '../errors';
import { SimulationOptions } from '../randomwalk/types';
import { DensityOptions } from '../density/types';
import { SeededRandom } from '../utils/random';
import { assertOpenUnitInterval, assertPositive, assertPositiveInteger } from '../utils/validation';

/**
 * Library-wide settings, usually read from the environment
 */
export interface DDMConfig {
  /** Random-walk time step (DDM_TIME_STEP) */
  timeStep: number;
  /** Random-walk step bound (DDM_MAX_STEPS) */
  maxSteps: number;
  /** Density truncation-error budget (DDM_EPSILON) */
  epsilon: number;
  /** Seed for a reproducible random source (DDM_SEED); unseeded when absent */
  seed?: number;
  /** Whether to log progress (DDM_VERBOSE) */
  verbose: boolean;
}

export const DEFAULT_CONFIG: DDMConfig = {
  timeStep: DEFAULT_TIME_STEP,
  maxSteps: DEFAULT_MAX_STEPS,
  epsilon: DEFAULT_EPSILON,
  verbose: false,
};

/**
 * Read settings from environment variables, falling back to the defaults for
 * any that are unset or empty.
 *
 * @param env - Variables to read. Default: process.env
 * @throws InvalidParameterError when a variable is set to an unusable value
 *
 * @example
 * ```typescript
 * import * as dotenv from 'dotenv';
 * dotenv.config();
 * const config = readConfigFromEnv();
 * ```
 */
export function readConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DDMConfig {
  const timeStep = readNumber(env, 'DDM_TIME_STEP') ?? DEFAULT_CONFIG.timeStep;
  const maxSteps = readNumber(env, 'DDM_MAX_STEPS') ?? DEFAULT_CONFIG.maxSteps;
  const epsilon = readNumber(env, 'DDM_EPSILON') ?? DEFAULT_CONFIG.epsilon;
  const seed = readNumber(env, 'DDM_SEED');
  const verbose = readBoolean(env, 'DDM_VERBOSE') ?? DEFAULT_CONFIG.verbose;

  assertPositive('DDM_TIME_STEP', timeStep);
  assertPositiveInteger('DDM_MAX_STEPS', maxSteps);
  assertOpenUnitInterval('DDM_EPSILON', epsilon);
  if (seed !== undefined && !Number.isInteger(seed)) {
    throw new InvalidParameterError('DDM_SEED', seed, 'must be an integer');
  }

  return { timeStep, maxSteps, epsilon, seed, verbose };
}

/**
 * Simulation options for a configuration; a seed becomes a fresh SeededRandom
 */
export function toSimulationOptions(config: DDMConfig): SimulationOptions {
  return {
    timeStep: config.timeStep,
    maxSteps: config.maxSteps,
    verbose: config.verbose,
    ...(config.seed !== undefined ? { random: new SeededRandom(config.seed) } : {}),
  };
}

export function toDensityOptions(config: DDMConfig): DensityOptions {
  return { epsilon: config.epsilon };
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidParameterError(name, raw, 'must be a number');
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return undefined;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new InvalidParameterError(name, raw, 'must be true or false');
}
