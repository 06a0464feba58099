import { DDMParameters, Trajectory, DEFAULT_MAX_STEPS, DEFAULT_TIME_STEP } from '../types';
import { SimulationTimeoutError } from '../errors';
import { defaultRandomSource } from '../utils/random';
import { binomialStandardError, mean } from '../utils/statistics';
import {
  assertNonNegativeInteger,
  assertParameters,
  assertPositive,
  assertPositiveInteger,
} from '../utils/validation';
import { RandomWalkOptions, SimulationOptions, TrajectorySummary } from './types';

export type { RandomWalkOptions, SimulationOptions, TrajectorySummary } from './types';

const LOG_PREFIX = '[ddmkit:simulate]';

/**
 * Simulate one first passage of a drift-diffusion process with the random-walk
 * approximation of Tuerlinckx et al. (2001).
 *
 * The walk starts at a * b and moves ±sqrt(t_eps) each step, up with probability
 * 0.5 * (1 + v * sqrt(t_eps)), until it leaves (0, a). As t_eps → 0 this converges
 * to a diffusion with drift v and unit variance.
 *
 * @param params - Process parameters
 * @param options - Time step, step bound and random source
 * @returns The barrier crossed (1 = upper) and the crossing time (steps * t_eps)
 * @throws InvalidParameterError for out-of-domain parameters or options
 * @throws SimulationTimeoutError when no barrier is reached within maxSteps
 *
 * @example
 * ```typescript
 * const { choice, time } = randomWalk({ b: 0.5, a: 2, v: 1 });
 * ```
 */
export function randomWalk(params: DDMParameters, options: RandomWalkOptions = {}): Trajectory {
  const timeStep = options.timeStep ?? DEFAULT_TIME_STEP;
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  const random = options.random ?? defaultRandomSource;

  assertParameters(params);
  assertPositive('timeStep', timeStep);
  assertPositiveInteger('maxSteps', maxSteps);

  const { b, a, v } = params;
  const delta = Math.sqrt(timeStep);
  const p = upProbability(v, timeStep);

  let x = a * b;
  let tic = 0;

  do {
    if (tic >= maxSteps) {
      throw new SimulationTimeoutError(tic, tic * timeStep);
    }

    if (random.next() < p) {
      x += delta;
    } else {
      x -= delta;
    }

    tic++;
  } while (x < a && x > 0);

  return {
    choice: x > a ? 1 : 0,
    time: tic * timeStep,
  };
}

/**
 * Draw n independent first passages (the batch form of randomWalk).
 *
 * @param n - Number of trajectories (non-negative integer)
 * @param params - Process parameters
 * @param options - Random-walk options plus verbose logging
 * @returns n trajectories in generation order
 *
 * @example
 * ```typescript
 * const trajectories = simulateDDM(1000, { b: 0.5, a: 2, v: 1 }, { random: new SeededRandom(42) });
 * const { upperProportion } = summarizeTrajectories(trajectories);
 * ```
 */
export function simulateDDM(
  n: number,
  params: DDMParameters,
  options: SimulationOptions = {},
): Trajectory[] {
  assertNonNegativeInteger('n', n);
  assertParameters(params);

  const { verbose = false, ...walkOptions } = options;
  const timeStep = walkOptions.timeStep ?? DEFAULT_TIME_STEP;

  if (verbose) {
    console.log(
      `${LOG_PREFIX} Simulating ${n} trajectories (b=${params.b}, a=${params.a}, v=${params.v}, t_eps=${timeStep})`,
    );
    const p = upProbability(params.v, timeStep);
    if (p < 0 || p > 1) {
      console.warn(
        `${LOG_PREFIX} Up-move probability ${p} is outside [0, 1]; every step will move the same way`,
      );
    }
  }

  const trajectories: Trajectory[] = [];
  for (let i = 0; i < n; i++) {
    trajectories.push(randomWalk(params, walkOptions));
  }

  if (verbose) {
    const summary = summarizeTrajectories(trajectories);
    console.log(
      `${LOG_PREFIX} Done: upper proportion ${summary.upperProportion.toFixed(4)}, mean time ${summary.meanTime.toFixed(4)}`,
    );
  }

  return trajectories;
}

/**
 * Summarize a batch of trajectories: choice proportion with its binomial
 * standard error, and mean first-passage times overall and per barrier.
 */
export function summarizeTrajectories(trajectories: Trajectory[]): TrajectorySummary {
  const upperTimes: number[] = [];
  const lowerTimes: number[] = [];

  for (const trajectory of trajectories) {
    if (trajectory.choice === 1) {
      upperTimes.push(trajectory.time);
    } else {
      lowerTimes.push(trajectory.time);
    }
  }

  const count = trajectories.length;
  const upperProportion = count > 0 ? upperTimes.length / count : NaN;

  return {
    count,
    upperCount: upperTimes.length,
    upperProportion,
    upperProportionStandardError: binomialStandardError(upperProportion, count),
    meanTime: mean(trajectories.map(t => t.time)),
    meanUpperTime: mean(upperTimes),
    meanLowerTime: mean(lowerTimes),
  };
}

/**
 * Up-move probability of the walk, not clamped to [0, 1]
 * @internal
 */
function upProbability(v: number, timeStep: number): number {
  return 0.5 * (1 + v * Math.sqrt(timeStep));
}
