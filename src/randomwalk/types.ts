import { RandomSource } from '../utils/random';

/**
 * Options for a single random-walk simulation
 */
export interface RandomWalkOptions {
  /**
   * Time step t_eps of the discretization. The walk moves ±sqrt(t_eps) per step
   * with up-probability 0.5 * (1 + v * sqrt(t_eps)), which is not clamped: keep
   * |v| * sqrt(t_eps) <= 1 for a meaningful walk. Default: 1e-4
   */
  timeStep?: number;
  /** Steps after which the walk is abandoned with SimulationTimeoutError. Default: 10,000,000 */
  maxSteps?: number;
  /** Source of uniform draws. Default: Math.random */
  random?: RandomSource;
}

/**
 * Options for a batch of simulations
 */
export interface SimulationOptions extends RandomWalkOptions {
  /** Whether to log progress to the console */
  verbose?: boolean;
}

/**
 * Aggregate view of a batch of trajectories
 */
export interface TrajectorySummary {
  /** Number of trajectories */
  count: number;
  /** Trajectories that ended at the upper barrier */
  upperCount: number;
  /** Proportion of upper-barrier choices (NaN for an empty batch) */
  upperProportion: number;
  /** Binomial standard error of upperProportion */
  upperProportionStandardError: number;
  /** Mean first-passage time over all trajectories */
  meanTime: number;
  /** Mean first-passage time of upper-barrier trajectories */
  meanUpperTime: number;
  /** Mean first-passage time of lower-barrier trajectories */
  meanLowerTime: number;
}
