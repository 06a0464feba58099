/**
 * Core types for drift-diffusion model computations
 */

/**
 * Barrier reached first: 1 for the upper barrier (at a), 0 for the lower barrier (at 0)
 */
export type Choice = 0 | 1;

/**
 * Parameters of a two-barrier drift-diffusion process with unit diffusion coefficient
 */
export interface DDMParameters {
  /** Relative starting point, as a fraction of the distance between barriers (0 < b < 1) */
  b: number;
  /** Inter-barrier distance (a > 0); the lower barrier sits at 0 */
  a: number;
  /** Drift rate, any finite real */
  v: number;
}

/**
 * A single simulated first passage
 */
export interface Trajectory {
  /** Barrier crossed first */
  choice: Choice;
  /** Time of the crossing */
  time: number;
}

/**
 * A single point at which to evaluate the time-choice density
 */
export interface DensityQuery {
  /** Response time (t > 0) */
  t: number;
  /** Choice, 0 or 1 */
  choice: number;
  /** Process parameters */
  params: DDMParameters;
}

/**
 * Default step of the random-walk time discretization
 */
export const DEFAULT_TIME_STEP = 1e-4;

/**
 * Default truncation-error budget of the density series (Navarro & Fuss, p. 225)
 */
export const DEFAULT_EPSILON = 1e-3;

/**
 * Default number of random-walk steps before a simulation is abandoned
 */
export const DEFAULT_MAX_STEPS = 10_000_000;
