/**
 * Data record consumed by an external sampler fitting a drift-diffusion model.
 * Field names follow the sampler's data block.
 */
export interface SamplerData {
  /** Number of observations */
  n: number;
  /** Response times, non-negative */
  y: number[];
  /** Choices, 0 or 1 */
  z: number[];
  /** Upper bound of the uniform prior on alpha */
  alpha_ub: number;
  /** Standard deviation of the normal prior on delta */
  sigma: number;
  /** Non-decision time subtracted from every response time */
  tau: number;
}

/**
 * Settings for building a SamplerData record from trajectories
 */
export interface SamplerDataConfig {
  /** Upper bound of the uniform prior on alpha (> 0) */
  alphaUpperBound: number;
  /** Standard deviation of the normal prior on delta (> 0) */
  sigma: number;
  /** Non-decision time (>= 0). Default: 0 */
  tau?: number;
}

/**
 * One point of the sampler's parameter space
 */
export interface DDMPosteriorDraw {
  /** Boundary separation */
  alpha: number;
  /** Relative starting point */
  beta: number;
  /** Drift rate */
  delta: number;
}
