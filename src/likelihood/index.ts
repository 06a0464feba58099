import { Trajectory } from '../types';
import { InvalidParameterError } from '../errors';
import { timeChoiceDensity } from '../density';
import { DensityOptions } from '../density/types';
import { normalLogPDF } from '../utils/statistics';
import { assertFinite, assertPositive, toChoice } from '../utils/validation';
import { DDMPosteriorDraw, SamplerData, SamplerDataConfig } from './types';

export type { DDMPosteriorDraw, SamplerData, SamplerDataConfig } from './types';

/**
 * Build the sampler data record from simulated or observed trajectories
 *
 * @param trajectories - Choices and response times
 * @param config - Prior hyperparameters and non-decision time
 * @returns Record with y = times and z = choices, in input order
 *
 * @example
 * ```typescript
 * const data = createSamplerData(simulateDDM(200, { b: 0.5, a: 2, v: 1 }), {
 *   alphaUpperBound: 5,
 *   sigma: 2,
 * });
 * ```
 */
export function createSamplerData(trajectories: Trajectory[], config: SamplerDataConfig): SamplerData {
  const data: SamplerData = {
    n: trajectories.length,
    y: trajectories.map(t => t.time),
    z: trajectories.map(t => t.choice),
    alpha_ub: config.alphaUpperBound,
    sigma: config.sigma,
    tau: config.tau ?? 0,
  };

  validateSamplerData(data);
  return data;
}

/**
 * Check the shape and domain of a sampler data record
 *
 * @throws InvalidParameterError naming the first offending field
 */
export function validateSamplerData(data: SamplerData): void {
  if (data.y.length !== data.n) {
    throw new InvalidParameterError('y', data.y.length, `expected ${data.n} response times`);
  }
  if (data.z.length !== data.n) {
    throw new InvalidParameterError('z', data.z.length, `expected ${data.n} choices`);
  }

  assertPositive('alpha_ub', data.alpha_ub);
  assertPositive('sigma', data.sigma);
  assertFinite('tau', data.tau);
  if (data.tau < 0) {
    throw new InvalidParameterError('tau', data.tau, 'must be non-negative');
  }

  data.y.forEach((y, i) => {
    if (!Number.isFinite(y) || y < 0) {
      throw new InvalidParameterError(`y[${i}]`, y, 'must be a non-negative finite number');
    }
  });
  data.z.forEach(toChoice);
}

/**
 * Log-likelihood of the record under the drift-diffusion first-passage model.
 *
 * Observation i contributes the log density of reaching barrier z[i] at
 * y[i] - tau, with a = alpha, b = beta and v = delta. Observations at or before
 * the non-decision time make the likelihood zero.
 *
 * @param data - Sampler data record
 * @param draw - Parameter values to evaluate
 * @param options - Series error budget passed to the density
 * @returns Sum of log densities, -Infinity when any observation has zero density
 */
export function ddmLogLikelihood(
  data: SamplerData,
  draw: DDMPosteriorDraw,
  options: DensityOptions = {},
): number {
  validateSamplerData(data);

  const params = { b: draw.beta, a: draw.alpha, v: draw.delta };
  let total = 0;

  for (let i = 0; i < data.n; i++) {
    const decisionTime = data.y[i] - data.tau;
    if (decisionTime <= 0) {
      return -Infinity;
    }

    const density = timeChoiceDensity(decisionTime, params, data.z[i], options);
    if (!(density > 0)) {
      return -Infinity;
    }

    total += Math.log(density);
  }

  return total;
}

/**
 * Log prior: alpha ~ Uniform(0, alpha_ub), beta ~ Uniform(0, 1), delta ~ Normal(0, sigma)
 *
 * @returns Log prior density, -Infinity outside the support
 */
export function ddmLogPrior(data: SamplerData, draw: DDMPosteriorDraw): number {
  const { alpha, beta, delta } = draw;

  if (!(alpha > 0 && alpha < data.alpha_ub) || !(beta > 0 && beta < 1) || !Number.isFinite(delta)) {
    return -Infinity;
  }

  return -Math.log(data.alpha_ub) + normalLogPDF(delta, 0, data.sigma);
}

/**
 * Unnormalized log posterior, the quantity a sampler would target
 */
export function ddmLogPosterior(
  data: SamplerData,
  draw: DDMPosteriorDraw,
  options: DensityOptions = {},
): number {
  const prior = ddmLogPrior(data, draw);
  if (prior === -Infinity) {
    return prior;
  }
  return prior + ddmLogLikelihood(data, draw, options);
}
