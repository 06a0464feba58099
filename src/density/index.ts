import { DDMParameters, DensityQuery, DEFAULT_EPSILON } from '../types';
import {
  assertOpenUnitInterval,
  assertParameters,
  assertPositive,
  assertPositiveInteger,
  toChoice,
} from '../utils/validation';
import { CumulativeOptions, DensityOptions, SeriesApproximation } from './types';

export type { CumulativeOptions, DensityOptions, SeriesApproximation, SeriesKind } from './types';

const DEFAULT_INTEGRATION_STEPS = 2000;

/**
 * Bivariate density of response time and choice in a drift-diffusion model.
 *
 * For choice 0 this is Eq (1) in the appendix of Wabersich & Vandekerckhove (2014);
 * choice 1 uses the same expression with b replaced by 1 - b and v by -v.
 *
 * The density is evaluated with the method of Navarro & Fuss (2009): the
 * first-passage density of a zero-drift process with unit barrier separation is
 * approximated at tt = t / a² by whichever truncated series (small-time or
 * large-time) needs fewer terms to stay within epsilon, and then rescaled to the
 * requested a and v (Eq 2).
 *
 * The result is returned as computed. Truncation error can make it slightly
 * negative for extreme inputs; it is not clamped.
 *
 * @param t - Response time (t > 0)
 * @param params - Process parameters
 * @param choice - Barrier, 0 (lower) or 1 (upper). Default: 1
 * @param options - Series error budget
 * @returns Probability density at (t, choice)
 * @throws InvalidParameterError for out-of-domain arguments
 *
 * @example
 * ```typescript
 * const density = timeChoiceDensity(1, { b: 0.5, a: 2, v: 1 });
 * ```
 */
export function timeChoiceDensity(
  t: number,
  params: DDMParameters,
  choice: number = 1,
  options: DensityOptions = {},
): number {
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;

  assertPositive('t', t);
  assertParameters(params);
  assertOpenUnitInterval('epsilon', epsilon);

  // Upper-barrier density is the lower-barrier density of the mirrored process
  const upper = toChoice(choice) === 1;
  const b = upper ? 1 - params.b : params.b;
  const v = upper ? -params.v : params.v;
  const { a } = params;

  const tt = t / (a * a);
  const approximation = selectSeries(tt, epsilon);

  // Log of the drift factor in Eq 2, applied inside each series term so that
  // an overflowing factor never meets an underflowing sum
  const logScale = -v * a * b - (v * v * t) / 2;

  const p =
    approximation.series === 'small-time'
      ? smallTimeSeries(tt, b, approximation.smallTimeTerms, logScale)
      : largeTimeSeries(tt, b, approximation.largeTimeTerms, logScale);

  return p / (a * a);
}

/**
 * Evaluate the time-choice density at several points
 *
 * @param queries - Points to evaluate
 * @param options - Series error budget, shared by all points
 * @returns Densities in query order
 */
export function timeChoiceDensities(queries: DensityQuery[], options: DensityOptions = {}): number[] {
  return queries.map(q => timeChoiceDensity(q.t, q.params, q.choice, options));
}

/**
 * Navarro & Fuss crossover heuristic (Eqs 10-13).
 *
 * Computes how many terms each series needs to keep the truncation error of the
 * normalized density below epsilon, and picks the small-time series when it needs
 * fewer. Where a term-count formula has no real value the error budget is already
 * met by that series' minimum term count, which is used instead.
 *
 * @param normalizedTime - tt = t / a² (> 0)
 * @param epsilon - Truncation-error budget in (0, 1)
 */
export function selectSeries(normalizedTime: number, epsilon: number = DEFAULT_EPSILON): SeriesApproximation {
  assertPositive('normalizedTime', normalizedTime);
  assertOpenUnitInterval('epsilon', epsilon);

  const tt = normalizedTime;
  const logTT = Math.log(tt);
  const logEps = Math.log(epsilon);

  // Eq 10
  const largeMinimum = 1 / (Math.PI * Math.sqrt(tt));
  const largeRadicand = (-2 * (Math.log(Math.PI) + logTT + logEps)) / (Math.PI * Math.PI * tt);
  const largeTimeTerms = largeRadicand >= 0 ? Math.sqrt(largeRadicand) : largeMinimum;

  // Eq 11
  const smallRadicand = -2 * tt * (Math.LN2 + logEps + 0.5 * (Math.LN2 + Math.log(Math.PI) + logTT));
  const smallTimeTerms = smallRadicand >= 0 ? 2 + Math.sqrt(smallRadicand) : 2;

  // Eq 12
  const lambda = smallTimeTerms - largeTimeTerms;

  return {
    normalizedTime: tt,
    smallTimeTerms,
    largeTimeTerms,
    lambda,
    // Eq 13
    series: lambda < 0 ? 'small-time' : 'large-time',
  };
}

/**
 * Probability of reaching the given barrier by time t, integrating the density
 * over (0, t] with the composite Simpson rule. The density vanishes as t → 0, so
 * the left endpoint contributes 0.
 *
 * @param t - Upper integration limit (t > 0)
 * @param params - Process parameters
 * @param choice - Barrier, 0 or 1. Default: 1
 * @param options - Series error budget and number of intervals
 * @returns P(T ≤ t, choice)
 */
export function cumulativeChoiceProbability(
  t: number,
  params: DDMParameters,
  choice: number = 1,
  options: CumulativeOptions = {},
): number {
  const { steps = DEFAULT_INTEGRATION_STEPS, ...densityOptions } = options;

  assertPositive('t', t);
  assertPositiveInteger('steps', steps);
  toChoice(choice);

  const intervals = steps % 2 === 0 ? steps : steps + 1;
  const h = t / intervals;

  let sum = 0;
  for (let i = 1; i <= intervals; i++) {
    const weight = i === intervals ? 1 : i % 2 === 1 ? 4 : 2;
    sum += weight * timeChoiceDensity(i * h, params, choice, densityOptions);
  }

  return (sum * h) / 3;
}

/**
 * Small-time (method of images) series for the zero-drift, unit-separation density,
 * multiplied by exp(logScale). The 1 / sqrt(2π tt³) prefactor is taken in log form
 * so it cannot underflow at tiny tt.
 * @internal
 */
function smallTimeSeries(tt: number, b: number, terms: number, logScale: number): number {
  const half = (Math.ceil(terms) - 1) / 2;
  const lower = -Math.floor(half);
  const upper = Math.ceil(half);
  const logPrefactor = logScale - 1.5 * Math.log(tt) - 0.5 * Math.log(2 * Math.PI);

  let sum = 0;
  for (let k = lower; k <= upper; k++) {
    const offset = b + 2 * k;
    sum += offset * Math.exp(logPrefactor - (offset * offset) / (2 * tt));
  }

  return sum;
}

/**
 * Large-time (Fourier sine) series for the zero-drift, unit-separation density,
 * multiplied by exp(logScale)
 * @internal
 */
function largeTimeSeries(tt: number, b: number, terms: number, logScale: number): number {
  const count = Math.ceil(terms);

  let sum = 0;
  for (let k = 1; k <= count; k++) {
    sum += k * Math.exp(logScale - (k * k * Math.PI * Math.PI * tt) / 2) * Math.sin(k * Math.PI * b);
  }

  return sum * Math.PI;
}
