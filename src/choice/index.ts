import { DDMParameters } from '../types';
import { assertParameters, toChoice } from '../utils/validation';

// Below this |2av| the mean decision time switches to its series form
const SMALL_DRIFT_EXPONENT = 1e-3;

/**
 * Marginal probability of one of the two choices in a drift-diffusion model.
 *
 * Eq 3 of Tuerlinckx et al. (2001) gives the probability of first crossing the
 * upper barrier from z = a * b:
 *
 *   P(upper) = (exp(-2vz) - 1) / (exp(-2va) - 1)
 *
 * The lower barrier uses the same formula with b replaced by 1 - b and v by -v.
 * With zero drift (including drifts so small that 2av underflows to 0) the ratio
 * reduces to its limit, the (reflected) starting point b.
 *
 * @param params - Process parameters
 * @param choice - Barrier, 0 (lower) or 1 (upper). Default: 1
 * @returns Probability of first crossing that barrier
 * @throws InvalidParameterError for out-of-domain parameters or a choice other than 0 or 1
 *
 * @example
 * ```typescript
 * const p = choiceProbability({ b: 0.5, a: 2, v: 0.1 }); // ≈ 0.5498
 * ```
 */
export function choiceProbability(params: DDMParameters, choice: number = 1): number {
  assertParameters(params);

  const lower = toChoice(choice) === 0;
  const b = lower ? 1 - params.b : params.b;
  const v = lower ? -params.v : params.v;

  return upperBarrierProbability(b, params.a, v);
}

/**
 * Mean first-passage time over both barriers.
 *
 * From optional stopping on X(t) - v t with z = a * b:
 *   E[T] = (a * P(upper) - z) / v, and z * (a - z) when v = 0.
 * For |2av| < 1e-3 a series in 2av replaces the ratio, which would otherwise
 * lose precision to cancellation.
 *
 * @param params - Process parameters
 * @returns Expected decision time
 */
export function expectedDecisionTime(params: DDMParameters): number {
  assertParameters(params);

  const { b, a, v } = params;
  const w = 2 * a * v;

  if (Math.abs(w) < SMALL_DRIFT_EXPONENT) {
    // E[T] = 2a² (P - b) / w with both expm1 terms of P - b expanded in w;
    // their linear terms cancel, so the w² factor is divided out analytically.
    // At w = 0 this is the zero-drift limit z(a - z).
    const w2 = w * w;
    const numerator =
      (b * b - b) / 2 -
      (w * (b * b * b - b)) / 6 +
      (w2 * (b ** 4 - b)) / 24 -
      (w2 * w * (b ** 5 - b)) / 120;
    const denominator = -1 + w / 2 - w2 / 6 + (w2 * w) / 24 - (w2 * w2) / 120;
    return (2 * a * a * numerator) / denominator;
  }

  return (a * upperBarrierProbability(b, a, v) - a * b) / v;
}

/**
 * (exp(-2abv) - 1) / (exp(-2av) - 1), evaluated without overflow or cancellation
 * @internal
 */
function upperBarrierProbability(b: number, a: number, v: number): number {
  const w = 2 * a * v;

  // Also covers drifts so small that 2av underflows
  if (w === 0) {
    return b;
  }

  if (w > 0) {
    return Math.expm1(-w * b) / Math.expm1(-w);
  }

  // Numerator and denominator scaled by exp(w) so every exponent is non-positive
  return (Math.exp(w * (1 - b)) * -Math.expm1(w * b)) / -Math.expm1(w);
}
