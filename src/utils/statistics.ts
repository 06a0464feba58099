/**
 * Statistical utility functions
 */

/**
 * Log density of a normal distribution
 *
 * @param x - Input value
 * @param mean - Distribution mean
 * @param sd - Standard deviation (> 0)
 * @returns Log probability density
 */
export function normalLogPDF(x: number, mean: number, sd: number): number {
  const z = (x - mean) / sd;
  return -0.5 * z * z - Math.log(sd) - 0.5 * Math.log(2 * Math.PI);
}

/**
 * Arithmetic mean, NaN for an empty array
 */
export function mean(values: number[]): number {
  if (values.length === 0) {
    return NaN;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Standard error of a binomial proportion p estimated from n trials
 */
export function binomialStandardError(p: number, n: number): number {
  if (n <= 0) {
    return NaN;
  }
  return Math.sqrt((p * (1 - p)) / n);
}
