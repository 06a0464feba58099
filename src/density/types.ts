/**
 * Which truncated series evaluates the zero-drift, unit-separation density
 */
export type SeriesKind = 'small-time' | 'large-time';

/**
 * Outcome of the Navarro & Fuss crossover heuristic for one normalized time
 */
export interface SeriesApproximation {
  /** Normalized time tt = t / a² */
  normalizedTime: number;
  /** Terms the small-time (image) series needs for the error budget (Eq 11) */
  smallTimeTerms: number;
  /** Terms the large-time (Fourier) series needs for the error budget (Eq 10) */
  largeTimeTerms: number;
  /** smallTimeTerms - largeTimeTerms (Eq 12) */
  lambda: number;
  /** Series selected by Eq 13: small-time when lambda < 0 */
  series: SeriesKind;
}

/**
 * Options for density evaluation
 */
export interface DensityOptions {
  /** Truncation-error budget of the series, in (0, 1). Default: 0.001 */
  epsilon?: number;
}

/**
 * Options for integrating the density over time
 */
export interface CumulativeOptions extends DensityOptions {
  /** Number of Simpson intervals on (0, t]; rounded up to an even number. Default: 2000 */
  steps?: number;
}
