/**
 * ddmkit - Drift-Diffusion Model Toolkit
 *
 * Random-walk simulation of first passages, the time-choice density by
 * truncated series, and closed-form choice probabilities for the two-barrier
 * drift-diffusion model of binary decisions.
 */

// Core types
export * from './types';

// Errors
export { DDMError, InvalidParameterError, SimulationTimeoutError } from './errors';

// Random-walk simulation
export {
  randomWalk,
  simulateDDM,
  summarizeTrajectories,
} from './randomwalk';
export type {
  RandomWalkOptions,
  SimulationOptions,
  TrajectorySummary,
} from './randomwalk';

// Time-choice density
export {
  timeChoiceDensity,
  timeChoiceDensities,
  selectSeries,
  cumulativeChoiceProbability,
} from './density';
export type {
  CumulativeOptions,
  DensityOptions,
  SeriesApproximation,
  SeriesKind,
} from './density';

// Choice probabilities
export {
  choiceProbability,
  expectedDecisionTime,
} from './choice';

// Sampler boundary
export {
  createSamplerData,
  validateSamplerData,
  ddmLogLikelihood,
  ddmLogPrior,
  ddmLogPosterior,
} from './likelihood';
export type {
  DDMPosteriorDraw,
  SamplerData,
  SamplerDataConfig,
} from './likelihood';

// Configuration
export {
  DEFAULT_CONFIG,
  readConfigFromEnv,
  toSimulationOptions,
  toDensityOptions,
} from './config';
export type { DDMConfig } from './config';

// Random sources
export { SeededRandom, defaultRandomSource } from './utils/random';
export type { RandomSource } from './utils/random';
