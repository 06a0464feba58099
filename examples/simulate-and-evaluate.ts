/**
 * Example: simulate a batch of decisions and compare it with the analytic model
 *
 * Settings come from the environment (or a .env file):
 *   DDM_TIME_STEP=0.001 DDM_SEED=42 DDM_VERBOSE=true
 */

import * as dotenv from 'dotenv';
import {
  readConfigFromEnv,
  toSimulationOptions,
  toDensityOptions,
  simulateDDM,
  summarizeTrajectories,
  choiceProbability,
  expectedDecisionTime,
  timeChoiceDensity,
  createSamplerData,
  ddmLogPosterior,
  DDMParameters,
} from '../src';

dotenv.config();

function main() {
  const config = readConfigFromEnv();
  const params: DDMParameters = { b: 0.5, a: 2, v: 1 };

  // Step 1: simulate
  const trajectories = simulateDDM(2000, params, toSimulationOptions(config));
  const summary = summarizeTrajectories(trajectories);

  console.log('=== SIMULATION ===');
  console.log(`Upper proportion: ${summary.upperProportion.toFixed(4)} ± ${summary.upperProportionStandardError.toFixed(4)}`);
  console.log(`Mean decision time: ${summary.meanTime.toFixed(4)}`);

  // Step 2: analytic counterparts
  console.log('\n=== ANALYTIC ===');
  console.log(`P(upper): ${choiceProbability(params, 1).toFixed(4)}`);
  console.log(`E[T]: ${expectedDecisionTime(params).toFixed(4)}`);

  const densityOptions = toDensityOptions(config);
  for (const t of [0.25, 0.5, 1, 2]) {
    const upper = timeChoiceDensity(t, params, 1, densityOptions);
    const lower = timeChoiceDensity(t, params, 0, densityOptions);
    console.log(`t=${t}: upper ${upper.toFixed(4)}, lower ${lower.toFixed(4)}`);
  }

  // Step 3: posterior surface over drift, the way a sampler would probe it
  const data = createSamplerData(trajectories, { alphaUpperBound: 5, sigma: 2 });

  console.log('\n=== LOG POSTERIOR (alpha=2, beta=0.5) ===');
  for (const delta of [0, 0.5, 1, 1.5, 2]) {
    const logPosterior = ddmLogPosterior(data, { alpha: 2, beta: 0.5, delta }, densityOptions);
    console.log(`delta=${delta}: ${logPosterior.toFixed(2)}`);
  }
}

main();
