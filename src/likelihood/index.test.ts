import {
  createSamplerData,
  validateSamplerData,
  ddmLogLikelihood,
  ddmLogPrior,
  ddmLogPosterior,
  SamplerData,
} from '../likelihood';
import { timeChoiceDensity } from '../density';
import { simulateDDM } from '../randomwalk';
import { InvalidParameterError } from '../errors';
import { SeededRandom } from '../utils/random';
import { Trajectory } from '../types';

const trajectories: Trajectory[] = [
  { choice: 1, time: 1 },
  { choice: 0, time: 1 },
];

const draw = { alpha: 2, beta: 0.5, delta: 1 };

function createData(overrides: Partial<SamplerData> = {}): SamplerData {
  return {
    ...createSamplerData(trajectories, { alphaUpperBound: 5, sigma: 2 }),
    ...overrides,
  };
}

describe('createSamplerData', () => {
  it('should map trajectories onto the sampler record', () => {
    expect(createSamplerData(trajectories, { alphaUpperBound: 5, sigma: 2, tau: 0.1 })).toEqual({
      n: 2,
      y: [1, 1],
      z: [1, 0],
      alpha_ub: 5,
      sigma: 2,
      tau: 0.1,
    });
  });

  it('should default the non-decision time to zero', () => {
    expect(createSamplerData(trajectories, { alphaUpperBound: 5, sigma: 2 }).tau).toBe(0);
  });

  it('should reject non-positive prior hyperparameters', () => {
    expect(() => createSamplerData(trajectories, { alphaUpperBound: 0, sigma: 2 })).toThrow(InvalidParameterError);
    expect(() => createSamplerData(trajectories, { alphaUpperBound: 5, sigma: -1 })).toThrow(InvalidParameterError);
    expect(() => createSamplerData(trajectories, { alphaUpperBound: 5, sigma: 2, tau: -0.1 })).toThrow(
      'Invalid tau: -0.1 (must be non-negative)',
    );
  });
});

describe('validateSamplerData', () => {
  it('should reject mismatched lengths', () => {
    expect(() => validateSamplerData(createData({ n: 3 }))).toThrow('Invalid y: 2 (expected 3 response times)');
    expect(() => validateSamplerData(createData({ z: [1] }))).toThrow('Invalid z: 1 (expected 2 choices)');
  });

  it('should reject negative response times and invalid choices', () => {
    expect(() => validateSamplerData(createData({ y: [1, -0.5] }))).toThrow(
      'Invalid y[1]: -0.5 (must be a non-negative finite number)',
    );
    expect(() => validateSamplerData(createData({ z: [1, 2] }))).toThrow('Invalid choice: 2 (must be 0 or 1)');
  });
});

describe('ddmLogLikelihood', () => {
  it('should sum log densities with z = 1 on the upper barrier', () => {
    // log(0.37703388799034276) + log(0.051025988020974335)
    expect(ddmLogLikelihood(createData(), draw)).toBeCloseTo(-3.9508404140106266, 10);
  });

  it('should subtract the non-decision time', () => {
    const shifted = createData({ y: [1.25, 1.25], tau: 0.25 });

    expect(ddmLogLikelihood(shifted, draw)).toBeCloseTo(-3.9508404140106266, 10);
  });

  it('should agree with the density for simulated data', () => {
    const batch = simulateDDM(25, { b: 0.4, a: 1.5, v: 0.7 }, { timeStep: 1e-3, random: new SeededRandom(11) });
    const data = createSamplerData(batch, { alphaUpperBound: 4, sigma: 1 });
    const params = { b: 0.4, a: 1.5, v: 0.7 };

    const expected = batch.reduce((sum, t) => sum + Math.log(timeChoiceDensity(t.time, params, t.choice)), 0);

    expect(ddmLogLikelihood(data, { alpha: 1.5, beta: 0.4, delta: 0.7 })).toBeCloseTo(expected, 10);
  });

  it('should be -Infinity when a response precedes the non-decision time', () => {
    expect(ddmLogLikelihood(createData({ tau: 1 }), draw)).toBe(-Infinity);
  });

  it('should be zero for an empty record', () => {
    expect(ddmLogLikelihood(createSamplerData([], { alphaUpperBound: 5, sigma: 2 }), draw)).toBe(0);
  });

  it('should reject out-of-domain parameter draws', () => {
    expect(() => ddmLogLikelihood(createData(), { alpha: 2, beta: 1.5, delta: 1 })).toThrow(InvalidParameterError);
  });
});

describe('ddmLogPrior', () => {
  it('should combine the uniform and normal priors', () => {
    // -log(5) + log N(1; 0, 2)
    expect(ddmLogPrior(createData(), draw)).toBeCloseTo(-3.346523626198718, 12);
  });

  it('should be -Infinity outside the support', () => {
    const data = createData();

    expect(ddmLogPrior(data, { alpha: 6, beta: 0.5, delta: 0 })).toBe(-Infinity);
    expect(ddmLogPrior(data, { alpha: 0, beta: 0.5, delta: 0 })).toBe(-Infinity);
    expect(ddmLogPrior(data, { alpha: 2, beta: 1, delta: 0 })).toBe(-Infinity);
    expect(ddmLogPrior(data, { alpha: 2, beta: 0.5, delta: NaN })).toBe(-Infinity);
  });
});

describe('ddmLogPosterior', () => {
  it('should add prior and likelihood', () => {
    expect(ddmLogPosterior(createData(), draw)).toBeCloseTo(-7.297364040209345, 10);
  });

  it('should skip the likelihood outside the prior support', () => {
    expect(ddmLogPosterior(createData(), { alpha: 2, beta: 1.5, delta: 1 })).toBe(-Infinity);
  });
});
