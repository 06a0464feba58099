import { InvalidParameterError } from '../errors';
import { Choice, DDMParameters } from '../types';

/**
 * Parameter checks shared by the simulation, density and choice routines.
 * Each throws InvalidParameterError and otherwise returns nothing.
 */

export function assertFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(name, value, 'must be a finite number');
  }
}

export function assertPositive(name: string, value: number): void {
  assertFinite(name, value);
  if (value <= 0) {
    throw new InvalidParameterError(name, value, 'must be greater than 0');
  }
}

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(name, value, 'must be a positive integer');
  }
}

export function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidParameterError(name, value, 'must be a non-negative integer');
  }
}

export function assertOpenUnitInterval(name: string, value: number): void {
  assertFinite(name, value);
  if (value <= 0 || value >= 1) {
    throw new InvalidParameterError(name, value, 'must lie strictly between 0 and 1');
  }
}

/**
 * Validate b in (0,1), a > 0 and a finite drift
 */
export function assertParameters(params: DDMParameters): void {
  assertOpenUnitInterval('b', params.b);
  assertPositive('a', params.a);
  assertFinite('v', params.v);
}

/**
 * Narrow a numeric choice to 0 | 1
 */
export function toChoice(value: number): Choice {
  if (value === 0) return 0;
  if (value === 1) return 1;
  throw new InvalidParameterError('choice', value, 'must be 0 or 1');
}
