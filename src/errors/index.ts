/**
 * Base class for errors raised by ddmkit
 */
export class DDMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when an argument lies outside the domain of the computation
 * (b outside (0,1), non-positive a, t or time step, a choice other than 0 or 1, ...)
 */
export class InvalidParameterError extends DDMError {
  constructor(
    /** Name of the offending argument */
    public readonly parameter: string,
    /** The value that was rejected */
    public readonly value: unknown,
    reason: string,
  ) {
    super(`Invalid ${parameter}: ${String(value)} (${reason})`);
  }
}

/**
 * Raised when a random walk is still between the barriers after the configured
 * maximum number of steps. Retrying with a larger bound, a larger time step or a
 * stronger drift may succeed.
 */
export class SimulationTimeoutError extends DDMError {
  constructor(
    /** Steps taken before giving up */
    public readonly steps: number,
    /** Simulated time reached (steps * time step) */
    public readonly time: number,
  ) {
    super(`Random walk did not reach a barrier within ${steps} steps (t = ${time})`);
  }
}
