/* errors.ts — Error taxonomy for commands and simulation construction */

export type SimErrorCode =
  | 'OutOfBounds'
  | 'Blocked'
  | 'UnknownDrone'
  | 'UnknownTarget'
  | 'UnknownBehavior'
  | 'InvalidCommand'
  | 'InsufficientSpace'
  | 'InvalidConfig';

/**
 * Raised at the command boundary or while building a simulation.
 * Movement failures inside a tick are returned as results instead and
 * handled by the behavior state machine.
 */
export class SimulationError extends Error {
  readonly code: SimErrorCode;

  constructor(code: SimErrorCode, message: string) {
    super(message);
    this.name = 'SimulationError';
    this.code = code;
  }
}

export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}

/** Unknown entities map to 404, every other rejected command to 400 */
export function httpStatusFor(err: SimulationError): number {
  switch (err.code) {
    case 'UnknownDrone':
    case 'UnknownTarget':
      return 404;
    default:
      return 400;
  }
}
