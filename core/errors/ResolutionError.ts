import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

/**
 * Wraps a non-solconf error thrown while a node was being resolved.
 */
export class ResolutionError extends SolconfError {
  constructor(message: string, cause?: unknown) {
    super(message, {
      code: ErrorCode.RESOLUTION,
      cause
    });
  }

  static wrap(error: unknown): SolconfError {
    if (error instanceof SolconfError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ResolutionError(message, error);
  }
}
