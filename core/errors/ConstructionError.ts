import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

export interface ConstructionErrorContext {
  /** Raw path of the offending content, e.g. `a.b[2]` */
  path?: string;
  cause?: unknown;
}

/**
 * Malformed raw content or modifier declaration.
 */
export class ConstructionError extends SolconfError {
  public readonly path?: string;

  constructor(message: string, context?: ConstructionErrorContext) {
    const where = context?.path !== undefined ? ` (at ${context.path === '' ? '<root>' : context.path})` : '';
    super(`${message}${where}`, {
      code: ErrorCode.CONSTRUCTION,
      details: context?.path !== undefined ? { path: context.path } : undefined,
      cause: context?.cause
    });
    this.path = context?.path;
  }
}
