import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

/**
 * Two override entries target the same qualified name.
 */
export class OverrideConflictError extends SolconfError {
  constructor(public readonly targets: string[]) {
    super(`Conflicting overrides for ${targets.map(t => `'${t}'`).join(', ')}`, {
      code: ErrorCode.OVERRIDE_CONFLICT,
      details: { targets }
    });
  }
}
