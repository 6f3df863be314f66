import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

/**
 * A resolved value does not match any of the node's declared types.
 */
export class TypeConstraintError extends SolconfError {
  constructor(
    public readonly expected: string[],
    public readonly actual: string
  ) {
    super(`Expected a value of type ${expected.join(' | ')} but got ${actual}`, {
      code: ErrorCode.TYPE_CONSTRAINT,
      details: { expected, actual }
    });
  }
}
