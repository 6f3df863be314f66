import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

/**
 * A value (or selected key) is outside an enumerated set of choices.
 */
export class ChoiceConstraintError extends SolconfError {
  constructor(
    message: string,
    public readonly choices: unknown[]
  ) {
    super(message, {
      code: ErrorCode.CHOICE_CONSTRAINT,
      details: { choices }
    });
  }
}
