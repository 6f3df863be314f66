import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

/**
 * A required node was resolved without ever being given a value.
 */
export class RequirementError extends SolconfError {
  constructor(message = 'Required value was not provided') {
    super(message, {
      code: ErrorCode.REQUIREMENT
    });
  }
}
