import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

/**
 * The unit loader has no content for a requested unit name.
 */
export class UnitNotFoundError extends SolconfError {
  constructor(
    public readonly unit: string,
    searched: string[] = []
  ) {
    const tail = searched.length > 0 ? ` (searched ${searched.join(', ')})` : '';
    super(`Configuration unit '${unit}' not found${tail}`, {
      code: ErrorCode.UNIT_NOT_FOUND,
      details: { unit, searched }
    });
  }
}
