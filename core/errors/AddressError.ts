import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

export interface AddressErrorContext {
  /** The reference string being resolved */
  address?: string;
  /** The selector that failed */
  selector?: string;
}

/**
 * A reference string does not lead to a node.
 */
export class AddressError extends SolconfError {
  public readonly address?: string;
  public readonly selector?: string;

  constructor(message: string, context?: AddressErrorContext) {
    super(message, {
      code: ErrorCode.ADDRESS,
      details: {
        address: context?.address,
        selector: context?.selector
      }
    });
    this.address = context?.address;
    this.selector = context?.selector;
  }
}
