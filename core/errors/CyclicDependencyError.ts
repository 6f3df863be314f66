import { SolconfError, displayAddress } from './SolconfError';
import { ErrorCode } from './codes';

/**
 * A node was re-entered while its resolution (or modification) was in progress.
 */
export class CyclicDependencyError extends SolconfError {
  /** Qualified names from the first visit of the repeated node back to it */
  public readonly chain: string[];

  constructor(chain: string[], message?: string) {
    super(message ?? `Cyclic dependency: ${chain.map(displayAddress).join(' -> ')}`, {
      code: ErrorCode.CYCLIC_DEPENDENCY,
      details: { chain }
    });
    this.chain = chain;
  }
}
