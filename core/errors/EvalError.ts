import { SolconfError } from './SolconfError';
import { ErrorCode } from './codes';

export interface EvalErrorContext {
  /** Expression source text */
  expression?: string;
  /** Offending identifier for undefined-name failures */
  identifier?: string;
  /** 1-based column of a syntax error */
  column?: number;
  cause?: unknown;
}

/**
 * Expression parse or evaluation failure.
 */
export class EvalError extends SolconfError {
  public readonly expression?: string;
  public readonly identifier?: string;

  constructor(message: string, context?: EvalErrorContext) {
    super(message, {
      code: context?.identifier ? ErrorCode.UNDEFINED_NAME : ErrorCode.EVAL,
      details: {
        expression: context?.expression,
        identifier: context?.identifier,
        column: context?.column
      },
      cause: context?.cause
    });
    this.expression = context?.expression;
    this.identifier = context?.identifier;
  }
}
