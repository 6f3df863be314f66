/**
 * Base interface for error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

export interface SolconfErrorOptions {
  code: string;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Where in the node tree an error was raised.
 */
export interface NodeLocation {
  /** Qualified name of the failing node ('' for the root) */
  address: string;
  /** Node kind: mapping, entry, sequence or scalar */
  kind: string;
}

export function displayAddress(address: string): string {
  return address === '' ? '<root>' : address;
}

/**
 * Base class for all solconf errors.
 * Provides structure for error codes, details and the node location.
 */
export class SolconfError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Node where the error was raised, once known */
  public location?: NodeLocation;
  /** Qualified names of the containers the error propagated through */
  public readonly trail: string[] = [];

  constructor(message: string, options: SolconfErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Attach the failing node. The first call wins and prefixes the message;
   * later calls record the container in the propagation trail.
   */
  public locate(address: string, kind: string): this {
    if (!this.location) {
      this.location = { address, kind };
      this.message = `${kind} '${displayAddress(address)}': ${this.message}`;
    } else if (this.trail[this.trail.length - 1] !== address && this.location.address !== address) {
      this.trail.push(address);
    }
    return this;
  }

  public toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.location) {
      result.location = this.location;
      result.trail = [...this.trail];
    }

    return result;
  }
}
