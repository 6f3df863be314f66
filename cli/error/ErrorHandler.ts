import { Chalk } from 'chalk';
import { SolconfError, displayAddress } from '@core/errors';

export interface FormatErrorOptions {
  color?: boolean;
  /** Append the stack trace */
  debug?: boolean;
}

/**
 * One-screen rendering of an error for the terminal:
 *
 * ```
 * error [TYPE_CONSTRAINT] scalar 'train.lr': Expected a value of type float but got str
 *   via train <- <root>
 * ```
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const paint = new Chalk({ level: options.color ? 1 : 0 });
  const lines: string[] = [];
  if (error instanceof SolconfError) {
    lines.push(`${paint.red.bold('error')} ${paint.dim(`[${error.code}]`)} ${error.message}`);
    if (error.trail.length > 0) {
      lines.push(paint.dim(`  via ${error.trail.map(displayAddress).join(' <- ')}`));
    }
  } else {
    lines.push(`${paint.red.bold('error')} ${error instanceof Error ? error.message : String(error)}`);
  }
  if (options.debug && error instanceof Error && error.stack) {
    lines.push(paint.dim(error.stack));
  }
  return lines.join('\n');
}
