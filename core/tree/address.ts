import { AddressError } from '@core/errors';

/**
 * One step of a parsed reference string.
 */
export type AddressStep =
  | { type: 'ascend'; levels: number }
  | { type: 'select'; selector: string | number };

const COMPONENT = String.raw`(?:0|[1-9]\d*|\*?[A-Za-z_]\w*)`;
const ADDRESS_PATTERN = new RegExp(String.raw`^\.*(?:${COMPONENT}(?:\.+${COMPONENT})*\.*)?$`);
const TOKEN_PATTERN = /0|[1-9]\d*|\*?[A-Za-z_]\w*|\.+/g;

/**
 * Parse a reference string such as `a.b`, `..c`, `var2.2..0` or `*key`.
 *
 * A run of N dots ascends N-1 levels; a single dot only separates selectors.
 * Integer components select sequence items, `*name` selects the entry node
 * itself rather than its value.
 */
export function parseAddress(address: string): AddressStep[] {
  if (!ADDRESS_PATTERN.test(address)) {
    throw new AddressError(`Invalid reference string '${address}'`, { address });
  }
  const steps: AddressStep[] = [];
  for (const token of address.match(TOKEN_PATTERN) ?? []) {
    if (token.startsWith('.')) {
      if (token.length > 1) {
        steps.push({ type: 'ascend', levels: token.length - 1 });
      }
    } else if (/^\d/.test(token)) {
      steps.push({ type: 'select', selector: Number(token) });
    } else {
      steps.push({ type: 'select', selector: token });
    }
  }
  return steps;
}

/**
 * Join qualified-name parts, e.g. (['a', '0'], 'b') -> 'a.0.b'.
 */
export function joinAddress(parts: Array<string | number>): string {
  return parts.map(String).join('.');
}
