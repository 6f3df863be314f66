import { AddressError, RequirementError } from '@core/errors';
import { isNativeScalar } from '@core/types/native';
import type { NativeScalar } from '@core/types/native';
import { Node } from './Node';
import type { Selector } from './Node';

/**
 * Leaf holding a native scalar. String scalars starting with the
 * interpolation prefix (`$:` by default) are expressions evaluated on
 * resolution; the escape character in front of the prefix makes it literal.
 */
export class ScalarNode extends Node {
  readonly kind = 'scalar';
  private override?: { value: NativeScalar };

  constructor(readonly raw: NativeScalar) {
    super();
  }

  /** Override value if one was applied, otherwise the raw value */
  definedValue(): NativeScalar {
    return this.override ? this.override.value : this.raw;
  }

  children(): Node[] {
    return [];
  }

  replaceChild(): void {
    throw new AddressError(`Scalar '${this.qualifiedName}' has no children`);
  }

  copy(): ScalarNode {
    return new ScalarNode(this.raw);
  }

  protected selectChild(selector: Selector): Node {
    throw new AddressError(`Cannot select '${selector}' from scalar '${this.qualifiedName}'`, {
      selector: String(selector)
    });
  }

  protected childParts(): string[] {
    throw new AddressError(`Scalar '${this.qualifiedName}' has no children`);
  }

  protected acceptOverride(value: unknown): boolean {
    if (!isNativeScalar(value)) {
      return false;
    }
    this.override = { value };
    return true;
  }

  protected computeValue(): unknown {
    if (this.required && !this.overridden && this.raw === null) {
      throw new RequirementError();
    }
    const value = this.definedValue();
    if (typeof value !== 'string') {
      return value;
    }
    const { interpolationPrefix, escapePrefix } = this.session.config;
    if (value.startsWith(escapePrefix + interpolationPrefix)) {
      return value.slice(escapePrefix.length);
    }
    if (value.startsWith(interpolationPrefix)) {
      const result = this.session.evaluate(value.slice(interpolationPrefix.length).trim(), this.expressionLocals());
      // A node reached through root/self/node() stands for its value
      return result instanceof Node ? result.resolve() : result;
    }
    return value;
  }
}
