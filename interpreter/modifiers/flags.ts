import { Modifier } from '@core/tree';
import type { Node } from '@core/tree';

export class VisibilityModifier extends Modifier {
  readonly kind = 'visibility';

  constructor(readonly hide: boolean) {
    super();
  }

  apply(node: Node): void {
    node.hidden = this.hide;
  }
}

/**
 * Value must be supplied by an override; a null default fails resolution.
 */
export class RequiredModifier extends Modifier {
  readonly kind = 'required';

  apply(node: Node): void {
    node.required = true;
  }
}

export class NoopModifier extends Modifier {
  readonly kind = 'noop';

  apply(): void {}
}

export const hidden = new VisibilityModifier(true);
export const visible = new VisibilityModifier(false);
export const required = new RequiredModifier();
export const noop = new NoopModifier();
