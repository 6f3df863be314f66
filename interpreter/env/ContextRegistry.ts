import { ConstructionError } from '@core/errors';

export interface RegisterOptions {
  /** Replace an existing binding instead of failing */
  overwrite?: boolean;
}

const NAME_PATTERN = /^[A-Za-z_]\w*$/;

/**
 * Name-to-value table backing the expression evaluator.
 *
 * Evaluators copy a registry when they are constructed, so later
 * registrations on the source registry do not reach existing evaluators.
 */
export class ContextRegistry {
  private readonly bindings: Map<string, unknown>;

  constructor(entries?: Iterable<[string, unknown]>) {
    this.bindings = new Map(entries);
  }

  register(name: string, value: unknown, options: RegisterOptions = {}): this {
    if (!NAME_PATTERN.test(name)) {
      throw new ConstructionError(`Cannot register '${name}': not a valid identifier`);
    }
    if (this.bindings.has(name) && !options.overwrite) {
      throw new ConstructionError(`Name '${name}' is already registered`);
    }
    this.bindings.set(name, value);
    return this;
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  get(name: string): unknown {
    return this.bindings.get(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  clone(): ContextRegistry {
    return new ContextRegistry(this.bindings);
  }
}
