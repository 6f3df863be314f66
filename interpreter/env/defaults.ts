import { createBuiltinFunctions } from '@interpreter/builtin/functions';
import { builtinTypes } from '@interpreter/builtin/types';
import { builtinModifiers, defineModifier } from '@interpreter/modifiers';
import type { ModifierFunction } from '@interpreter/modifiers';
import { ContextRegistry } from './ContextRegistry';
import type { RegisterOptions } from './ContextRegistry';

/**
 * Registry holding the built-in functions, types and modifiers.
 */
export function createDefaultRegistry(): ContextRegistry {
  const registry = new ContextRegistry();
  for (const fn of createBuiltinFunctions()) {
    registry.register(fn.name, fn);
  }
  for (const type of builtinTypes) {
    registry.register(type.name, type);
  }
  for (const [name, modifier] of builtinModifiers()) {
    registry.register(name, modifier);
  }
  return registry;
}

/**
 * Process-wide registry copied by every evaluator created after a
 * registration. Prefer per-instance registration where possible.
 */
export const globalRegistry = createDefaultRegistry();

export function registerGlobal(name: string, value: unknown, options?: RegisterOptions): void {
  globalRegistry.register(name, value, options);
}

export function registerModifier(name: string, fn: ModifierFunction, options?: RegisterOptions): void {
  globalRegistry.register(name, defineModifier(name, fn), options);
}
