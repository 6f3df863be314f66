import { cast } from './cast';
import { choices } from './choices';
import { extendsModifier } from './extends';
import { hidden, noop, required, visible } from './flags';
import { fuse } from './fuse';
import { load } from './load';
import { promote } from './promote';
import { rename } from './rename';

export { CastModifier } from './cast';
export { ChoicesModifier } from './choices';
export type { ChoiceSpec } from './choices';
export { CustomModifier, defineModifier } from './custom';
export type { ModifierFunction } from './custom';
export { ExtendsModifier } from './extends';
export { ModifierFactory } from './factory';
export { NoopModifier, RequiredModifier, VisibilityModifier } from './flags';
export { FuseModifier } from './fuse';
export { LoadModifier } from './load';
export { PromoteModifier } from './promote';
export { RenameModifier } from './rename';
export { cast, choices, extendsModifier, fuse, hidden, load, noop, promote, rename, required, visible };

/**
 * Names under which the built-in modifiers are visible to expressions.
 * `derives` is an alias of `extends`.
 */
export function builtinModifiers(): Array<[string, unknown]> {
  return [
    ['hidden', hidden],
    ['visible', visible],
    ['required', required],
    ['noop', noop],
    ['promote', promote],
    ['fuse', fuse],
    ['rename', rename],
    ['choices', choices],
    ['extends', extendsModifier],
    ['derives', extendsModifier],
    ['load', load],
    ['cast', cast]
  ];
}
