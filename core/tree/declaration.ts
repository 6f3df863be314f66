import { ConstructionError } from '@core/errors';
import { describeType } from '@core/types/native';
import { isModifier } from './Modifier';
import type { Modifier } from './Modifier';
import { isTypeConstraint, nullConstraint } from './types';
import type { TreeSession, TypeConstraint } from './types';

/**
 * Unevaluated `name:types:modifiers` parts of a raw key.
 */
export interface DeclarationSource {
  types?: string;
  modifiers?: string;
}

export interface Declaration {
  /** Undefined when nothing was declared, so an inherited declaration applies */
  types?: TypeConstraint[];
  modifiers: Modifier[];
}

function flatten(values: unknown[]): unknown[] {
  return values.flatMap(value => (Array.isArray(value) ? flatten(value) : [value]));
}

export function evaluateTypes(
  session: TreeSession,
  source: string,
  locals: Record<string, unknown>
): TypeConstraint[] {
  return flatten(session.evaluateList(source, locals)).map(value => {
    if (value === null) {
      return nullConstraint;
    }
    if (isTypeConstraint(value)) {
      return value;
    }
    throw new ConstructionError(`Type declaration '${source}' contains a ${describeType(value)}, not a type`);
  });
}

export function evaluateModifiers(
  session: TreeSession,
  source: string,
  locals: Record<string, unknown>
): Modifier[] {
  return flatten(session.evaluateList(source, locals)).map(value => {
    if (isModifier(value)) {
      return value;
    }
    throw new ConstructionError(`Modifier declaration '${source}' contains a ${describeType(value)}, not a modifier`);
  });
}

export function evaluateDeclaration(
  session: TreeSession,
  source: DeclarationSource,
  locals: Record<string, unknown>
): Declaration {
  return {
    types: source.types === undefined ? undefined : evaluateTypes(session, source.types, locals),
    modifiers: source.modifiers === undefined ? [] : evaluateModifiers(session, source.modifiers, locals)
  };
}

/**
 * Combine a derived entry's declaration with its base entry's.
 *
 * Own types win when present. Base modifiers keep their position; an own
 * modifier of the same kind takes that position (merged through `inherit`
 * when it has one) and the remaining own modifiers follow.
 */
export function mergeDeclarations(own: Declaration, base: Declaration): Declaration {
  const consumed = new Set<Modifier>();
  const inherited = base.modifiers.map(baseModifier => {
    const match = own.modifiers.find(m => m.kind === baseModifier.kind && !consumed.has(m));
    if (!match) {
      return baseModifier;
    }
    consumed.add(match);
    return match.inherit?.(baseModifier) ?? match;
  });
  return {
    types: own.types ?? base.types,
    modifiers: [...inherited, ...own.modifiers.filter(m => !consumed.has(m))]
  };
}
