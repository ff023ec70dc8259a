/*
 * Type representations
 * --------------------
 * A type is either a nominal `Token` or a curried arrow `input -> output`.
 * Function boxes expose their signature as an arrow chain so that
 * `Int -> Bool -> Text` decomposes into inputs [Int, Bool] and output Text.
 *
 * Equality is nominal on tokens (canonical id) and structural on arrows.
 */
import type { Token } from './token.js';

export interface Arrow {
  readonly kind: 'arrow';
  readonly input: TypeRep;
  readonly output: TypeRep;
}

export type TypeRep = Token | Arrow;

export function isArrow(rep: TypeRep): rep is Arrow {
  return rep.kind === 'arrow';
}

/**
 * Build the curried arrow `i1 -> i2 -> ... -> output`.
 * With no inputs the output itself is returned.
 */
export function arrowOf(inputs: readonly TypeRep[], output: TypeRep): TypeRep {
  return inputs.reduceRight<TypeRep>(
    (acc, input) => Object.freeze({ kind: 'arrow', input, output: acc }),
    output
  );
}

export function sameType(a: TypeRep, b: TypeRep): boolean {
  if (a === b) return true;
  if (a.kind === 'token' || b.kind === 'token') {
    return a.kind === 'token' && b.kind === 'token' && a.id === b.id;
  }
  return sameType(a.input, b.input) && sameType(a.output, b.output);
}

/** Ordered input types of an arrow chain; empty for a non-arrow. */
export function inputTypes(rep: TypeRep): TypeRep[] {
  const inputs: TypeRep[] = [];
  let current = rep;
  while (isArrow(current)) {
    inputs.push(current.input);
    current = current.output;
  }
  return inputs;
}

/** Final output of a fully uncurried arrow chain; the type itself otherwise. */
export function outputType(rep: TypeRep): TypeRep {
  let current = rep;
  while (isArrow(current)) current = current.output;
  return current;
}

export function containsType(types: readonly TypeRep[], rep: TypeRep): boolean {
  return types.some((t) => sameType(t, rep));
}

export function showType(rep: TypeRep): string {
  if (!isArrow(rep)) return rep.label;
  const input = isArrow(rep.input) ? `(${showType(rep.input)})` : showType(rep.input);
  return `${input} -> ${showType(rep.output)}`;
}
