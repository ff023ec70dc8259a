import { token, type Token, type TypeGuard } from '../core/token.js';

/** One guard per token of a group; the guards give the value types. */
export type GuardShape<T> = { readonly [K in keyof T]: TypeGuard<T[K]> };

export type TokenGroup<T> = { readonly [K in keyof T]: Token<T[K]> };

/**
 * Create the tokens of one feature at once, each carrying its guard.
 *
 * Labels are `prefix.key`. Since every token has a guard, `make` checks the
 * final value of any of them before returning it.
 *
 * @example
 * ```typescript
 * const Http = createTokenGroup('Http', {
 *   Port: (x): x is number => Number.isInteger(x),
 *   Host: (x): x is string => typeof x === 'string',
 * });
 * // Http.Port: Token<number>, labelled 'Http.Port'
 * ```
 */
export function createTokenGroup<T extends Record<string, unknown>>(
  prefix: string,
  guards: GuardShape<T>
): TokenGroup<T> {
  // filled key by key below
  const group = {} as { -readonly [K in keyof T]: Token<T[K]> };

  for (const key of Object.keys(guards)) {
    if (!isKeyOf(guards, key)) continue;
    group[key] = token<T[typeof key]>(`${prefix}.${key}`, guards[key]);
  }

  return Object.freeze(group);
}

function isKeyOf<T extends object>(shape: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(shape, key);
}
