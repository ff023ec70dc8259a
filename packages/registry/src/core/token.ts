/**
 * Branded type for canonical type identifiers.
 * Prevents accidental use of raw strings as type ids.
 */
export type CanonicalId = string & { __brand: 'CanonicalId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates a token with the value type it identifies without runtime overhead.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Optional runtime check used when a resolved value is downcast to `T`.
 */
export type TypeGuard<T> = (value: unknown) => value is T;

/**
 * Runtime type identity.
 *
 * TypeScript erases types, so every type the registry can store or build is
 * named by a token. Two tokens denote the same type iff their `id`s are equal.
 *
 * @template T - The type of value this token identifies
 */
export interface Token<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'token';

  /** Unique canonical identifier (typ_1, typ_2, etc.) */
  readonly id: CanonicalId;

  /** Human-readable label for diagnostics */
  readonly label: string;

  /** Checked-downcast predicate, consulted by `make` when present */
  readonly guard?: TypeGuard<T>;

  /** Phantom type brand - associates the token with its value type */
  readonly [TOKEN_BRAND]?: T;
}

let _typeCounter = 0;

/**
 * Create a new type identity.
 *
 * Tokens are frozen objects. Creating two tokens with the same label yields
 * two distinct types; share the token instead.
 *
 * @param label - Human-readable label (defaults to "Type")
 * @param guard - Optional predicate run on the final value of `make`
 *
 * @example
 * ```typescript
 * const Port = token<number>('Port', (x): x is number => Number.isInteger(x));
 * const Host = token<string>('Host');
 * ```
 */
export function token<T = unknown>(label?: string, guard?: TypeGuard<T>): Token<T> {
  const resolvedLabel = label ?? 'Type';
  const id = `typ_${++_typeCounter}` as CanonicalId;
  const t: Token<T> = guard
    ? { kind: 'token', id, label: resolvedLabel, guard }
    : { kind: 'token', id, label: resolvedLabel };
  return Object.freeze(t);
}

/**
 * Runtime type guard to check if a value is a valid Token.
 * Used for input validation in public APIs.
 */
export function isToken(x: unknown): x is Token<unknown> {
  if (typeof x !== 'object' || x === null) return false;
  const candidate = x as Partial<Record<keyof Token, unknown>>;
  return (
    candidate.kind === 'token' &&
    typeof candidate.id === 'string' &&
    typeof candidate.label === 'string' &&
    (candidate.guard === undefined || typeof candidate.guard === 'function')
  );
}
