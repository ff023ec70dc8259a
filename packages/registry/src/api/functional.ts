/*
 * Curried registry operations.
 *
 * Each operation takes its payload first and returns a `Registry -> Registry`
 * step, so registries can be assembled by plain composition:
 *
 *   const registry = register(val(Int, 5))(register(fun([Int], Bool, odd))(end));
 *
 * The methods of `Registry` are the primary API; these wrappers only change
 * the argument order.
 */
import { Registry } from '../core/registry.js';
import type { Token } from '../core/token.js';
import type { Signed, Typed, TypedValue } from '../core/typed.js';

/** The registry with no overrides, modifiers or constructors. */
export const end: Registry = Registry.empty();

export function empty(): Registry {
  return Registry.empty();
}

export function register<I = never, O = never>(entry: Typed & Signed<I, O>) {
  return <In, Out>(registry: Registry<In, Out>): Registry<In | I, Out | O> =>
    registry.register<I, O>(entry);
}

export function combine<I1, O1, I2, O2>(
  first: Registry<I1, O1>,
  second: Registry<I2, O2>
): Registry<I1 | I2, O1 | O2> {
  return first.combine(second);
}

export function specialize<C, P>(context: Token<C>, value: TypedValue<P>) {
  return <In, Out>(registry: Registry<In, Out>): Registry<In, Out> =>
    registry.specialize(context, value);
}

export function tweak<T>(target: Token<T>, transform: (value: T) => T) {
  return <In, Out>(registry: Registry<In, Out>): Registry<In, Out> =>
    registry.tweak(target, transform);
}

/**
 * Build a registry from entries listed by decreasing priority: the first
 * entry is looked up first, as if it had been registered last.
 *
 * @example
 * ```typescript
 * const registry = registryOf(val(Int, 10), val(Int, 5));
 * makeUnsafe(registry, Int); // 10
 * ```
 */
export function registryOf(...entries: Typed[]): Registry<unknown, unknown> {
  return entries.reduceRight<Registry<unknown, unknown>>(
    (registry, entry) => registry.register<unknown, unknown>(entry),
    Registry.empty()
  );
}
