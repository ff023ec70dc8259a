import {
  BuildError,
  InvalidTokenError,
  NoConstructionPathError,
  TypeCastFailureError,
} from '../errors/errors.js';
import { Context } from '../core/context.js';
import type { Registry } from '../core/registry.js';
import { Resolver } from '../core/resolver.js';
import { isToken, type Token } from '../core/token.js';
import { describeTyped, isFunction, type TypedValue } from '../core/typed.js';
import { sameType, showType } from '../core/type-rep.js';
import { WorkingStore } from '../core/working-store.js';
import type { MakeOptions, Reachable, RegistryWarning, Result } from '../types/types.js';

/**
 * Development mode flag for conditional validation and warnings.
 */
const IS_DEV = process.env.NODE_ENV !== 'production';

/** Registries whose diagnostics were already reported. */
const diagnosed = new WeakSet<object>();

function assertValidToken(token: unknown): asserts token is Token {
  if (!IS_DEV) return;
  if (!isToken(token)) throw new InvalidTokenError(token);
}

function defaultWarning(warning: RegistryWarning): void {
  if (!IS_DEV) return;
  console.warn(`[registry] ${warning.message}`);
}

function reportWarnings<In, Out>(registry: Registry<In, Out>, options: MakeOptions): void {
  if (diagnosed.has(registry)) return;
  diagnosed.add(registry);
  const onWarning = options.onWarning ?? defaultWarning;
  for (const warning of registry.diagnose()) onWarning(warning);
}

/**
 * Build a value of `target` and return it boxed.
 *
 * Never throws a `BuildError`: every fatal condition of the resolution is
 * returned as `{ ok: false, error }`. Errors thrown by hooks are rethrown.
 */
export function resolve<T, In, Out>(
  registry: Registry<In, Out>,
  target: Token<T>,
  options: MakeOptions = {}
): Result<TypedValue> {
  assertValidToken(target);
  reportWarnings(registry, options);

  const store = new WorkingStore(registry.constructors);
  const resolver = new Resolver(registry.overrides, registry.modifiers, store, options);

  try {
    const value = resolver.resolveUntyped(target, Context.of(target));
    if (!value) {
      return {
        ok: false,
        error: new NoConstructionPathError(target.label, registry.describe()),
      };
    }
    if (isFunction(value) || !sameType(value.type, target)) {
      return {
        ok: false,
        error: new TypeCastFailureError(target.label, showType(value.type)),
      };
    }
    if (target.guard && !target.guard(value.value)) {
      return {
        ok: false,
        error: new TypeCastFailureError(target.label, describeTyped(value)),
      };
    }
    return { ok: true, value };
  } catch (e) {
    if (e instanceof BuildError) return { ok: false, error: e };
    throw e;
  }
}

/**
 * Build a value of `target`, checking everything at runtime only.
 *
 * @throws BuildError when the value cannot be built or cast to `T`
 *
 * @example
 * ```typescript
 * const text = makeUnsafe(registry, Text);
 * ```
 */
export function makeUnsafe<T, In, Out>(
  registry: Registry<In, Out>,
  target: Token<T>,
  options: MakeOptions = {}
): T {
  const result = resolve(registry, target, options);
  if (!result.ok) throw result.error;
  // resolve() checked the type identity and, when present, the guard
  return result.value.value as T;
}

/**
 * Build a value of `target` from a registry that statically produces it.
 *
 * Identical to `makeUnsafe` at runtime. At compile time the call only
 * type-checks when `T` is one of the registry's outputs and every input of
 * its functions is itself an output; otherwise the compiler asks for an
 * extra argument naming the problem.
 */
export function make<T, In, Out>(
  registry: Registry<In, Out>,
  target: Token<T>,
  ...rest: Reachable<T, In, Out>
): T {
  const args: readonly unknown[] = rest;
  return makeUnsafe(registry, target, args.find(isMakeOptions) ?? {});
}

function isMakeOptions(x: unknown): x is MakeOptions {
  return typeof x === 'object' && x !== null && !('target' in x) && !('unsatisfiedInputs' in x);
}
