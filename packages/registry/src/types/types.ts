import type { BuildError } from '../errors/errors.js';

/**
 * How often a modifier runs on a value of its target type within one call.
 *
 *   - **Once**: a value produced by a modifier is stored as settled and is
 *     never transformed again when it is fetched back from the store.
 *   - **EveryFetch**: the modifier runs every time a value of its type passes
 *     through the store step, including values fetched back from the store,
 *     so non-idempotent transforms compound.
 *
 * Separate `make` calls never share state: both policies start every call
 * from the registry's unmodified registrations.
 *
 * @example
 * ```typescript
 * makeUnsafe(registry, Int, { modifiers: ModifierPolicy.EveryFetch });
 * ```
 */
export const ModifierPolicy = {
  /** Transform each stored value at most once per call (default) */
  Once: 'once',
  /** Transform every time a value is fetched through the store */
  EveryFetch: 'every-fetch',
} as const;

export type ModifierPolicyType = (typeof ModifierPolicy)[keyof typeof ModifierPolicy];
export type ModifierPolicy = ModifierPolicyType;

/**
 * Static finding about a registry that does not prevent resolution but
 * usually indicates a registration mistake.
 */
export type RegistryWarning =
  | {
      readonly type: 'unreachable_override';
      readonly message: string;
      readonly details: { readonly context: string; readonly value: string };
    }
  | {
      readonly type: 'unreachable_modifier';
      readonly message: string;
      readonly details: { readonly target: string };
    };

/**
 * Options accepted by `make`, `makeUnsafe` and `resolve`.
 */
export interface MakeOptions {
  /**
   * Modifier application policy.
   *
   * @default 'once'
   */
  modifiers?: ModifierPolicyType;

  /**
   * Optional hook invoked after a function is applied to its inputs.
   *
   * Receives the label of the built type and the application duration in
   * nanoseconds. Useful for profiling or custom telemetry.
   */
  onConstruct?: (type: string, durationNs: number) => void;

  /**
   * Receives the findings of `Registry.diagnose()` the first time a registry
   * is resolved. Defaults to `console.warn` outside production.
   */
  onWarning?: (warning: RegistryWarning) => void;
}

export type Result<T, E = BuildError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Trailing arguments of `make`. When the registry cannot statically produce
 * `T` (`T` is not among its outputs, or one of its inputs is produced by
 * nothing) a leading argument naming the problem becomes required, which
 * turns the call into a compile error.
 */
export type Reachable<T, In, Out> = [T] extends [Out]
  ? [Exclude<In, Out>] extends [never]
    ? [options?: MakeOptions]
    : [unsolvable: { readonly unsatisfiedInputs: Exclude<In, Out> }, options?: MakeOptions]
  : [notAnOutput: { readonly target: T }, options?: MakeOptions];
