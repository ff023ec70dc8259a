/*
 * Registry
 * --------
 * Immutable triple of overrides, modifiers and constructors.
 *
 *  - Every operation returns a new registry; no registry is mutated in place.
 *  - New entries are prepended: for a given type the most recent
 *    registration has the highest lookup priority.
 *  - `In` and `Out` are phantom unions of the value types consumed and
 *    produced by the constructors. They only feed the static check of `make`.
 */
import type { RegistryWarning } from '../types/types.js';
import type { Token } from './token.js';
import {
  describeTyped,
  functionBox,
  signature,
  type Signed,
  type Typed,
  type TypedValue,
} from './typed.js';
import { containsType, showType } from './type-rep.js';
import type { Modifier, Override } from './working-store.js';

declare const REGISTRY_BRAND: unique symbol;

export class Registry<In = never, Out = never> {
  declare readonly [REGISTRY_BRAND]?: { readonly in: In; readonly out: Out };

  private static readonly EMPTY: Registry = new Registry([], [], []);

  private constructor(
    readonly overrides: readonly Override[],
    readonly modifiers: readonly Modifier[],
    readonly constructors: readonly Typed[]
  ) {
    Object.freeze(this);
  }

  /** The registry with no overrides, modifiers or constructors. */
  static empty(): Registry {
    return Registry.EMPTY;
  }

  get size(): number {
    return this.constructors.length;
  }

  /**
   * Add a value or a function. It takes precedence over every entry of the
   * same type already registered.
   *
   * @example
   * ```typescript
   * const registry = Registry.empty()
   *   .register(val(Int, 5))
   *   .register(fun([Int], Bool, (n) => n % 2 === 1));
   * ```
   */
  register<I = never, O = never>(entry: Typed & Signed<I, O>): Registry<In | I, Out | O> {
    return new Registry<In | I, Out | O>(this.overrides, this.modifiers, [
      entry,
      ...this.constructors,
    ]);
  }

  /**
   * Concatenate two registries. Entries of `this` keep precedence over the
   * entries of `other`.
   */
  combine<I2, O2>(other: Registry<I2, O2>): Registry<In | I2, Out | O2> {
    return new Registry<In | I2, Out | O2>(
      [...this.overrides, ...other.overrides],
      [...this.modifiers, ...other.modifiers],
      [...this.constructors, ...other.constructors]
    );
  }

  /**
   * While a value of `context` is being built, use `value` whenever its type
   * is requested, before any registered value or constructor.
   *
   * @example
   * ```typescript
   * // the Config seen by Client (and everything Client needs) is `clientConfig`
   * registry.specialize(Client, val(Config, clientConfig));
   * ```
   */
  specialize<C, P>(context: Token<C>, value: TypedValue<P>): Registry<In, Out> {
    const override: Override = Object.freeze({ context, value });
    return new Registry<In, Out>([override, ...this.overrides], this.modifiers, this.constructors);
  }

  /**
   * Transform every value of `target` right after it is found or built,
   * before it is stored and handed to its consumers.
   */
  tweak<T>(target: Token<T>, transform: (value: T) => T): Registry<In, Out> {
    const modifier: Modifier = Object.freeze({
      target,
      transform: functionBox(
        [target],
        target,
        { invoke: transform },
        transform.name || `tweak ${target.label}`
      ),
    });
    return new Registry<In, Out>(this.overrides, [modifier, ...this.modifiers], this.constructors);
  }

  /** One line per entry, most recent first. */
  describe(): string[] {
    return [
      ...this.overrides.map(
        (o) => `override ${describeTyped(o.value)} while building ${o.context.label}`
      ),
      ...this.modifiers.map((m) => `modifier ${showType(m.transform.type)}`),
      ...this.constructors.map(describeTyped),
    ];
  }

  /**
   * Report overrides and modifiers that can never take effect because no
   * constructor of this registry produces their context or target type.
   */
  diagnose(): RegistryWarning[] {
    const outputs = this.constructors.map((c) => signature(c).output);
    const warnings: RegistryWarning[] = [];

    for (const o of this.overrides) {
      if (containsType(outputs, o.context)) continue;
      warnings.push({
        type: 'unreachable_override',
        message: `Override ${describeTyped(o.value)} is never used: nothing builds ${o.context.label}.`,
        details: { context: o.context.label, value: describeTyped(o.value) },
      });
    }

    for (const m of this.modifiers) {
      if (containsType(outputs, m.target)) continue;
      warnings.push({
        type: 'unreachable_modifier',
        message: `Modifier for ${m.target.label} is never used: nothing builds ${m.target.label}.`,
        details: { target: m.target.label },
      });
    }

    return warnings;
  }
}

