/*
 * WorkingStore
 * ------------
 * Transient accumulator threaded through one resolution.
 *
 *  - Seeded from a registry's constructors; the registry itself is never
 *    written to.
 *  - Every value produced during the call (found, built or modified) is
 *    prepended, so later lookups of the same type reuse it.
 *  - Owned by a single call: `make` creates one and drops it on return.
 *
 * Lookup order mirrors registration order: index 0 is the most recent entry.
 */
import type { Context } from './context.js';
import type { Token } from './token.js';
import { isFunction, type Typed, type TypedFunction, type TypedValue } from './typed.js';
import { outputType, sameType } from './type-rep.js';

/**
 * Value made available for `value.type` while `context` is being built.
 */
export interface Override {
  readonly context: Token;
  readonly value: TypedValue;
}

/**
 * Transform `target -> target` applied to values of `target` before they are
 * stored.
 */
export interface Modifier {
  readonly target: Token;
  readonly transform: TypedFunction;
}

/**
 * A value together with the override contexts it was made under. The value is
 * only valid while every type of `dependsOn` is on the stack; an empty list
 * means it can be reused anywhere in the call.
 */
export interface Lookup {
  readonly value: Typed;
  readonly dependsOn: readonly Token[];
}

export class WorkingStore {
  private readonly entries: Typed[];

  /** Values that already went through a modifier in this call. */
  private readonly modified = new WeakSet<Typed>();

  constructor(constructors: readonly Typed[]) {
    this.entries = [...constructors];
  }

  /**
   * Find a value of the target type.
   *
   * The first override whose value has the target type and whose context type
   * is on the stack wins; otherwise the first non-function entry of the
   * target type.
   */
  findValue(target: Token, context: Context, overrides: readonly Override[]): Lookup | undefined {
    for (const o of overrides) {
      if (sameType(o.value.type, target) && context.has(o.context)) {
        return { value: o.value, dependsOn: [o.context] };
      }
    }
    const value = this.entries.find((e) => !isFunction(e) && sameType(e.type, target));
    return value && { value, dependsOn: [] };
  }

  /**
   * Find the first function whose fully uncurried output is the target type.
   */
  findConstructor(target: Token): TypedFunction | undefined {
    for (const e of this.entries) {
      if (isFunction(e) && sameType(outputType(e.type), target)) return e;
    }
    return undefined;
  }

  push(value: Typed, modified = false): void {
    this.entries.unshift(value);
    if (modified) this.modified.add(value);
  }

  wasModified(value: Typed): boolean {
    return this.modified.has(value);
  }
}
