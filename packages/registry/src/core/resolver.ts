/* Resolver
 *
 * Recursive construction of a value of a requested type. Responsibilities:
 *  - Look for a direct value first: overrides active in the current context,
 *    then plain values in the working store.
 *  - Otherwise pick the most recent function producing the type and build
 *    its inputs, in order, each with the input pushed on the context.
 *  - Detect cycles with the context stack and throw `CycleDetectedError`
 *    carrying the whole chain.
 *  - Run the matching modifier, then memoize the result on the front of the
 *    working store so siblings and later requests reuse it. Values that
 *    depend on an override of another type stay out of the store.
 *
 * Failure handling:
 *  - A type with no value and no constructor yields `undefined`; the caller
 *    decides whether that is fatal.
 *  - An input that cannot be built does not stop the loop: the remaining
 *    inputs are still attempted so that `MissingInputsError` lists everything
 *    that could and could not be made.
 *  - Every thrown `BuildError` unwinds the whole resolution.
 */

import { CycleDetectedError, MissingInputsError } from '../errors/errors.js';
import { ModifierPolicy, type MakeOptions, type ModifierPolicyType } from '../types/types.js';
import type { Context } from './context.js';
import type { Token } from './token.js';
import { apply, applyAll, describeTyped, type Typed, type TypedFunction } from './typed.js';
import { containsType, sameType } from './type-rep.js';
import type { Lookup, Modifier, Override, WorkingStore } from './working-store.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

export class Resolver {
  private readonly policy: ModifierPolicyType;
  private readonly onConstruct?: MakeOptions['onConstruct'];

  constructor(
    private readonly overrides: readonly Override[],
    private readonly modifiers: readonly Modifier[],
    private readonly store: WorkingStore,
    options: MakeOptions = {}
  ) {
    this.policy = options.modifiers ?? ModifierPolicy.Once;
    this.onConstruct = options.onConstruct;
  }

  /**
   * Make a value of `target`, `context` being the stack of types currently
   * built (including `target`).
   *
   * @returns the final value, or undefined when nothing can produce `target`
   */
  resolveUntyped(target: Token, context: Context): Typed | undefined {
    return this.build(target, context)?.value;
  }

  private build(target: Token, context: Context): Lookup | undefined {
    const found = this.store.findValue(target, context, this.overrides);
    if (found) return this.storeValue(target, found);

    const ctor = this.store.findConstructor(target);
    if (!ctor) return undefined;

    const { made, missing, dependsOn } = this.makeInputs(ctor.inputs, context);
    if (missing.length > 0) {
      throw new MissingInputsError(
        describeTyped(ctor),
        made.map(describeTyped),
        missing.map((t) => t.label)
      );
    }

    return this.storeValue(target, { value: this.construct(target, ctor, made), dependsOn });
  }

  /**
   * Make the inputs of a function, in order.
   *
   * Each made value has already been stored by `build`, so later siblings
   * find it through `findValue`. Siblings share the parent context: they are
   * visible to each other through the store only.
   */
  private makeInputs(
    inputs: readonly Token[],
    context: Context
  ): { made: Typed[]; missing: Token[]; dependsOn: Token[] } {
    const made: Typed[] = [];
    const missing: Token[] = [];
    const dependsOn: Token[] = [];

    for (const input of inputs) {
      if (context.has(input)) {
        throw new CycleDetectedError(context.labels(), input.label);
      }
      const result = this.build(input, context.push(input));
      if (!result) {
        missing.push(input);
        continue;
      }
      made.push(result.value);
      for (const c of result.dependsOn) {
        if (!containsType(dependsOn, c)) dependsOn.push(c);
      }
    }

    return { made, missing, dependsOn };
  }

  private construct(target: Token, ctor: TypedFunction, inputs: readonly Typed[]): Typed {
    const hook = this.onConstruct;
    if (!hook) return applyAll(ctor, inputs);

    const start = nowMs();
    try {
      return applyAll(ctor, inputs);
    } finally {
      hook(target.label, toNs(nowMs() - start));
    }
  }

  /**
   * Apply the first modifier targeting the value's type, then push the
   * result on the front of the working store.
   *
   * A value that depends on an override is only stored once it no longer
   * does: an override for `target` itself is active whenever `target` is
   * requested, so it is dropped from the dependencies here. Other overrides
   * stay, and keep the value out of the store for siblings outside their
   * context.
   */
  private storeValue(target: Token, { value, dependsOn }: Lookup): Lookup {
    const modifier = this.modifiers.find((m) => sameType(m.target, value.type));
    const settled = this.policy === ModifierPolicy.Once && this.store.wasModified(value);
    const final = !modifier || settled ? value : apply(modifier.transform, value);
    const modified = final !== value || settled;
    const remaining = dependsOn.filter((c) => !sameType(c, target));

    if (remaining.length === 0) this.store.push(final, modified);
    return { value: final, dependsOn: remaining };
  }
}
