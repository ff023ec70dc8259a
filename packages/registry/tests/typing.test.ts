import { describe, expect, expectTypeOf, it } from 'vitest';

import { register } from '../src/api/functional.js';
import { make, makeUnsafe } from '../src/api/make.js';
import { Registry } from '../src/core/registry.js';
import { token } from '../src/core/token.js';
import { fun, val, type TypedFunction, type TypedValue } from '../src/core/typed.js';
import { NoConstructionPathError, MissingInputsError } from '../src/errors/errors.js';

const Int = token<number>('Int');
const Bool = token<boolean>('Bool');
const Text = token<string>('Text');

describe('static types', () => {
  it('records the value types of boxes', () => {
    expectTypeOf(val(Int, 5)).toEqualTypeOf<TypedValue<number>>();
    expectTypeOf(fun([Int, Bool], Text, (n, b) => `${n}${b}`)).toEqualTypeOf<
      TypedFunction<number | boolean, string>
    >();
  });

  it('tracks the inputs and outputs of a registry', () => {
    const registry = Registry.empty()
      .register(fun([Int], Text, (n) => `${n}`))
      .register(val(Int, 5));

    expectTypeOf(registry).toEqualTypeOf<Registry<number, string | number>>();
    expectTypeOf(register(val(Bool, true))(registry)).toEqualTypeOf<
      Registry<number, string | number | boolean>
    >();
    expectTypeOf(make(registry, Text)).toEqualTypeOf<string>();
    expect(make(registry, Text)).toBe('5');
  });

  it('rejects targets the registry cannot produce', () => {
    expect(() =>
      // @ts-expect-error Int is not an output of an empty registry
      make(Registry.empty(), Int)
    ).toThrow(NoConstructionPathError);
  });

  it('rejects registries with unsatisfied inputs', () => {
    const registry = Registry.empty().register(fun([Int], Text, (n) => `${n}`));

    expect(() =>
      // @ts-expect-error nothing produces the Int input
      make(registry, Text)
    ).toThrow(MissingInputsError);
    expectTypeOf(() => makeUnsafe(registry, Text)).returns.toEqualTypeOf<string>();
  });
});
