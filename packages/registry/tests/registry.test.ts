import { describe, expect, it } from 'vitest';

import {
  combine,
  empty,
  end,
  register,
  registryOf,
  specialize,
  tweak,
} from '../src/api/functional.js';
import { Registry } from '../src/core/registry.js';
import { token } from '../src/core/token.js';
import { fun, val } from '../src/core/typed.js';
import { showType } from '../src/core/type-rep.js';

const Int = token<number>('Int');
const Bool = token<boolean>('Bool');
const Text = token<string>('Text');

const odd = (n: number): boolean => n % 2 === 1;

describe('Registry', () => {
  it('starts empty', () => {
    const registry = Registry.empty();

    expect(registry.size).toBe(0);
    expect(registry.overrides).toEqual([]);
    expect(registry.modifiers).toEqual([]);
    expect(registry.constructors).toEqual([]);
    expect(Registry.empty()).toBe(registry);
  });

  it('prepends registrations and never mutates the receiver', () => {
    const five = val(Int, 5);
    const ten = val(Int, 10);

    const first = Registry.empty().register(five);
    const second = first.register(ten);

    expect(first.constructors).toEqual([five]);
    expect(second.constructors).toEqual([ten, five]);
    expect(second.size).toBe(2);
    expect(Object.isFrozen(second)).toBe(true);
  });

  it('combines registries keeping the receiver first', () => {
    const a = Registry.empty()
      .register(val(Int, 1))
      .specialize(Bool, val(Int, 2))
      .tweak(Int, (n) => n + 1);
    const b = Registry.empty()
      .register(val(Int, 3))
      .specialize(Text, val(Int, 4))
      .tweak(Int, (n) => n * 2);

    const combined = a.combine(b);

    expect(combined.constructors).toEqual([...a.constructors, ...b.constructors]);
    expect(combined.overrides).toEqual([...a.overrides, ...b.overrides]);
    expect(combined.modifiers).toEqual([...a.modifiers, ...b.modifiers]);
  });

  it('prepends overrides with their context type', () => {
    const registry = Registry.empty()
      .specialize(Bool, val(Int, 1))
      .specialize(Text, val(Int, 2));

    expect(registry.overrides.map((o) => o.context)).toEqual([Text, Bool]);
    expect(registry.overrides[0]?.value).toEqual(val(Int, 2));
    expect(registry.size).toBe(0);
  });

  it('boxes modifiers as endomorphisms of their target', () => {
    const registry = Registry.empty().tweak(Int, function increment(n) {
      return n + 1;
    });

    const [modifier] = registry.modifiers;
    expect(modifier?.target).toBe(Int);
    expect(modifier && showType(modifier.transform.type)).toBe('Int -> Int');
    expect(modifier?.transform.label).toBe('increment');
  });

  it('describes its entries', () => {
    const registry = Registry.empty()
      .register(val(Int, 5))
      .register(fun([Int], Bool, odd))
      .specialize(Bool, val(Int, 3))
      .tweak(Int, (n) => n + 1);

    expect(registry.describe()).toEqual([
      'override 3 :: Int while building Bool',
      'modifier Int -> Int',
      'odd :: Int -> Bool',
      '5 :: Int',
    ]);
  });

  describe('diagnose()', () => {
    it('reports overrides and modifiers that can never apply', () => {
      const registry = Registry.empty()
        .register(val(Int, 5))
        .specialize(Bool, val(Int, 3))
        .tweak(Text, (s) => s.toUpperCase());

      expect(registry.diagnose()).toEqual([
        {
          type: 'unreachable_override',
          message: 'Override 3 :: Int is never used: nothing builds Bool.',
          details: { context: 'Bool', value: '3 :: Int' },
        },
        {
          type: 'unreachable_modifier',
          message: 'Modifier for Text is never used: nothing builds Text.',
          details: { target: 'Text' },
        },
      ]);
    });

    it('accepts contexts and targets produced by functions', () => {
      const registry = Registry.empty()
        .register(val(Int, 5))
        .register(fun([Int], Bool, odd))
        .specialize(Bool, val(Int, 3))
        .tweak(Int, (n) => n + 1);

      expect(registry.diagnose()).toEqual([]);
    });
  });
});

describe('curried operations', () => {
  it('compose like the methods', () => {
    const five = val(Int, 5);
    const isOdd = fun([Int], Bool, odd);

    const curried = tweak(Int, (n: number) => n + 1)(
      specialize(Bool, val(Int, 3))(register(isOdd)(register(five)(end)))
    );

    expect(curried.constructors).toEqual([isOdd, five]);
    expect(curried.overrides).toHaveLength(1);
    expect(curried.modifiers).toHaveLength(1);
  });

  it('exposes empty() and combine()', () => {
    const left = register(val(Int, 1))(empty());
    const right = register(val(Int, 2))(empty());

    expect(combine(left, right).constructors).toEqual([val(Int, 1), val(Int, 2)]);
    expect(empty()).toBe(end);
  });

  it('builds a registry from entries listed by priority', () => {
    const ten = val(Int, 10);
    const five = val(Int, 5);

    expect(registryOf(ten, five).constructors).toEqual([ten, five]);
    expect(registryOf().size).toBe(0);
  });
});
