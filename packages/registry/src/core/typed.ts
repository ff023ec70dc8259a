/*
 * Typed values
 * ------------
 * Boxes pairing a runtime value (or an uncurried JS function) with its type.
 *
 *  - `TypedValue`: a plain value whose type is a token.
 *  - `TypedFunction`: a callable viewed as the curried arrow
 *    `i1 -> ... -> in -> out`. Each `apply` checks the argument against the
 *    next input type and records it; applying the last input invokes the
 *    callable and yields a `TypedValue` of the output type.
 *
 * Boxes are frozen; `apply` always returns a new box.
 */
import { ConstructorFailedError, EmptyArgsError, TypeMismatchError } from '../errors/errors.js';
import type { Token } from './token.js';
import { arrowOf, sameType, showType, type TypeRep } from './type-rep.js';

declare const TYPED_BRAND: unique symbol;

/**
 * Phantom record of the value types an entry consumes and produces.
 * Only the optional static layer of `make` reads it.
 */
export interface Signed<In, Out> {
  readonly [TYPED_BRAND]?: { readonly in: In; readonly out: Out };
}

export interface TypedValue<T = unknown> extends Signed<never, T> {
  readonly kind: 'value';
  readonly type: Token;
  readonly value: T;
}

// Method syntax keeps the parameter check bivariant so that typed callables
// such as `(n: number) => boolean` can be stored behind one signature.
export interface Callable {
  invoke(...args: unknown[]): unknown;
}

export interface TypedFunction<In = unknown, Out = unknown> extends Signed<In, Out> {
  readonly kind: 'function';
  /** Arrow chain of the remaining inputs to the output */
  readonly type: TypeRep;
  /** Inputs still to be applied, in order */
  readonly inputs: readonly Token[];
  readonly output: Token;
  /** Arguments applied so far */
  readonly applied: readonly unknown[];
  readonly label: string;
  readonly callable: Callable;
}

export type Typed = TypedValue | TypedFunction;

export interface Signature {
  readonly inputs: readonly Token[];
  readonly output: Token;
}

/** Value type identified by a token. */
export type ValueOf<K> = K extends Token<infer V> ? V : never;

/** Value types of a tuple of tokens. */
export type ValuesOf<I extends readonly Token[]> = {
  [K in keyof I]: ValueOf<I[K]>;
};

/**
 * Box a value with its type.
 *
 * @example
 * ```typescript
 * const Port = token<number>('Port');
 * registry.register(val(Port, 8080));
 * ```
 */
export function val<T>(type: Token<T>, value: T): TypedValue<T> {
  const box: TypedValue<T> = { kind: 'value', type, value };
  return Object.freeze(box);
}

/**
 * Box a function with its input types and output type.
 *
 * The callable takes its inputs uncurried; the registry applies them one at
 * a time in the declared order.
 *
 * @example
 * ```typescript
 * const describe = fun([Int, Bool], Text, (n, b) => `${n}:${b}`);
 * ```
 */
export function fun<I extends Token[], O>(
  inputs: [...I],
  output: Token<O>,
  impl: (...args: ValuesOf<I>) => O,
  label?: string
): TypedFunction<ValueOf<I[number]>, O> {
  return functionBox<ValueOf<I[number]>, O>(
    inputs,
    output,
    { invoke: impl },
    label ?? (impl.name || 'λ')
  );
}

/**
 * Untyped counterpart of `fun`, for callers that already hold the tokens of
 * a callable whose parameter types are generic.
 */
export function functionBox<In = unknown, Out = unknown>(
  inputs: readonly Token[],
  output: Token,
  callable: Callable,
  label: string
): TypedFunction<In, Out> {
  if (inputs.length === 0) throw new EmptyArgsError(`${label} :: ${output.label}`);
  const box: TypedFunction<In, Out> = {
    kind: 'function',
    type: arrowOf(inputs, output),
    inputs: Object.freeze([...inputs]),
    output,
    applied: Object.freeze([]),
    label,
    callable,
  };
  return Object.freeze(box);
}

export function isFunction(v: Typed): v is TypedFunction {
  return v.kind === 'function';
}

export function typeOf(v: Typed): TypeRep {
  return v.type;
}

export function signature(v: Typed): Signature {
  return isFunction(v) ? { inputs: v.inputs, output: v.output } : { inputs: [], output: v.type };
}

/**
 * Apply a function box to one argument.
 *
 * @throws TypeMismatchError if `f` is not a function or `arg` is not of the
 * next input type
 * @throws ConstructorFailedError if the callable throws on the last input
 */
export function apply(f: Typed, arg: Typed): Typed {
  if (!isFunction(f)) {
    throw new TypeMismatchError(describeTyped(f), undefined, showType(arg.type));
  }
  const [expected, ...rest] = f.inputs;
  if (expected === undefined || isFunction(arg) || !sameType(expected, arg.type)) {
    throw new TypeMismatchError(
      describeTyped(f),
      expected && showType(expected),
      showType(arg.type)
    );
  }

  const applied = [...f.applied, arg.value];
  if (rest.length > 0) {
    const partial: TypedFunction = {
      ...f,
      type: arrowOf(rest, f.output),
      inputs: Object.freeze(rest),
      applied: Object.freeze(applied),
    };
    return Object.freeze(partial);
  }

  let result: unknown;
  try {
    result = f.callable.invoke(...applied);
  } catch (e) {
    throw new ConstructorFailedError(describeTyped(f), e);
  }
  return val(f.output, result);
}

/**
 * Apply arguments left to right.
 *
 * @throws EmptyArgsError if `args` is empty
 */
export function applyAll(f: Typed, args: readonly Typed[]): Typed {
  if (args.length === 0) throw new EmptyArgsError(describeTyped(f));
  return args.reduce(apply, f);
}

export function describeTyped(v: Typed): string {
  if (isFunction(v)) return `${v.label} :: ${showType(v.type)}`;
  return `${describeValue(v.value)} :: ${v.type.label}`;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'function') return value.name ? `[Function ${value.name}]` : '[Function]';
  if (typeof value === 'object' && value !== null) {
    const ctor = value.constructor;
    if (typeof ctor === 'function' && ctor !== Object && ctor.name) return `<${ctor.name}>`;
    try {
      return JSON.stringify(value);
    } catch {
      return '[Object]';
    }
  }
  return String(value);
}
