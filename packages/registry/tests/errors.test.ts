import { describe, expect, it } from 'vitest';

import {
  BuildError,
  ConstructorFailedError,
  CycleDetectedError,
  EmptyArgsError,
  InvalidTokenError,
  MissingInputsError,
  NoConstructionPathError,
  TypeCastFailureError,
  TypeMismatchError,
} from '../src/errors/errors.js';

describe('error classes', () => {
  it('provides contextual error messages and properties', () => {
    const cycle = new CycleDetectedError(['A', 'B'], 'A');
    expect(cycle.context).toEqual(['A', 'B']);
    expect(cycle.repeated).toBe('A');
    expect(cycle.message.split('\n')).toContain('But we are trying to build again A.');

    const missing = new MissingInputsError('f :: Int -> Bool -> Text', ['5 :: Int'], ['Bool']);
    expect(missing.constructorSignature).toBe('f :: Int -> Bool -> Text');
    expect(missing.message.split('\n')).toEqual(
      expect.arrayContaining(['Only 1 could be made:', '  - 5 :: Int', '  - Bool'])
    );

    const noneMade = new MissingInputsError('f :: Int -> Text', [], ['Int']);
    expect(noneMade.message).toContain('None of them could be made.');

    const noPath = new NoConstructionPathError('Text', ['5 :: Int']);
    expect(noPath.available).toEqual(['5 :: Int']);
    expect(noPath.message.split('\n')).toContain('  - 5 :: Int');

    const noPathLarge = new NoConstructionPathError('Text', new Array<string>(11).fill('x'));
    expect(noPathLarge.message).toContain('11 entries are registered.');

    const cast = new TypeCastFailureError('Port', '80.5 :: Port');
    expect(cast.message.split('\n')).toContain('The value is of type: 80.5 :: Port');

    const mismatch = new TypeMismatchError('odd :: Int -> Bool', 'Int', 'Text');
    expect(mismatch.expected).toBe('Int');
    expect(mismatch.message).toContain('Failed to apply a Text to odd :: Int -> Bool.');

    const notFunction = new TypeMismatchError('5 :: Int', undefined, 'Bool');
    expect(notFunction.message).toContain('5 :: Int is a value, not a function.');

    const empty = new EmptyArgsError('odd :: Int -> Bool');
    expect(empty.fn).toBe('odd :: Int -> Bool');

    const cause = new Error('boom');
    const failed = new ConstructorFailedError('explode :: Int -> Text', cause);
    expect(failed.cause).toBe(cause);
    expect(failed.message).toContain('The function explode :: Int -> Text threw');
  });

  it('tags every build error with its kind and name', () => {
    const errors: BuildError[] = [
      new CycleDetectedError(['A'], 'A'),
      new MissingInputsError('f :: A -> B', [], ['A']),
      new NoConstructionPathError('A', []),
      new TypeCastFailureError('A', 'B'),
      new TypeMismatchError('f :: A -> B', 'A', 'B'),
      new EmptyArgsError('f :: A -> B'),
      new ConstructorFailedError('f :: A -> B', new Error('x')),
    ];

    expect(errors.map((e) => [e.kind, e.name])).toEqual([
      ['cycle-detected', 'CycleDetectedError'],
      ['missing-inputs', 'MissingInputsError'],
      ['no-construction-path', 'NoConstructionPathError'],
      ['type-cast-failure', 'TypeCastFailureError'],
      ['type-mismatch', 'TypeMismatchError'],
      ['empty-args', 'EmptyArgsError'],
      ['constructor-failed', 'ConstructorFailedError'],
    ]);
    expect(errors.every((e) => e instanceof BuildError && e instanceof Error)).toBe(true);
  });

  it('describes an invalid token even when it cannot be serialized', () => {
    const circular: { self?: unknown } = {};
    circular.self = circular;

    const invalid = new InvalidTokenError(circular);
    expect(invalid.token).toBe(circular);
    expect(invalid.message).toContain('[object Object]');
    expect(invalid).not.toBeInstanceOf(BuildError);

    expect(new InvalidTokenError('Int').message).toContain('"Int"');
  });
});
