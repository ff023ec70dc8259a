const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

export type BuildErrorKind =
  | 'cycle-detected'
  | 'missing-inputs'
  | 'no-construction-path'
  | 'type-cast-failure'
  | 'type-mismatch'
  | 'empty-args'
  | 'constructor-failed';

/**
 * Base class for every fatal condition raised while building a value.
 *
 * A `BuildError` always aborts the whole `make` call. Narrow on `kind` (or use
 * `instanceof` on the concrete classes) to inspect the structured fields.
 */
export abstract class BuildError extends Error {
  abstract readonly kind: BuildErrorKind;
}

/**
 * A type is required, directly or transitively, to build itself.
 */
export class CycleDetectedError extends BuildError {
  readonly kind = 'cycle-detected';

  constructor(
    public context: string[],
    public repeated: string
  ) {
    const cycleStr = [...context, repeated].join(' → ');
    super(
      format(`Cycle detected: ${cycleStr}`, [
        'Cycle detected!',
        '',
        'The types currently being built are:',
        ...context.map((t) => `  - ${t}`),
        '',
        `But we are trying to build again ${repeated}.`,
        '',
        'To fix this:',
        `  1. Register a value of type ${repeated} so the chain can stop`,
        `  2. Specialize ${repeated} for one of the types above`,
        '  3. Split the constructors so that no type needs itself',
      ])
    );
    this.name = 'CycleDetectedError';
  }
}

/**
 * Some inputs of a constructor could not be built.
 */
export class MissingInputsError extends BuildError {
  readonly kind = 'missing-inputs';

  constructor(
    public constructorSignature: string,
    public built: string[],
    public missing: string[]
  ) {
    const dev = [
      `Could not make all the inputs for ${constructorSignature}.`,
      '',
      ...(built.length > 0
        ? [`Only ${built.length} could be made:`, ...built.map((b) => `  - ${b}`)]
        : ['None of them could be made.']),
      '',
      'Missing:',
      ...missing.map((m) => `  - ${m}`),
      '',
      'To fix this:',
      '  1. Register a value or a constructor for each missing type',
    ];
    super(
      format(
        `Could not make all the inputs for ${constructorSignature}. Missing: ${missing.join(', ')}`,
        dev
      )
    );
    this.name = 'MissingInputsError';
  }
}

/**
 * No override, value or constructor exists for the requested type.
 */
export class NoConstructionPathError extends BuildError {
  readonly kind = 'no-construction-path';

  constructor(
    public target: string,
    public available: string[]
  ) {
    const parts: string[] = [`Could not create a ${target} out of the registry.`, ''];

    if (available.length > 0 && available.length <= 10) {
      parts.push('Registered entries:');
      available.forEach((a) => parts.push(`  - ${a}`));
      parts.push('');
    } else if (available.length > 10) {
      parts.push(`${available.length} entries are registered.`, '');
    } else {
      parts.push('The registry is empty.', '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Register a value of type ${target}`);
    parts.push(`  2. Or register a function whose final output is ${target}`);

    super(format(`Could not create a ${target} out of the registry.`, parts));
    this.name = 'NoConstructionPathError';
  }
}

/**
 * The resolved value could not be downcast to the requested type.
 */
export class TypeCastFailureError extends BuildError {
  readonly kind = 'type-cast-failure';

  constructor(
    public target: string,
    public actual: string
  ) {
    const dev = [
      `Could not cast the computed value to a ${target}.`,
      '',
      `The value is of type: ${actual}`,
      '',
      `If ${target} declares a guard, the guard rejected the value built for it.`,
    ];
    super(format(`Could not cast the computed value to a ${target}.`, dev));
    this.name = 'TypeCastFailureError';
  }
}

/**
 * A function box was applied to an argument of the wrong type, or the
 * applied box is not a function.
 */
export class TypeMismatchError extends BuildError {
  readonly kind = 'type-mismatch';

  constructor(
    public fn: string,
    public expected: string | undefined,
    public actual: string
  ) {
    const prod =
      expected === undefined
        ? `Cannot apply ${fn}: it is not a function.`
        : `Failed to apply ${actual} to ${fn}: expected ${expected}.`;
    const dev =
      expected === undefined
        ? [`Cannot apply ${fn} to a ${actual}.`, '', `${fn} is a value, not a function.`]
        : [
            `Failed to apply a ${actual} to ${fn}.`,
            '',
            `The next input of this function is ${expected}.`,
          ];
    super(format(prod, dev));
    this.name = 'TypeMismatchError';
  }
}

/**
 * A function box was applied to an empty argument list.
 */
export class EmptyArgsError extends BuildError {
  readonly kind = 'empty-args';

  constructor(public fn: string) {
    super(
      format(`The function ${fn} cannot be applied to an empty list of parameters.`, [
        `The function ${fn} cannot be applied to an empty list of parameters.`,
        '',
        'Functions need at least one input; box constants with val() instead.',
      ])
    );
    this.name = 'EmptyArgsError';
  }
}

/**
 * A registered function threw while being applied. The original error is
 * kept as `cause`.
 */
export class ConstructorFailedError extends BuildError {
  readonly kind = 'constructor-failed';

  constructor(
    public fn: string,
    cause: unknown
  ) {
    const dev = [
      'Constructor failed',
      '',
      `The function ${fn} threw while building its output. See 'cause' for details.`,
    ];
    super(format(`Function ${fn} failed during construction.`, dev), { cause });
    this.name = 'ConstructorFailedError';
  }
}

/**
 * A non-token value was passed where a type identity is expected.
 */
export class InvalidTokenError extends Error {
  constructor(public token: unknown) {
    let tokenString: string;
    try {
      tokenString = JSON.stringify(token);
    } catch {
      tokenString = String(token);
    }

    const dev = [
      'Invalid token parameter',
      '',
      `Expected a Token created with token('Label').`,
      '',
      'Received:',
      `  ${tokenString}`,
    ];

    super(format('Invalid token parameter.', dev));
    this.name = 'InvalidTokenError';
  }
}
