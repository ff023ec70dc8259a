import type { Token } from './token.js';
import { containsType } from './type-rep.js';

/**
 * Stack of the types being built on the current call path, outermost first.
 *
 * Immutable: `push` returns a new context, so siblings resolved after a
 * recursive call see the stack as it was before that call.
 */
export class Context {
  private constructor(readonly types: readonly Token[]) {}

  static of(target: Token): Context {
    return new Context([target]);
  }

  push(type: Token): Context {
    return new Context([...this.types, type]);
  }

  has(type: Token): boolean {
    return containsType(this.types, type);
  }

  labels(): string[] {
    return this.types.map((t) => t.label);
  }
}
