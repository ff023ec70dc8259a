export { Registry } from './core/registry.js';
export { combine, empty, end, register, registryOf, specialize, tweak } from './api/functional.js';
export { make, makeUnsafe, resolve } from './api/make.js';
export { createTokenGroup } from './api/token-utils.js';
export type { GuardShape, TokenGroup } from './api/token-utils.js';

export * from './core/token.js';
export {
  apply,
  applyAll,
  describeTyped,
  fun,
  isFunction,
  signature,
  typeOf,
  val,
} from './core/typed.js';
export type {
  Signature,
  Signed,
  Typed,
  TypedFunction,
  TypedValue,
  ValueOf,
  ValuesOf,
} from './core/typed.js';
export { arrowOf, inputTypes, outputType, sameType, showType } from './core/type-rep.js';
export type { Arrow, TypeRep } from './core/type-rep.js';
export type { Modifier, Override } from './core/working-store.js';

export { ModifierPolicy } from './types/types.js';
export type {
  MakeOptions,
  ModifierPolicyType,
  Reachable,
  RegistryWarning,
  Result,
} from './types/types.js';

// Errors
export {
  BuildError,
  ConstructorFailedError,
  CycleDetectedError,
  EmptyArgsError,
  InvalidTokenError,
  MissingInputsError,
  NoConstructionPathError,
  TypeCastFailureError,
  TypeMismatchError,
} from './errors/errors.js';
export type { BuildErrorKind } from './errors/errors.js';
