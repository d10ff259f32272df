/**
 * truthish - Truthiness coercion with static types
 *
 * A `Truthy` typeclass decides whether a value counts as logically true
 * (non-zero, non-empty, non-absent), and the `truthy()` expression macro
 * rewrites a boolean expression over identifiers so each one is coerced
 * through the instance of its static type.
 *
 * @example
 * ```typescript
 * import { truthy, or, truthyString } from "truthish";
 *
 * function greet(name: string, retries: number, tags: string[]) {
 *   if (truthy(name && (retries || !tags))) { ... }
 *   return or(name, "anonymous", truthyString);
 * }
 * ```
 *
 * This module is the runtime half and pulls in no compiler code. The
 * transformer lives in "truthish/transformer" and the bundler plugin in
 * "truthish/unplugin".
 *
 * @packageDocumentation
 */

// ============================================================================
// Data Types
// ============================================================================

export { None, Some, isSome, isNone, getOrElse, type Option } from "./data/option.js";
export { Ok, Err, isOk, isErr, type Result } from "./data/result.js";
export { Left, Right, isLeft, isRight, fold, type Either } from "./data/either.js";
export { ref, type Ref } from "./data/ref.js";

// ============================================================================
// Typeclass & Instances
// ============================================================================

export {
  makeTruthy,
  truthyBy,
  truthyAlways,
  truthyNever,
  type Truthy,
} from "./typeclass/truthy.js";

export {
  truthyNumber,
  truthyBigInt,
  truthyBoolean,
  truthyString,
  truthyArray,
  truthySet,
  truthyMap,
  truthyTuple,
  truthyUnit,
  truthyOption,
  truthyResult,
  truthyEither,
} from "./typeclass/instances.js";

export {
  falsy,
  or,
  orEq,
  orElse,
  orElseEq,
  and,
  andEq,
  andThen,
  andThenEq,
  truthyOr,
  truthyAnd,
} from "./typeclass/combinators.js";

export {
  truthyLaws,
  checkLaws,
  type Law,
  type LawSet,
  type LawViolation,
} from "./typeclass/laws.js";

// ============================================================================
// Combinator Fallback
// ============================================================================

export { Cond, type Condition } from "./cond.js";

// ============================================================================
// Macro Placeholder (for use in source code)
// ============================================================================

/**
 * Coerce every identifier of a boolean expression through its Truthy
 * instance. Expanded at compile time by the truthish transformer; calling
 * it unexpanded is an error.
 *
 * @example
 * ```typescript
 * truthy(count && (name || !tags));
 * ```
 */
export function truthy(_expr: unknown): boolean {
  throw new Error(
    "truthy() must be processed by the truthish transformer at compile time. " +
      "Add the truthish transformer or bundler plugin to your build.",
  );
}
