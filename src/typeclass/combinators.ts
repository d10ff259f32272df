/**
 * Derived Truthy operations
 *
 * Every function here works for ANY type with a Truthy instance and is written
 * only in terms of `truthy`/`falsy`. Dictionary-passing style: the instance is
 * the last parameter.
 *
 * The `*Eq` variants update a Ref in place and write nothing but `ref.value`.
 * Callbacks are invoked at most once, and only on the branch that needs them.
 *
 * @example
 * ```typescript
 * import { or, andThen, truthyString, truthyNumber } from "truthish";
 *
 * or("", "default", truthyString);            // "default"
 * or("foo", "default", truthyString);         // "foo"
 * andThen(0, (n) => n - 1, truthyNumber);     // 0 (callback not invoked)
 * andThen(2, (n) => n - 1, truthyNumber);     // 1
 * ```
 */

import { Left, Right, type Either } from "../data/either.js";
import { None, Some, type Option } from "../data/option.js";
import type { Ref } from "../data/ref.js";
import type { Truthy } from "./truthy.js";

/**
 * Not truthy. Always the exact complement of `T.truthy`.
 */
export function falsy<A>(a: A, T: Truthy<A>): boolean {
  return !T.truthy(a);
}

// ============================================================================
// or
// ============================================================================

/**
 * Returns `a` if it is truthy, otherwise `fallback`.
 */
export function or<A>(a: A, fallback: A, T: Truthy<A>): A {
  return T.truthy(a) ? a : fallback;
}

/**
 * Sets `ref.value` to `fallback` if it is currently falsy.
 */
export function orEq<A>(ref: Ref<A>, fallback: A, T: Truthy<A>): void {
  if (falsy(ref.value, T)) {
    ref.value = fallback;
  }
}

/**
 * Returns `a` if it is truthy, otherwise the result of `f`.
 * `f` runs only when `a` is falsy.
 */
export function orElse<A>(a: A, f: () => A, T: Truthy<A>): A {
  return T.truthy(a) ? a : f();
}

/**
 * Sets `ref.value` to the result of `f` if it is currently falsy.
 */
export function orElseEq<A>(ref: Ref<A>, f: () => A, T: Truthy<A>): void {
  if (falsy(ref.value, T)) {
    ref.value = f();
  }
}

// ============================================================================
// and
// ============================================================================

/**
 * Returns `a` if it is falsy, otherwise `replacement`.
 *
 * This mirrors short-circuit `&&` returning its second operand, not a
 * boolean conjunction.
 */
export function and<A>(a: A, replacement: A, T: Truthy<A>): A {
  return falsy(a, T) ? a : replacement;
}

/**
 * Sets `ref.value` to `replacement` if it is currently truthy.
 */
export function andEq<A>(ref: Ref<A>, replacement: A, T: Truthy<A>): void {
  if (T.truthy(ref.value)) {
    ref.value = replacement;
  }
}

/**
 * Returns `a` if it is falsy, otherwise `f(a)`.
 * `f` runs only when `a` is truthy.
 */
export function andThen<A>(a: A, f: (a: A) => A, T: Truthy<A>): A {
  return falsy(a, T) ? a : f(a);
}

/**
 * Sets `ref.value` to `f(ref.value)` if it is currently truthy.
 */
export function andThenEq<A>(ref: Ref<A>, f: (current: A) => A, T: Truthy<A>): void {
  if (T.truthy(ref.value)) {
    ref.value = f(ref.value);
  }
}

// ============================================================================
// Wrapping
// ============================================================================

/**
 * `Left(a)` if `a` is truthy, otherwise `Right(other)`.
 */
export function truthyOr<A, B>(a: A, other: B, T: Truthy<A>): Either<A, B> {
  return T.truthy(a) ? Left(a) : Right(other);
}

/**
 * `Some(other)` if `a` is truthy, otherwise `None`. `other` cannot be
 * nullish, since `Some(null)` would read as `None`.
 */
export function truthyAnd<A, B extends {}>(a: A, other: B, T: Truthy<A>): Option<B> {
  return T.truthy(a) ? Some(other) : None;
}
