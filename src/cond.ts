/**
 * Condition combinators
 *
 * The same boolean structure the `truthy()` macro produces, built from plain
 * function calls. Use it where code is not run through the transformer.
 *
 * A condition is a thunk; nothing is coerced until `Cond.run` is called, and
 * `and`/`or` short-circuit exactly like `&&`/`||`.
 *
 * @example
 * ```typescript
 * // truthy(x && (y || !z))
 * const c = Cond.and(
 *   Cond.t(x, truthyNumber),
 *   Cond.or(Cond.t(y, truthyString), Cond.not(Cond.t(z, truthyArray))),
 * );
 * Cond.run(c);
 * ```
 */

import type { Truthy } from "./typeclass/truthy.js";

export type Condition = () => boolean;

/** Coerce an already computed value */
function t<A>(value: A, T: Truthy<A>): Condition {
  return () => T.truthy(value);
}

/** Coerce a value computed only when the condition is reached */
function defer<A>(value: () => A, T: Truthy<A>): Condition {
  return () => T.truthy(value());
}

function and(left: Condition, right: Condition): Condition {
  return () => left() && right();
}

function or(left: Condition, right: Condition): Condition {
  return () => left() || right();
}

function not(inner: Condition): Condition {
  return () => !inner();
}

function run(condition: Condition): boolean {
  return condition();
}

export const Cond = {
  t,
  defer,
  and,
  or,
  not,
  run,
} as const;
