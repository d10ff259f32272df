/**
 * Standard Truthy instances
 *
 * Primitive instances are constants; instances for containers are built from
 * the instance of their contents, so `truthyOption(truthyNumber)` is the
 * instance for `Option<number>`.
 *
 * The `truthy()` expression macro resolves identifiers to these exports by
 * name (see core/instances.ts), so renaming one is a breaking change.
 */

import type { Either } from "../data/either.js";
import type { Option } from "../data/option.js";
import type { Result } from "../data/result.js";
import { truthyAlways, truthyNever, type Truthy } from "./truthy.js";

// ============================================================================
// Primitives
// ============================================================================

/** Truthy iff not zero. `-0` is zero; `NaN` is not. */
export const truthyNumber: Truthy<number> = {
  truthy: (a) => a !== 0,
};

export const truthyBigInt: Truthy<bigint> = {
  truthy: (a) => a !== 0n,
};

export const truthyBoolean: Truthy<boolean> = {
  truthy: (a) => a,
};

export const truthyString: Truthy<string> = {
  truthy: (a) => a.length > 0,
};

// ============================================================================
// Collections
// ============================================================================

export const truthyArray: Truthy<readonly unknown[]> = {
  truthy: (a) => a.length > 0,
};

export const truthySet: Truthy<ReadonlySet<unknown>> = {
  truthy: (a) => a.size > 0,
};

export const truthyMap: Truthy<ReadonlyMap<unknown, unknown>> = {
  truthy: (a) => a.size > 0,
};

/**
 * Tuples always hold their fields, so they are always truthy, even when
 * every field is falsy on its own.
 */
export const truthyTuple: Truthy<readonly [unknown, ...unknown[]]> = truthyAlways();

/** `void`, `undefined` and `null` carry no value. */
export const truthyUnit: Truthy<void | null | undefined> = truthyNever();

// ============================================================================
// Containers
// ============================================================================

/**
 * Truthy iff present and the contained value is truthy.
 */
export function truthyOption<A>(T: Truthy<A>): Truthy<Option<A> | undefined> {
  return {
    truthy: (a) => a !== null && a !== undefined && T.truthy(a),
  };
}

/**
 * Truthy iff the success variant holds a truthy value. Errors are falsy
 * whatever they carry.
 */
export function truthyResult<T, E = unknown>(T: Truthy<T>): Truthy<Result<T, E>> {
  return {
    truthy: (r) => r.ok && T.truthy(r.value),
  };
}

/**
 * Truthy iff the active side's payload is truthy.
 */
export function truthyEither<L, R>(L: Truthy<L>, R: Truthy<R>): Truthy<Either<L, R>> {
  return {
    truthy: (e) => (e._tag === "Left" ? L.truthy(e.left) : R.truthy(e.right)),
  };
}
