/**
 * Option Data Type (Zero-Cost Implementation)
 *
 * Every Option<A> is either a value A or null. No wrapper objects are
 * allocated: Some(42) is just 42 and None is just null.
 *
 * `undefined` is accepted wherever an Option is read, so optional
 * properties and parameters behave as absent values too.
 */

/**
 * Option data type - either a value A or null.
 *
 * A must not include null or undefined, otherwise presence can no longer be
 * told apart from absence.
 */
export type Option<A> = A | null;

/** The absent value */
export const None: Option<never> = null;

/** Wrap a present value (identity at runtime) */
export function Some<A>(value: A): Option<A> {
  return value;
}

/** Check whether an Option holds a value */
export function isSome<A>(opt: Option<A> | undefined): opt is A {
  return opt !== null && opt !== undefined;
}

/** Check whether an Option is absent */
export function isNone<A>(opt: Option<A> | undefined): opt is null | undefined {
  return opt === null || opt === undefined;
}

/**
 * Get the value or a default.
 */
export function getOrElse<A>(opt: Option<A> | undefined, onNone: () => A): A {
  return isSome(opt) ? opt : onNone();
}
