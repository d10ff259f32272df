/**
 * Either Data Type
 *
 * A value of one of two possible types. `truthyOr` returns an Either whose
 * Left slot holds the original value and whose Right slot holds the fallback.
 */

/**
 * Either data type - either Left or Right
 */
export type Either<L, R> = Left<L> | Right<R>;

/**
 * Left variant
 */
export interface Left<L> {
  readonly _tag: "Left";
  readonly left: L;
}

/**
 * Right variant
 */
export interface Right<R> {
  readonly _tag: "Right";
  readonly right: R;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Left value
 */
export function Left<L, R = never>(left: L): Either<L, R> {
  return { _tag: "Left", left };
}

/**
 * Create a Right value
 */
export function Right<L = never, R = unknown>(right: R): Either<L, R> {
  return { _tag: "Right", right };
}

// ============================================================================
// Guards & Eliminators
// ============================================================================

export function isLeft<L, R>(either: Either<L, R>): either is Left<L> {
  return either._tag === "Left";
}

export function isRight<L, R>(either: Either<L, R>): either is Right<R> {
  return either._tag === "Right";
}

/**
 * Pattern match on an Either
 */
export function fold<L, R, B>(
  either: Either<L, R>,
  onLeft: (left: L) => B,
  onRight: (right: R) => B,
): B {
  return either._tag === "Left" ? onLeft(either.left) : onRight(either.right);
}
