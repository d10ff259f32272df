/**
 * Truthy typeclass - implicit boolean coercion with static types.
 *
 * An instance decides whether a value of its type counts as logically true:
 * non-zero, non-empty, non-absent. Everything else in this package is derived
 * from that single predicate.
 *
 * Laws:
 * - Totality: `truthy` is defined for every value of A and never throws
 * - Purity: `truthy` reads nothing but its argument
 * - Complement: `falsy(a, T) === !T.truthy(a)` (see combinators.ts)
 *
 * @typeclass
 */
export interface Truthy<A> {
  truthy(a: A): boolean;
}

/**
 * Create a Truthy instance from a predicate.
 */
export function makeTruthy<A>(truthy: (a: A) => boolean): Truthy<A> {
  return { truthy };
}

/**
 * Create a Truthy instance by mapping to a type that already has one.
 *
 * @example
 * ```typescript
 * const truthyUser = truthyBy((u: User) => u.name, truthyString);
 * ```
 */
export function truthyBy<A, B>(f: (a: A) => B, T: Truthy<B>): Truthy<A> {
  return { truthy: (a) => T.truthy(f(a)) };
}

/** Instance for types whose every value counts as present */
export function truthyAlways<A>(): Truthy<A> {
  return { truthy: () => true };
}

/** Instance for types that carry no value */
export function truthyNever<A>(): Truthy<A> {
  return { truthy: () => false };
}
