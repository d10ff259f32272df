/**
 * Ref - a mutable cell.
 *
 * The in-place combinators (`orEq`, `andThenEq`, ...) take a Ref as their
 * receiver and write only to `ref.value`.
 *
 * @example
 * ```typescript
 * const count = ref(0);
 * orEq(count, 2, truthyNumber);
 * andThenEq(count, (n) => n - 1, truthyNumber);
 * count.value; // 1
 * ```
 */
export interface Ref<A> {
  value: A;
}

/** Create a Ref holding `value` */
export function ref<A>(value: A): Ref<A> {
  return { value };
}
