/**
 * Truthy Laws
 *
 * Executable laws for any Truthy instance:
 *   - Complement: falsy(x) === !truthy(x)
 *   - Or-idempotence: truthy(x) => or(x, y) === x
 *   - Or-fallback: falsy(x) => or(x, y) === y
 *   - Or-in-place: reading orEq(ref(x), y) equals or(x, y)
 *   - And-in-place: reading andEq(ref(x), y) equals and(x, y)
 *   - And-Or duality: and(x, y) === (truthy(x) ? y : x)
 *
 * @module
 */

import { ref } from "../data/ref.js";
import { and, andEq, falsy, or, orEq } from "./combinators.js";
import type { Truthy } from "./truthy.js";

export interface Law<A> {
  /** Name used in reports */
  readonly name: string;

  /** Number of sample values the law reads (1 or 2) */
  readonly arity: 1 | 2;

  readonly description: string;

  /** Unary laws ignore `y` */
  readonly check: (x: A, y: A) => boolean;
}

export type LawSet<A> = readonly Law<A>[];

export interface LawViolation<A> {
  readonly law: string;
  readonly args: readonly A[];
}

/**
 * Generate the laws every Truthy instance must satisfy.
 */
export function truthyLaws<A>(T: Truthy<A>): LawSet<A> {
  return [
    {
      name: "complement",
      arity: 1,
      description: "falsy is the negation of truthy: falsy(x) === !truthy(x)",
      check: (x) => falsy(x, T) === !T.truthy(x),
    },
    {
      name: "or idempotence",
      arity: 2,
      description: "a truthy value is kept: truthy(x) implies or(x, y) === x",
      check: (x, y) => !T.truthy(x) || Object.is(or(x, y, T), x),
    },
    {
      name: "or fallback",
      arity: 2,
      description: "a falsy value is replaced: falsy(x) implies or(x, y) === y",
      check: (x, y) => T.truthy(x) || Object.is(or(x, y, T), y),
    },
    {
      name: "or in place",
      arity: 2,
      description: "orEq on a Ref holding x leaves or(x, y) in the Ref",
      check: (x, y) => {
        const cell = ref(x);
        orEq(cell, y, T);
        return Object.is(cell.value, or(x, y, T));
      },
    },
    {
      name: "and in place",
      arity: 2,
      description: "andEq on a Ref holding x leaves and(x, y) in the Ref",
      check: (x, y) => {
        const cell = ref(x);
        andEq(cell, y, T);
        return Object.is(cell.value, and(x, y, T));
      },
    },
    {
      name: "and selects",
      arity: 2,
      description: "and(x, y) is y when x is truthy and x otherwise",
      check: (x, y) => Object.is(and(x, y, T), T.truthy(x) ? y : x),
    },
  ];
}

/**
 * Check every law against every sample (and every ordered pair of samples for
 * binary laws). Returns the violations; an empty array means all laws hold.
 */
export function checkLaws<A>(laws: LawSet<A>, samples: readonly A[]): LawViolation<A>[] {
  const violations: LawViolation<A>[] = [];

  for (const law of laws) {
    if (law.arity === 1) {
      for (const x of samples) {
        if (!law.check(x, x)) violations.push({ law: law.name, args: [x] });
      }
      continue;
    }
    for (const x of samples) {
      for (const y of samples) {
        if (!law.check(x, y)) violations.push({ law: law.name, args: [x, y] });
      }
    }
  }

  return violations;
}
