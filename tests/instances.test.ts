/**
 * Tests for the standard Truthy instances
 */

import { describe, it, expect } from "vitest";
import {
  Err,
  Left,
  None,
  Ok,
  Right,
  Some,
  makeTruthy,
  truthyAlways,
  truthyArray,
  truthyBigInt,
  truthyBoolean,
  truthyBy,
  truthyEither,
  truthyMap,
  truthyNever,
  truthyNumber,
  truthyOption,
  truthyResult,
  truthySet,
  truthyString,
  truthyTuple,
  truthyUnit,
  type Option,
} from "../src/index.js";

describe("primitive instances", () => {
  it("numbers are truthy iff non-zero", () => {
    expect(truthyNumber.truthy(0)).toBe(false);
    expect(truthyNumber.truthy(-1)).toBe(true);
    expect(truthyNumber.truthy(1)).toBe(true);
    expect(truthyNumber.truthy(0.5)).toBe(true);
  });

  it("treats negative zero as zero and NaN as non-zero", () => {
    expect(truthyNumber.truthy(-0)).toBe(false);
    expect(truthyNumber.truthy(NaN)).toBe(true);
    expect(truthyNumber.truthy(Infinity)).toBe(true);
  });

  it("bigints are truthy iff non-zero", () => {
    expect(truthyBigInt.truthy(0n)).toBe(false);
    expect(truthyBigInt.truthy(-3n)).toBe(true);
  });

  it("booleans are themselves", () => {
    expect(truthyBoolean.truthy(true)).toBe(true);
    expect(truthyBoolean.truthy(false)).toBe(false);
  });

  it("strings are truthy iff non-empty", () => {
    expect(truthyString.truthy("")).toBe(false);
    expect(truthyString.truthy("x")).toBe(true);
    expect(truthyString.truthy(" ")).toBe(true);
    expect(truthyString.truthy("0")).toBe(true);
  });
});

describe("collection instances", () => {
  it("arrays are truthy iff non-empty", () => {
    expect(truthyArray.truthy([])).toBe(false);
    expect(truthyArray.truthy([0])).toBe(true);
    expect(truthyArray.truthy([""])).toBe(true);
  });

  it("sets and maps are truthy iff non-empty", () => {
    expect(truthySet.truthy(new Set())).toBe(false);
    expect(truthySet.truthy(new Set([0]))).toBe(true);
    expect(truthyMap.truthy(new Map())).toBe(false);
    expect(truthyMap.truthy(new Map([["k", 0]]))).toBe(true);
  });

  it("tuples are always truthy, even with falsy fields", () => {
    const pair: readonly [number, string] = [0, ""];
    expect(truthyTuple.truthy(pair)).toBe(true);
    expect(truthyTuple.truthy([false])).toBe(true);
  });

  it("unit values are always falsy", () => {
    expect(truthyUnit.truthy(undefined)).toBe(false);
    expect(truthyUnit.truthy(null)).toBe(false);
  });
});

describe("container instances", () => {
  const optNumber = truthyOption(truthyNumber);

  it("Option is truthy iff present with a truthy value", () => {
    expect(optNumber.truthy(Some(0))).toBe(false);
    expect(optNumber.truthy(Some(1))).toBe(true);
    expect(optNumber.truthy(None)).toBe(false);
  });

  it("treats undefined as an absent Option", () => {
    const missing: Option<number> | undefined = undefined;
    expect(optNumber.truthy(missing)).toBe(false);
  });

  it("nests Option instances", () => {
    const optStrings = truthyOption(truthyArray);
    expect(optStrings.truthy(["a"])).toBe(true);
    expect(optStrings.truthy([])).toBe(false);
    expect(optStrings.truthy(null)).toBe(false);
  });

  it("Result errors are falsy regardless of payload", () => {
    const T = truthyResult<number, string>(truthyNumber);
    expect(T.truthy(Ok(5))).toBe(true);
    expect(T.truthy(Ok(0))).toBe(false);
    expect(T.truthy(Err("nonempty error"))).toBe(false);
  });

  it("Either follows the active side's instance", () => {
    const T = truthyEither(truthyNumber, truthyString);
    expect(T.truthy(Left(1))).toBe(true);
    expect(T.truthy(Left(0))).toBe(false);
    expect(T.truthy(Right("x"))).toBe(true);
    expect(T.truthy(Right(""))).toBe(false);
  });
});

describe("instance constructors", () => {
  interface User {
    name: string;
    age: number;
  }

  it("makeTruthy wraps a predicate", () => {
    const even = makeTruthy((n: number) => n % 2 === 0);
    expect(even.truthy(4)).toBe(true);
    expect(even.truthy(3)).toBe(false);
  });

  it("truthyBy maps to a type with an instance", () => {
    const T = truthyBy((u: User) => u.name, truthyString);
    expect(T.truthy({ name: "", age: 30 })).toBe(false);
    expect(T.truthy({ name: "ada", age: 0 })).toBe(true);
  });

  it("truthyAlways and truthyNever ignore the value", () => {
    expect(truthyAlways<number>().truthy(0)).toBe(true);
    expect(truthyNever<string>().truthy("x")).toBe(false);
  });
});
