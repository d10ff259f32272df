/**
 * Tests for the truthy() expression macro: shape of the expansion
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { transformSource } from "../src/test-utils/transform.js";
import { clearTruthyInstances, registerTruthyInstance } from "../src/core/instances.js";

const NS = "__truthish_0";

function expand(params: string, expr: string, prelude = ""): string {
  const source = `
import { truthy } from "truthish";
${prelude}
export function check(${params}): boolean {
  return truthy(${expr});
}
`;
  const { code, diagnostics } = transformSource(source);
  expect(diagnostics).toEqual([]);
  return code;
}

describe("truthy() expansion", () => {
  it("rewrites a single identifier to an instance call", () => {
    const code = expand("a: number", "a");
    expect(code).toContain(`return ${NS}.truthyNumber.truthy(a);`);
  });

  it("adds one namespace import of the runtime module", () => {
    const code = expand("a: number", "a");
    expect(code).toContain(`import * as ${NS} from "truthish";`);
  });

  it("keeps negation", () => {
    const code = expand("a: string", "!a");
    expect(code).toContain(`return !${NS}.truthyString.truthy(a);`);
  });

  it("keeps explicit grouping and wraps the expansion as one operand", () => {
    const code = expand("x: number, y: string, z: string[]", "x && (y || !z)");
    expect(code).toContain(
      `return (${NS}.truthyNumber.truthy(x) && (${NS}.truthyString.truthy(y) || !${NS}.truthyArray.truthy(z)));`,
    );
  });

  it("keeps redundant parentheses around a single identifier", () => {
    const code = expand("a: number", "(a)");
    expect(code).toContain(`return (${NS}.truthyNumber.truthy(a));`);
  });

  it("shares the import between several calls", () => {
    const source = `
import { truthy } from "truthish";
export function f(a: number, b: string): boolean {
  return truthy(a) && truthy(b);
}
`;
    const { code } = transformSource(source);
    expect(code.match(/import \* as __truthish_\d+/g)).toEqual([`import * as ${NS}`]);
    expect(code).toContain(`return ${NS}.truthyNumber.truthy(a) && ${NS}.truthyString.truthy(b);`);
  });

  it("expands calls nested in other expressions", () => {
    const source = `
import { truthy } from "truthish";
export function f(a: number): string {
  return truthy(a) ? "yes" : "no";
}
`;
    const { code } = transformSource(source);
    expect(code).toContain(`return ${NS}.truthyNumber.truthy(a) ? "yes" : "no";`);
  });

  it("leaves files without macro calls unchanged", () => {
    const source = `export const answer = 42;\n`;
    const { code, diagnostics } = transformSource(source);
    expect(code).toBe(source);
    expect(diagnostics).toEqual([]);
  });

  it("logs expansions when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    try {
      const source = `
import { truthy } from "truthish";
export const f = (a: number) => truthy(a);
`;
      transformSource(source, { verbose: true });
      expect(log).toHaveBeenCalledWith("[truthish] Expanding expression macro: truthy");
    } finally {
      log.mockRestore();
    }
  });
});

describe("instance resolution", () => {
  afterEach(() => {
    clearTruthyInstances();
  });

  it("maps primitives", () => {
    expect(expand("a: bigint", "a")).toContain(`${NS}.truthyBigInt.truthy(a)`);
    expect(expand("a: boolean", "a")).toContain(`${NS}.truthyBoolean.truthy(a)`);
    expect(expand("a: undefined", "a")).toContain(`${NS}.truthyUnit.truthy(a)`);
  });

  it("maps literal unions and enums through their category", () => {
    expect(expand(`a: "on" | "off"`, "a")).toContain(`${NS}.truthyString.truthy(a)`);
    expect(expand("a: Level", "a", "enum Level { Off, Low, High }")).toContain(
      `${NS}.truthyNumber.truthy(a)`,
    );
  });

  it("maps nullable types to Option", () => {
    expect(expand("a: string | null", "a")).toContain(
      `${NS}.truthyOption(${NS}.truthyString).truthy(a)`,
    );
    expect(expand("a?: number", "a")).toContain(`${NS}.truthyOption(${NS}.truthyNumber).truthy(a)`);
    expect(expand("a: boolean | undefined", "a")).toContain(
      `${NS}.truthyOption(${NS}.truthyBoolean).truthy(a)`,
    );
  });

  it("maps a union of only null and undefined to unit", () => {
    expect(expand("a: null | undefined", "a")).toContain(`${NS}.truthyUnit.truthy(a)`);
  });

  it("maps arrays, tuples, sets and maps", () => {
    expect(expand("a: readonly number[]", "a")).toContain(`${NS}.truthyArray.truthy(a)`);
    expect(expand("a: Array<string>", "a")).toContain(`${NS}.truthyArray.truthy(a)`);
    expect(expand("a: [number, string]", "a")).toContain(`${NS}.truthyTuple.truthy(a)`);
    expect(expand("a: Set<number>", "a")).toContain(`${NS}.truthySet.truthy(a)`);
    expect(expand("a: ReadonlyMap<string, number>", "a")).toContain(`${NS}.truthyMap.truthy(a)`);
  });

  it("maps Result-shaped unions", () => {
    const prelude = "type Res = { ok: true; value: number[] } | { ok: false; error: string };";
    expect(expand("a: Res", "a", prelude)).toContain(
      `${NS}.truthyResult(${NS}.truthyArray).truthy(a)`,
    );
  });

  it("maps Either-shaped unions", () => {
    const prelude =
      'type Choice = { _tag: "Left"; left: number } | { _tag: "Right"; right: string };';
    expect(expand("a: Choice", "a", prelude)).toContain(
      `${NS}.truthyEither(${NS}.truthyNumber, ${NS}.truthyString).truthy(a)`,
    );
  });

  it("nests constructors", () => {
    const prelude = "type Res = { ok: true; value: string | null } | { ok: false; error: Error };";
    expect(expand("a: Res | undefined", "a", prelude)).toContain(
      `${NS}.truthyOption(${NS}.truthyResult(${NS}.truthyOption(${NS}.truthyString))).truthy(a)`,
    );
  });

  it("resolves a repeated identifier from its first occurrence", () => {
    expect(expand("tags: string[]", "tags || !tags")).toContain(
      `return (${NS}.truthyArray.truthy(tags) || !${NS}.truthyArray.truthy(tags));`,
    );
    expect(expand("name: string | null", "name && name")).toContain(
      `return (${NS}.truthyOption(${NS}.truthyString).truthy(name) && ${NS}.truthyOption(${NS}.truthyString).truthy(name));`,
    );
  });

  it("resolves a repeated Result-shaped identifier", () => {
    const prelude = "type Res = { ok: true; value: number[] } | { ok: false; error: string };";
    expect(expand("res: Res", "res || res", prelude)).toContain(
      `return (${NS}.truthyResult(${NS}.truthyArray).truthy(res) || ${NS}.truthyResult(${NS}.truthyArray).truthy(res));`,
    );
  });

  it("honors narrowing that happens before the call", () => {
    const { code, diagnostics } = transformSource(`
import { truthy } from "truthish";
export function check(name: string | null): boolean {
  if (name === null) return false;
  return truthy(name || !name);
}
`);
    expect(diagnostics).toEqual([]);
    expect(code).toContain(
      `return (${NS}.truthyString.truthy(name) || !${NS}.truthyString.truthy(name));`,
    );
  });

  it("uses instances registered for a type name", () => {
    registerTruthyInstance({ forType: "Money", module: "./money.js", exportName: "truthyMoney" });
    const code = expand("m: Money, note: string", "m || note", "interface Money { cents: number }");

    expect(code).toContain(`import * as __truthish_0 from "./money.js";`);
    expect(code).toContain(`import * as __truthish_1 from "truthish";`);
    expect(code).toContain(
      "return (__truthish_0.truthyMoney.truthy(m) || __truthish_1.truthyString.truthy(note));",
    );
  });

  it("uses instances passed to the transformer", () => {
    const source = `
import { truthy } from "truthish";
class Session { active = false }
export const live = (s: Session) => truthy(s);
`;
    const { code } = transformSource(source, {
      instances: { Session: { module: "./session.js", exportName: "truthySession" } },
    });
    expect(code).toContain(`import * as ${NS} from "./session.js";`);
    expect(code).toContain(`${NS}.truthySession.truthy(s)`);
  });

  it("imports instances from a custom runtime module", () => {
    const source = `
import { truthy } from "bool-kit";
export const f = (a: number) => truthy(a);
`;
    const { code } = transformSource(source, { runtimeModule: "bool-kit" });
    expect(code).toContain(`import * as ${NS} from "bool-kit";`);
    expect(code).toContain(`${NS}.truthyNumber.truthy(a)`);
  });
});
