/**
 * Tests for the macro registry and the Truthy instance table
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  createRegistry,
  defineExpressionMacro,
  globalRegistry,
  registerMacros,
} from "../src/core/registry.js";
import {
  clearTruthyInstances,
  findTruthyInstance,
  getRegisteredInstances,
  registerTruthyInstance,
} from "../src/core/instances.js";
import type { MacroRegistry } from "../src/core/types.js";
import { transformSource } from "../src/test-utils/transform.js";
import "../src/macros/index.js";

describe("MacroRegistry", () => {
  let registry: MacroRegistry;

  beforeEach(() => {
    registry = createRegistry();
  });

  it("should register expression macros", () => {
    const macro = defineExpressionMacro({
      name: "testMacro",
      description: "A test macro",
      expand: (_ctx, callExpr) => callExpr,
    });

    registry.register(macro);

    const retrieved = registry.getExpression("testMacro");
    expect(retrieved?.name).toBe("testMacro");
    expect(retrieved?.kind).toBe("expression");
  });

  it("should return undefined for non-existent macros", () => {
    expect(registry.getExpression("nonExistent")).toBeUndefined();
  });

  it("should reject a second macro with the same name", () => {
    const macro = defineExpressionMacro({ name: "dup", expand: (_ctx, callExpr) => callExpr });
    registry.register(macro);
    expect(() => registry.register(macro)).toThrow(
      "Expression macro with name 'dup' is already registered",
    );
  });

  it("should register several macros at once", () => {
    registerMacros(
      registry,
      defineExpressionMacro({ name: "one", expand: (_ctx, callExpr) => callExpr }),
      defineExpressionMacro({ name: "two", expand: (_ctx, callExpr) => callExpr }),
    );
    expect(registry.getAll().map((m) => m.name)).toEqual(["one", "two"]);
  });

  it("has the truthy macro registered globally", () => {
    expect(globalRegistry.getExpression("truthy")?.kind).toBe("expression");
  });
});

describe("custom registries in the transformer", () => {
  it("expands macros from the given registry", () => {
    const registry = createRegistry();
    registry.register(
      defineExpressionMacro({
        name: "always",
        expand: (ctx) => ctx.factory.createTrue(),
      }),
    );

    const { code } = transformSource(
      `
import { always } from "truthish";
export const f = () => always();
`,
      { registry },
    );
    expect(code).toContain("export const f = () => true;");
  });

  it("replaces a throwing macro with a throwing expression", () => {
    const registry = createRegistry();
    registry.register(
      defineExpressionMacro({
        name: "explode",
        expand: () => {
          throw new Error("boom");
        },
      }),
    );

    const { code, messages } = transformSource(
      `
import { explode } from "truthish";
export const f = () => explode();
`,
      { registry },
    );
    expect(messages).toEqual(["Macro expansion failed: Error: boom"]);
    expect(code).toContain(`throw new Error("truthish: expansion of 'explode' failed: Error: boom");`);
  });
});

describe("Truthy instance table", () => {
  afterEach(() => {
    clearTruthyInstances();
  });

  it("finds registered instances by type name", () => {
    registerTruthyInstance({ forType: "Money", module: "./money.js", exportName: "truthyMoney" });
    expect(findTruthyInstance("Money")).toEqual({ module: "./money.js", exportName: "truthyMoney" });
    expect(findTruthyInstance("Other")).toBeUndefined();
  });

  it("replaces an earlier registration for the same type", () => {
    registerTruthyInstance({ forType: "Money", module: "./a.js", exportName: "a" });
    registerTruthyInstance({ forType: "Money", module: "./b.js", exportName: "b" });
    expect(getRegisteredInstances()).toEqual([
      { forType: "Money", module: "./b.js", exportName: "b" },
    ]);
  });

  it("can be cleared", () => {
    registerTruthyInstance({ forType: "Money", module: "./money.js", exportName: "truthyMoney" });
    clearTruthyInstances();
    expect(getRegisteredInstances()).toEqual([]);
  });
});
