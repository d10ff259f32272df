/**
 * Macro Registry - Stores and retrieves macro definitions
 */

import type { ExpressionMacro, MacroDefinition, MacroRegistry } from "./types.js";

class MacroRegistryImpl implements MacroRegistry {
  private expressionMacros = new Map<string, ExpressionMacro>();

  register(macro: MacroDefinition): void {
    if (this.expressionMacros.has(macro.name)) {
      throw new Error(`Expression macro with name '${macro.name}' is already registered`);
    }
    this.expressionMacros.set(macro.name, macro);
  }

  getExpression(name: string): ExpressionMacro | undefined {
    return this.expressionMacros.get(name);
  }

  getAll(): MacroDefinition[] {
    return [...this.expressionMacros.values()];
  }

  /** Clear all registered macros (useful for testing) */
  clear(): void {
    this.expressionMacros.clear();
  }
}

/** Global macro registry singleton */
export const globalRegistry = new MacroRegistryImpl();

/** Create a new isolated registry (for testing or scoped usage) */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/** Define an expression macro with type inference */
export function defineExpressionMacro(definition: Omit<ExpressionMacro, "kind">): ExpressionMacro {
  return { ...definition, kind: "expression" };
}

/**
 * Register multiple macros at once
 */
export function registerMacros(registry: MacroRegistry, ...macros: MacroDefinition[]): void {
  for (const macro of macros) {
    registry.register(macro);
  }
}
