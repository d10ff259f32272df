/**
 * truthish/transformer - compile-time entry point
 *
 * @example tsconfig.json (with ts-patch)
 * ```json
 * {
 *   "compilerOptions": {
 *     "plugins": [{ "transform": "truthish/transformer" }]
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  MacroKind,
  MacroContext,
  MacroDefinitionBase,
  ExpressionMacro,
  MacroDefinition,
  MacroRegistry,
  MacroDiagnostic,
  ExpansionOptions,
  InstanceLocation,
} from "./core/types.js";

// ============================================================================
// Registry & Definition Helpers
// ============================================================================

export {
  globalRegistry,
  createRegistry,
  defineExpressionMacro,
  registerMacros,
} from "./core/registry.js";

// ============================================================================
// Context
// ============================================================================

export { MacroContextImpl, createMacroContext } from "./core/context.js";

// ============================================================================
// Instance Table
// ============================================================================

export {
  builtinInstanceNames,
  registerTruthyInstance,
  findTruthyInstance,
  getRegisteredInstances,
  clearTruthyInstances,
  type BuiltinInstanceKind,
  type TruthyInstanceInfo,
} from "./core/instances.js";

// ============================================================================
// Errors
// ============================================================================

export {
  TruthishError,
  MalformedExpressionError,
  MissingInstanceError,
  type TruthishErrorReason,
} from "./core/errors.js";

// ============================================================================
// Configuration System
// ============================================================================

export {
  config,
  defineConfig,
  DEFAULT_RUNTIME_MODULE,
  type TruthishConfig,
} from "./core/config.js";

// ============================================================================
// Built-in Macros
// ============================================================================

export * from "./macros/index.js";

// ============================================================================
// Transformer
// ============================================================================

export {
  default,
  MacroTransformer,
  MACRO_DIAGNOSTIC_CODE,
  toTsDiagnostic,
  type MacroTransformerConfig,
} from "./transforms/macro-transformer.js";
