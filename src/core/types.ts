/**
 * Core types for the truthish macro system
 */

import * as ts from "typescript";

// ============================================================================
// Macro Kinds
// ============================================================================

export type MacroKind = "expression";

// ============================================================================
// Expansion Options
// ============================================================================

/** Where the runtime export implementing Truthy for a type lives */
export interface InstanceLocation {
  /** Module specifier the expansion imports from */
  module: string;

  /** Exported name of the instance (or instance constructor) */
  exportName: string;
}

/**
 * Options that shape expansions, resolved once per compilation from the
 * configuration and the transformer options.
 */
export interface ExpansionOptions {
  /** Module the `truthy` macro is imported from and instances are loaded from */
  runtimeModule: string;

  /** Optional capabilities that can be switched off */
  features: {
    either: boolean;
  };

  /** Extra instances keyed by type name */
  instances: Readonly<Record<string, InstanceLocation>>;
}

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /** The TypeScript Program instance */
  program: ts.Program;

  /** Type checker for semantic analysis */
  typeChecker: ts.TypeChecker;

  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  /** Options in effect for this compilation */
  options: ExpansionOptions;

  // -------------------------------------------------------------------------
  // Type Utilities
  // -------------------------------------------------------------------------

  /** Get the type of a node */
  getTypeOf(node: ts.Node): ts.Type;

  /** Get a type as a string */
  typeToString(type: ts.Type): string;

  /** Get the symbol of a node */
  getSymbol(node: ts.Node): ts.Symbol | undefined;

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Report a compile-time error */
  reportError(node: ts.Node, message: string): void;

  // -------------------------------------------------------------------------
  // Runtime Imports
  // -------------------------------------------------------------------------

  /**
   * Reference a module from generated code. Returns the identifier of a
   * namespace import that the transformer adds to the file, one per module.
   */
  requireModule(moduleSpecifier: string): ts.Identifier;
}

// ============================================================================
// Macro Definitions
// ============================================================================

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;
}

/** Expression macro - transforms call expressions */
export interface ExpressionMacro extends MacroDefinitionBase {
  kind: "expression";

  /**
   * Expand the macro call into new AST nodes
   * @param ctx - The macro context
   * @param callExpr - The macro call expression
   * @param args - The arguments passed to the macro
   */
  expand(
    ctx: MacroContext,
    callExpr: ts.CallExpression,
    args: readonly ts.Expression[],
  ): ts.Expression;
}

/** Union of all macro types */
export type MacroDefinition = ExpressionMacro;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Get an expression macro by name */
  getExpression(name: string): ExpressionMacro | undefined;

  /** Get all registered macros */
  getAll(): MacroDefinition[];
}

// ============================================================================
// Diagnostics
// ============================================================================

/** A compile-time error reported by a macro */
export interface MacroDiagnostic {
  /** Diagnostic message */
  message: string;

  /** Source node that caused the diagnostic */
  node?: ts.Node;
}
