/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import * as ts from "typescript";
import type { ExpansionOptions, MacroContext, MacroDiagnostic } from "./types.js";

export class MacroContextImpl implements MacroContext {
  private diagnostics: MacroDiagnostic[] = [];

  /** Namespace imports requested by expansions, keyed by module specifier */
  private moduleImports = new Map<string, ts.Identifier>();

  constructor(
    public readonly program: ts.Program,
    public readonly typeChecker: ts.TypeChecker,
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory,
    public readonly options: ExpansionOptions,
  ) {}

  // -------------------------------------------------------------------------
  // Type Utilities
  // -------------------------------------------------------------------------

  getTypeOf(node: ts.Node): ts.Type {
    return this.typeChecker.getTypeAtLocation(node);
  }

  typeToString(type: ts.Type): string {
    return this.typeChecker.typeToString(type);
  }

  getSymbol(node: ts.Node): ts.Symbol | undefined {
    return this.typeChecker.getSymbolAtLocation(node);
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  reportError(node: ts.Node, message: string): void {
    this.diagnostics.push({ message, node });
  }

  getDiagnostics(): MacroDiagnostic[] {
    return [...this.diagnostics];
  }

  clearDiagnostics(): void {
    this.diagnostics = [];
  }

  // -------------------------------------------------------------------------
  // Runtime Imports
  // -------------------------------------------------------------------------

  requireModule(moduleSpecifier: string): ts.Identifier {
    let name = this.moduleImports.get(moduleSpecifier);
    if (!name) {
      name = this.factory.createIdentifier(`__truthish_${this.moduleImports.size}`);
      this.moduleImports.set(moduleSpecifier, name);
    }
    return name;
  }

  /**
   * Build the `import * as __truthish_N from "..."` declarations for every
   * module requested during expansion.
   */
  createImportDeclarations(): ts.ImportDeclaration[] {
    return [...this.moduleImports].map(([specifier, name]) =>
      this.factory.createImportDeclaration(
        undefined,
        this.factory.createImportClause(false, undefined, this.factory.createNamespaceImport(name)),
        this.factory.createStringLiteral(specifier),
      ),
    );
  }
}

/**
 * Create a macro context for a given program and source file
 */
export function createMacroContext(
  program: ts.Program,
  sourceFile: ts.SourceFile,
  factory: ts.NodeFactory,
  options: ExpansionOptions,
): MacroContextImpl {
  return new MacroContextImpl(program, program.getTypeChecker(), sourceFile, factory, options);
}
