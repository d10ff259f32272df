/**
 * truthish Transformer - TypeScript transformer for macro expansion
 *
 * Usable as a `before` transformer (ts-patch, ttypescript-style plugins), with
 * `ts.transform`, or through the unplugin integration.
 */

import * as ts from "typescript";
import { config } from "../core/config.js";
import { MacroContextImpl, createMacroContext } from "../core/context.js";
import { globalRegistry } from "../core/registry.js";
import type {
  ExpansionOptions,
  ExpressionMacro,
  InstanceLocation,
  MacroDiagnostic,
  MacroRegistry,
} from "../core/types.js";

// Import built-in macros to register them
import "../macros/index.js";

/** Diagnostic code used for every macro diagnostic */
export const MACRO_DIAGNOSTIC_CODE = 91000;

/**
 * Configuration for the transformer. Unset fields come from the loaded
 * configuration (see core/config.ts).
 */
export interface MacroTransformerConfig {
  /** Enable verbose logging */
  verbose?: boolean;

  /** Registry to look macros up in (defaults to the global registry) */
  registry?: MacroRegistry;

  /** Module the `truthy` macro is imported from and instances are loaded from */
  runtimeModule?: string;

  /** Further modules whose `truthy` export is recognised as the macro */
  macroModules?: string[];

  /** Optional capabilities */
  features?: { either?: boolean };

  /** Extra instances keyed by type name, merged over the configured ones */
  instances?: Record<string, InstanceLocation>;

  /** Receives every macro diagnostic as a TypeScript diagnostic */
  onDiagnostic?: (diagnostic: ts.Diagnostic) => void;
}

function resolveExpansionOptions(transformerConfig?: MacroTransformerConfig): ExpansionOptions {
  const base = config.expansionOptions();
  return {
    runtimeModule: transformerConfig?.runtimeModule ?? base.runtimeModule,
    features: {
      either: transformerConfig?.features?.either ?? base.features.either,
    },
    instances: { ...base.instances, ...transformerConfig?.instances },
  };
}

function hasAddDiagnostic(
  context: ts.TransformationContext,
): context is ts.TransformationContext & { addDiagnostic(diag: ts.Diagnostic): void } {
  return "addDiagnostic" in context && typeof context.addDiagnostic === "function";
}

/**
 * Convert a macro diagnostic to a TypeScript diagnostic
 */
export function toTsDiagnostic(sourceFile: ts.SourceFile, diag: MacroDiagnostic): ts.Diagnostic {
  const start = diag.node ? diag.node.getStart(sourceFile) : 0;
  // Operands invented by the parser have no width
  const length = diag.node ? Math.max(0, diag.node.getEnd() - start) : 0;
  return {
    file: sourceFile,
    start,
    length,
    messageText: `[truthish] ${diag.message}`,
    category: ts.DiagnosticCategory.Error,
    code: MACRO_DIAGNOSTIC_CODE,
    source: "truthish",
  };
}

/**
 * Create the TypeScript transformer factory
 */
export default function macroTransformerFactory(
  program: ts.Program,
  transformerConfig?: MacroTransformerConfig,
): ts.TransformerFactory<ts.SourceFile> {
  const verbose = transformerConfig?.verbose ?? config.get("debug") === true;
  const registry = transformerConfig?.registry ?? globalRegistry;
  const options = resolveExpansionOptions(transformerConfig);
  const macroModules = new Set([options.runtimeModule, ...(transformerConfig?.macroModules ?? [])]);

  if (verbose) {
    console.log("[truthish] Initializing transformer");
    console.log(
      `[truthish] Registered macros: ${registry
        .getAll()
        .map((m) => m.name)
        .join(", ")}`,
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (verbose) {
        console.log(`[truthish] Processing: ${sourceFile.fileName}`);
      }

      const ctx = createMacroContext(program, sourceFile, context.factory, options);
      const transformer = new MacroTransformer(ctx, context, registry, macroModules, verbose);

      const visited = ts.visitNode(sourceFile, transformer.boundVisit, ts.isSourceFile);
      const imports = ctx.createImportDeclarations();
      const result =
        imports.length > 0
          ? context.factory.updateSourceFile(visited, [...imports, ...visited.statements])
          : visited;

      // Report diagnostics through the TS diagnostic pipeline
      for (const diag of ctx.getDiagnostics()) {
        const tsDiag = toTsDiagnostic(sourceFile, diag);

        if (hasAddDiagnostic(context)) {
          context.addDiagnostic(tsDiag);
        }
        transformerConfig?.onDiagnostic?.(tsDiag);

        // Also log for build tools that don't surface TS diagnostics
        if (verbose) {
          const line = sourceFile.getLineAndCharacterOfPosition(tsDiag.start ?? 0).line + 1;
          console.log(`[truthish ERROR] at ${sourceFile.fileName}:${line} ${diag.message}`);
        }
      }

      return result;
    };
  };
}

/**
 * Visits a source file and expands macro calls
 */
class MacroTransformer {
  /**
   * Bound visitor function. Created once to avoid allocating a new closure on
   * every `ts.visitEachChild` call.
   */
  readonly boundVisit: (node: ts.Node) => ts.Node;

  constructor(
    private ctx: MacroContextImpl,
    private transformContext: ts.TransformationContext,
    private registry: MacroRegistry,
    private macroModules: ReadonlySet<string>,
    private verbose: boolean,
  ) {
    this.boundVisit = this.visit.bind(this);
  }

  visit(node: ts.Node): ts.Node {
    if (ts.isCallExpression(node)) {
      const expanded = this.tryExpandExpressionMacro(node);
      if (expanded !== undefined) return expanded;
    }
    return ts.visitEachChild(node, this.boundVisit, this.transformContext);
  }

  /**
   * Try to expand an expression macro. Returns undefined when the call is not
   * a macro call or the macro declined to rewrite it. A call the macro
   * rejected with a diagnostic comes back as is, and nothing inside it is
   * expanded.
   */
  private tryExpandExpressionMacro(node: ts.CallExpression): ts.Expression | undefined {
    const macro = this.resolveMacro(node.expression);
    if (!macro) return undefined;

    if (this.verbose) {
      console.log(`[truthish] Expanding expression macro: ${macro.name}`);
    }

    const reported = this.ctx.getDiagnostics().length;
    try {
      const result = macro.expand(this.ctx, node, node.arguments);
      if (result !== node) return result;
      return this.ctx.getDiagnostics().length > reported ? node : undefined;
    } catch (error) {
      this.ctx.reportError(node, `Macro expansion failed: ${error}`);
      return this.createMacroErrorExpression(`truthish: expansion of '${macro.name}' failed: ${error}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Import-scoped macro resolution
  // ---------------------------------------------------------------------------

  /**
   * Resolve a callee to a macro. Only callees imported from a macro module
   * count, which covers:
   *   - Direct imports:    import { truthy } from "truthish"
   *   - Renamed imports:   import { truthy as t } from "truthish"
   *   - Namespace imports: import * as T from "truthish"; T.truthy(...)
   */
  private resolveMacro(callee: ts.Expression): ExpressionMacro | undefined {
    if (ts.isIdentifier(callee)) {
      const exportName = this.importedNameOf(callee);
      return exportName ? this.registry.getExpression(exportName) : undefined;
    }

    if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.expression)) {
      if (!this.isNamespaceImport(callee.expression)) return undefined;
      return this.registry.getExpression(callee.name.text);
    }

    return undefined;
  }

  /** The exported name an identifier was imported under from a macro module */
  private importedNameOf(identifier: ts.Identifier): string | undefined {
    const declarations = this.ctx.getSymbol(identifier)?.getDeclarations() ?? [];
    for (const decl of declarations) {
      if (!ts.isImportSpecifier(decl)) continue;
      const importDecl = decl.parent.parent.parent;
      if (this.isMacroModule(importDecl.moduleSpecifier)) {
        return (decl.propertyName ?? decl.name).text;
      }
    }
    return undefined;
  }

  private isNamespaceImport(identifier: ts.Identifier): boolean {
    const declarations = this.ctx.getSymbol(identifier)?.getDeclarations() ?? [];
    return declarations.some(
      (decl) =>
        ts.isNamespaceImport(decl) && this.isMacroModule(decl.parent.parent.moduleSpecifier),
    );
  }

  private isMacroModule(specifier: ts.Expression): boolean {
    return ts.isStringLiteral(specifier) && this.macroModules.has(specifier.text);
  }

  /**
   * Create an expression that throws at runtime when a macro expansion fails.
   * This ensures failures are loud rather than silently producing broken output.
   */
  private createMacroErrorExpression(message: string): ts.Expression {
    const factory = this.ctx.factory;
    // Generates: (() => { throw new Error("message"); })()
    return factory.createCallExpression(
      factory.createParenthesizedExpression(
        factory.createArrowFunction(
          undefined,
          undefined,
          [],
          undefined,
          factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
          factory.createBlock([
            factory.createThrowStatement(
              factory.createNewExpression(factory.createIdentifier("Error"), undefined, [
                factory.createStringLiteral(message),
              ]),
            ),
          ]),
        ),
      ),
      undefined,
      [],
    );
  }
}

export { MacroTransformer };
