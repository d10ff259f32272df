/**
 * truthy() - compile-time boolean coercion of identifiers
 *
 * Rewrites a boolean expression over identifiers so that every identifier is
 * coerced through the Truthy instance of its static type. `!`, `&&`, `||`
 * and parentheses are kept exactly as written, so the expansion
 * short-circuits like the original expression.
 *
 * @example
 * ```typescript
 * import { truthy } from "truthish";
 *
 * const count = 0;
 * const name: string | null = "x";
 * const tags: string[] = [];
 *
 * if (truthy(count && (name || !tags))) { ... }
 * // Expands to:
 * // if (__truthish_0.truthyNumber.truthy(count) &&
 * //     (__truthish_0.truthyOption(__truthish_0.truthyString).truthy(name) ||
 * //      !__truthish_0.truthyArray.truthy(tags))) { ... }
 * ```
 *
 * Grammar of the argument:
 *
 *   Expr := identifier | '!' Expr | '(' Expr ')' | Expr ('&&' | '||') Expr
 *
 * Anything else is reported as a malformed boolean expression at the first
 * token that does not fit, and an identifier whose type has no instance is
 * reported at the identifier. In both cases the call is left untouched.
 */

import * as ts from "typescript";
import { defineExpressionMacro, globalRegistry } from "../core/registry.js";
import { MalformedExpressionError, TruthishError } from "../core/errors.js";
import type { MacroContext } from "../core/types.js";
import { InstanceResolver, instanceExpression, type InstanceRef } from "./resolve-instance.js";

// ============================================================================
// Expression tree
// ============================================================================

/**
 * The argument after validation, with each leaf's instance already resolved.
 * Nodes are only built once the whole argument has been accepted.
 */
type CondTree =
  | { kind: "leaf"; identifier: ts.Identifier; instance: InstanceRef }
  | { kind: "not"; operand: CondTree }
  | { kind: "group"; inner: CondTree }
  | {
      kind: "binary";
      operator: ts.SyntaxKind.AmpersandAmpersandToken | ts.SyntaxKind.BarBarToken;
      left: CondTree;
      right: CondTree;
    };

function isLogicalOperator(
  kind: ts.SyntaxKind,
): kind is ts.SyntaxKind.AmpersandAmpersandToken | ts.SyntaxKind.BarBarToken {
  return kind === ts.SyntaxKind.AmpersandAmpersandToken || kind === ts.SyntaxKind.BarBarToken;
}

/**
 * The operand an expression starts with, for expressions whose first
 * offending token follows a leading operand (`a.b`, `f(x)`, `a + b`, ...).
 */
function leadingOperand(node: ts.Expression): ts.Expression | undefined {
  if (ts.isBinaryExpression(node)) return node.left;
  if (
    ts.isCallExpression(node) ||
    ts.isPropertyAccessExpression(node) ||
    ts.isElementAccessExpression(node) ||
    ts.isNonNullExpression(node) ||
    ts.isAsExpression(node) ||
    ts.isSatisfiesExpression(node) ||
    ts.isTypeAssertionExpression(node)
  ) {
    return node.expression;
  }
  if (ts.isConditionalExpression(node)) return node.condition;
  if (ts.isPostfixUnaryExpression(node)) return node.operand;
  if (ts.isTaggedTemplateExpression(node)) return node.tag;
  return undefined;
}

/** Text of the first token at or after `pos` */
function scanTokenText(sourceFile: ts.SourceFile, pos: number): string {
  const scanner = ts.createScanner(
    sourceFile.languageVersion,
    /* skipTrivia */ true,
    sourceFile.languageVariant,
    sourceFile.text,
    undefined,
    pos,
  );
  scanner.scan();
  return scanner.getTokenText();
}

/** The first child token of `node` that starts at or after `pos` */
function tokenFrom(node: ts.Node, pos: number, sourceFile: ts.SourceFile): ts.Node {
  for (const child of node.getChildren(sourceFile)) {
    if (child.pos >= pos) {
      return child.getFirstToken(sourceFile) ?? child;
    }
  }
  return node;
}

// ============================================================================
// Parsing
// ============================================================================

class CondParser {
  /**
   * Type of each symbol at its first occurrence in the argument. Later
   * occurrences are narrowed by the checker under JavaScript truthiness,
   * which is not what the expansion evaluates.
   */
  private readonly operandTypes = new Map<ts.Symbol, ts.Type>();

  constructor(private readonly ctx: MacroContext) {}

  /**
   * Validate the whole argument first, so a malformed expression is reported
   * before any identifier's type is looked at.
   */
  parse(node: ts.Expression): CondTree {
    this.checkShape(node);
    return this.build(node);
  }

  private checkShape(node: ts.Expression): void {
    if (ts.isParenthesizedExpression(node)) {
      this.checkShape(node.expression);
    } else if (ts.isPrefixUnaryExpression(node) && node.operator === ts.SyntaxKind.ExclamationToken) {
      this.checkShape(node.operand);
    } else if (ts.isBinaryExpression(node) && isLogicalOperator(node.operatorToken.kind)) {
      this.checkShape(node.left);
      this.checkShape(node.right);
    } else if (!ts.isIdentifier(node)) {
      throw this.malformed(node);
    } else if (node.text === "") {
      // Operand the parser had to invent, as in `a && )` or `a && && b`
      throw new MalformedExpressionError(node, scanTokenText(this.ctx.sourceFile, node.pos));
    }
  }

  private build(node: ts.Expression): CondTree {
    if (ts.isParenthesizedExpression(node)) {
      return { kind: "group", inner: this.build(node.expression) };
    }

    if (ts.isPrefixUnaryExpression(node) && node.operator === ts.SyntaxKind.ExclamationToken) {
      return { kind: "not", operand: this.build(node.operand) };
    }

    if (ts.isBinaryExpression(node) && isLogicalOperator(node.operatorToken.kind)) {
      return {
        kind: "binary",
        operator: node.operatorToken.kind,
        left: this.build(node.left),
        right: this.build(node.right),
      };
    }

    if (ts.isIdentifier(node)) {
      const resolver = new InstanceResolver(this.ctx, node);
      return { kind: "leaf", identifier: node, instance: resolver.resolve(this.operandType(node)) };
    }

    throw this.malformed(node);
  }

  private operandType(node: ts.Identifier): ts.Type {
    const symbol = this.ctx.getSymbol(node);
    if (!symbol) return this.ctx.getTypeOf(node);

    let type = this.operandTypes.get(symbol);
    if (!type) {
      type = this.ctx.getTypeOf(node);
      this.operandTypes.set(symbol, type);
    }
    return type;
  }

  /**
   * Locate the first token that breaks the grammar. A leading operand is
   * checked first so that an error inside it is the one reported.
   */
  private malformed(node: ts.Expression): TruthishError {
    const sourceFile = this.ctx.sourceFile;
    const head = leadingOperand(node);
    if (head) {
      this.checkShape(head);
      const token = tokenFrom(node, head.end, sourceFile);
      return new MalformedExpressionError(token, token.getText(sourceFile));
    }
    const token = node.getFirstToken(sourceFile) ?? node;
    return new MalformedExpressionError(token, token.getText(sourceFile));
  }
}

// ============================================================================
// Emission
// ============================================================================

function emit(ctx: MacroContext, tree: CondTree): ts.Expression {
  const factory = ctx.factory;
  switch (tree.kind) {
    case "leaf":
      return factory.createCallExpression(
        factory.createPropertyAccessExpression(instanceExpression(ctx, tree.instance), "truthy"),
        undefined,
        [tree.identifier],
      );
    case "not":
      return factory.createLogicalNot(emit(ctx, tree.operand));
    case "group":
      return factory.createParenthesizedExpression(emit(ctx, tree.inner));
    case "binary":
      return factory.createBinaryExpression(
        emit(ctx, tree.left),
        tree.operator,
        emit(ctx, tree.right),
      );
  }
}

// ============================================================================
// Macro
// ============================================================================

export const truthyMacro = defineExpressionMacro({
  name: "truthy",
  description: "Coerce every identifier of a boolean expression through its Truthy instance",

  expand(
    ctx: MacroContext,
    callExpr: ts.CallExpression,
    args: readonly ts.Expression[],
  ): ts.Expression {
    try {
      if (args.length !== 1) {
        throw new TruthishError(
          "bad_arity",
          callExpr,
          `truthy expects exactly one boolean expression, got ${args.length} arguments`,
        );
      }

      const tree = new CondParser(ctx).parse(args[0]);
      const expanded = emit(ctx, tree);

      // Keep the expansion a single operand wherever the call stood
      return ts.isBinaryExpression(expanded)
        ? ctx.factory.createParenthesizedExpression(expanded)
        : expanded;
    } catch (error) {
      if (error instanceof TruthishError) {
        ctx.reportError(error.node, error.message);
        return callExpr;
      }
      throw error;
    }
  },
});

globalRegistry.register(truthyMacro);
