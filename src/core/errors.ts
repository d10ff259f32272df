import type * as ts from "typescript";

/** Reason codes for failed expansions of the `truthy` macro. */
export type TruthishErrorReason = "malformed_expression" | "missing_instance" | "bad_arity";

/**
 * Error raised while rewriting a `truthy(...)` call. The macro turns it into
 * a diagnostic at `node`; it never reaches user code.
 */
export class TruthishError extends Error {
  constructor(
    readonly reason: TruthishErrorReason,
    readonly node: ts.Node,
    message: string,
  ) {
    super(message);
    this.name = "TruthishError";
  }
}

/** The argument does not match `!`, `&&`, `||`, `( )` over identifiers. */
export class MalformedExpressionError extends TruthishError {
  constructor(
    node: ts.Node,
    readonly token: string,
  ) {
    super("malformed_expression", node, `malformed boolean expression: unexpected '${token}'`);
    this.name = "MalformedExpressionError";
  }
}

/** An identifier's type has no Truthy instance. */
export class MissingInstanceError extends TruthishError {
  constructor(
    node: ts.Node,
    readonly typeName: string,
    detail?: string,
  ) {
    super(
      "missing_instance",
      node,
      `type '${typeName}' has no Truthy instance${detail ? ` (${detail})` : ""}`,
    );
    this.name = "MissingInstanceError";
  }
}
