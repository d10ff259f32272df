/**
 * Compile-time Truthy instance resolution
 *
 * Maps the static type of an identifier to a reference to its Truthy
 * instance, e.g.
 *
 *   number                      → truthyNumber
 *   string | null               → truthyOption(truthyString)
 *   Result<number[], Error>     → truthyResult(truthyArray)
 *
 * Resolution looks only at types; nothing is inspected at run time. It
 * produces plain descriptions so a failed expansion leaves no trace in the
 * file; `instanceExpression` turns a description into AST.
 */

import * as ts from "typescript";
import { MissingInstanceError } from "../core/errors.js";
import {
  builtinInstanceNames,
  findTruthyInstance,
  type BuiltinInstanceKind,
} from "../core/instances.js";
import type { MacroContext } from "../core/types.js";

/** An instance export, applied to the instances of its type arguments if any */
export interface InstanceRef {
  readonly module: string;
  readonly exportName: string;
  readonly args: readonly InstanceRef[];
}

type PrimitiveKind = "number" | "bigint" | "boolean" | "string" | "unit";

const NULLISH = ts.TypeFlags.Null | ts.TypeFlags.Undefined | ts.TypeFlags.Void;

const ARRAY_NAMES = new Set(["Array", "ReadonlyArray"]);
const SET_NAMES = new Set(["Set", "ReadonlySet"]);
const MAP_NAMES = new Set(["Map", "ReadonlyMap"]);

function primitiveKind(type: ts.Type): PrimitiveKind | undefined {
  const flags = type.flags;
  if (flags & ts.TypeFlags.BooleanLike) return "boolean";
  if (flags & ts.TypeFlags.NumberLike) return "number";
  if (flags & ts.TypeFlags.BigIntLike) return "bigint";
  if (flags & ts.TypeFlags.StringLike) return "string";
  if (flags & NULLISH) return "unit";
  return undefined;
}

function isObjectType(type: ts.Type): type is ts.ObjectType {
  return (type.flags & ts.TypeFlags.Object) !== 0;
}

function isTypeReference(type: ts.ObjectType): type is ts.TypeReference {
  return (type.objectFlags & ts.ObjectFlags.Reference) !== 0;
}

function isTupleType(type: ts.Type): boolean {
  return (
    isObjectType(type) &&
    isTypeReference(type) &&
    (type.target.objectFlags & ts.ObjectFlags.Tuple) !== 0
  );
}

/** Names a type can be registered under: its alias first, then its own symbol */
function typeNames(type: ts.Type): string[] {
  const names: string[] = [];
  if (type.aliasSymbol) names.push(type.aliasSymbol.getName());
  const symbol = type.getSymbol();
  if (symbol) names.push(symbol.getName());
  return names;
}

export class InstanceResolver {
  constructor(
    private readonly ctx: MacroContext,
    /** Node diagnostics point at */
    private readonly at: ts.Node,
  ) {}

  resolve(type: ts.Type): InstanceRef {
    if (type.flags & (ts.TypeFlags.Any | ts.TypeFlags.Unknown | ts.TypeFlags.Never)) {
      throw this.missing(type, "its type is not known statically");
    }

    const named = this.resolveNamed(type);
    if (named) return named;

    // `boolean` is itself the union `true | false`
    if (type.flags & ts.TypeFlags.BooleanLike) return this.builtin("boolean");

    if (type.isUnion()) return this.resolveUnion(type);

    const primitive = primitiveKind(type);
    if (primitive) return this.builtin(primitive);

    const collection = this.collectionKind(type);
    if (collection) return this.builtin(collection);

    throw this.missing(type);
  }

  // ---------------------------------------------------------------------------
  // Registered instances
  // ---------------------------------------------------------------------------

  private resolveNamed(type: ts.Type): InstanceRef | undefined {
    for (const name of typeNames(type)) {
      const location = this.ctx.options.instances[name] ?? findTruthyInstance(name);
      if (location) {
        return { module: location.module, exportName: location.exportName, args: [] };
      }
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Unions
  // ---------------------------------------------------------------------------

  private resolveUnion(type: ts.UnionType): InstanceRef {
    const present = type.types.filter((member) => (member.flags & NULLISH) === 0);
    if (present.length === 0) return this.builtin("unit");

    const inner = present.length === 1 ? this.resolve(present[0]) : this.resolveVariants(type, present);

    return present.length < type.types.length ? this.construct("option", [inner]) : inner;
  }

  /** A union without nullish members that must share one instance */
  private resolveVariants(union: ts.Type, members: readonly ts.Type[]): InstanceRef {
    const primitives = new Set(members.map(primitiveKind));
    if (primitives.size === 1) {
      const [kind] = primitives;
      if (kind) return this.builtin(kind);
    }

    const result = this.matchResult(members);
    if (result) return this.construct("result", [this.resolve(result)]);

    const either = this.matchEither(members);
    if (either) {
      if (!this.ctx.options.features.either) {
        throw this.missing(union, "the either feature is disabled");
      }
      return this.construct("either", [this.resolve(either.left), this.resolve(either.right)]);
    }

    const collections = new Set(members.map((member) => this.collectionKind(member)));
    if (collections.size === 1) {
      const [kind] = collections;
      if (kind) return this.builtin(kind);
    }

    throw this.missing(union, "its members have no common instance");
  }

  /** `{ ok: true; value: T } | { ok: false; error: E }` → T */
  private matchResult(members: readonly ts.Type[]): ts.Type | undefined {
    if (members.length !== 2) return undefined;

    let value: ts.Type | undefined;
    let hasError = false;
    for (const member of members) {
      const ok = this.propertyType(member, "ok");
      if (!ok || !(ok.flags & ts.TypeFlags.BooleanLiteral)) return undefined;
      if (this.ctx.typeToString(ok) === "true") {
        value = this.propertyType(member, "value");
      } else {
        hasError = this.propertyType(member, "error") !== undefined;
      }
    }
    return hasError ? value : undefined;
  }

  /** `{ _tag: "Left"; left: L } | { _tag: "Right"; right: R }` → L, R */
  private matchEither(members: readonly ts.Type[]): { left: ts.Type; right: ts.Type } | undefined {
    if (members.length !== 2) return undefined;

    let left: ts.Type | undefined;
    let right: ts.Type | undefined;
    for (const member of members) {
      const tag = this.propertyType(member, "_tag");
      if (!tag || !tag.isStringLiteral()) return undefined;
      if (tag.value === "Left") left = this.propertyType(member, "left");
      else if (tag.value === "Right") right = this.propertyType(member, "right");
    }
    return left && right ? { left, right } : undefined;
  }

  private propertyType(type: ts.Type, name: string): ts.Type | undefined {
    const property = type.getProperty(name);
    return property ? this.ctx.typeChecker.getTypeOfSymbolAtLocation(property, this.at) : undefined;
  }

  // ---------------------------------------------------------------------------
  // Collections
  // ---------------------------------------------------------------------------

  private collectionKind(type: ts.Type): BuiltinInstanceKind | undefined {
    if (isTupleType(type)) return "tuple";

    const name = type.getSymbol()?.getName();
    if (name && ARRAY_NAMES.has(name)) return "array";
    if (name && SET_NAMES.has(name)) return "set";
    if (name && MAP_NAMES.has(name)) return "map";
    return undefined;
  }

  private builtin(kind: BuiltinInstanceKind): InstanceRef {
    return { module: this.ctx.options.runtimeModule, exportName: builtinInstanceNames[kind], args: [] };
  }

  private construct(kind: BuiltinInstanceKind, args: InstanceRef[]): InstanceRef {
    return { ...this.builtin(kind), args };
  }

  private missing(type: ts.Type, detail?: string): MissingInstanceError {
    return new MissingInstanceError(this.at, this.ctx.typeToString(type), detail);
  }
}

/**
 * Build `ns.exportName` or `ns.exportName(arg, ...)` for an instance reference,
 * importing each module it names.
 */
export function instanceExpression(ctx: MacroContext, ref: InstanceRef): ts.Expression {
  const access = ctx.factory.createPropertyAccessExpression(
    ctx.requireModule(ref.module),
    ref.exportName,
  );
  if (ref.args.length === 0) return access;
  return ctx.factory.createCallExpression(
    access,
    undefined,
    ref.args.map((arg) => instanceExpression(ctx, arg)),
  );
}
