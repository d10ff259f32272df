/**
 * Truthy instance table
 *
 * Compile-time record of which runtime export implements Truthy for which
 * type. The standard instances live in the runtime module under the names in
 * `builtinInstanceNames`; other types are added with
 * `registerTruthyInstance` or the `instances` config key.
 */

import type { InstanceLocation } from "./types.js";

/** Export names of the standard instances in the runtime module */
export const builtinInstanceNames = {
  number: "truthyNumber",
  bigint: "truthyBigInt",
  boolean: "truthyBoolean",
  string: "truthyString",
  array: "truthyArray",
  tuple: "truthyTuple",
  unit: "truthyUnit",
  set: "truthySet",
  map: "truthyMap",
  option: "truthyOption",
  result: "truthyResult",
  either: "truthyEither",
} as const;

export type BuiltinInstanceKind = keyof typeof builtinInstanceNames;

export interface TruthyInstanceInfo extends InstanceLocation {
  /** Name of the type (interface, class, enum or alias) */
  forType: string;
}

const instanceTable = new Map<string, InstanceLocation>();

/**
 * Register the runtime instance for a named type.
 * Re-registering a type replaces the previous entry.
 */
export function registerTruthyInstance(info: TruthyInstanceInfo): void {
  instanceTable.set(info.forType, { module: info.module, exportName: info.exportName });
}

export function findTruthyInstance(typeName: string): InstanceLocation | undefined {
  return instanceTable.get(typeName);
}

export function getRegisteredInstances(): TruthyInstanceInfo[] {
  return [...instanceTable].map(([forType, location]) => ({ forType, ...location }));
}

/** Remove all registered instances (useful for testing) */
export function clearTruthyInstances(): void {
  instanceTable.clear();
}
