/**
 * truthish Built-in Macros
 *
 * Importing this module registers every built-in macro with the global
 * registry.
 */

import "./truthy.js";

// Re-export for programmatic use
export { truthyMacro } from "./truthy.js";
export { InstanceResolver, instanceExpression, type InstanceRef } from "./resolve-instance.js";
