/**
 * Supplying external members
 */

import { createTypeBuilder, type TypeBuilder } from "../builder/type-builder.js";
import { queueExternals } from "../externals/externals.js";
import type { LoadUnit, TypeRuntime } from "../model/types.js";

/**
 * Provide native implementations for members of `typeName` declared
 * external. `define` declares them with the usual builder calls
 * (`method`, `rawMethod`, `setValue`, ...); they are applied when the type
 * is first constructed.
 *
 * @example
 * implementExternals(runtime, core, "System.Math", (builder) => {
 *   builder.method({ isStatic: true, isPublic: true }, "Abs",
 *     builder.signature(builder.corlibRef("System.Double"), [builder.corlibRef("System.Double")]),
 *     (_self, value) => Math.abs(Number(value)));
 * });
 */
export const implementExternals = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  typeName: string,
  define: (builder: TypeBuilder) => void
): void => {
  queueExternals(runtime, loadUnit, typeName, (scratch) =>
    define(createTypeBuilder(runtime, scratch))
  );
};
