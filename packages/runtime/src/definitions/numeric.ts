/**
 * Numeric primitives
 *
 * Values of numeric types are plain host numbers. Integral types accept
 * only integers.
 */

import type { LoadUnit, TypeRuntime } from "../model/types.js";
import type { TypeHandle } from "../registry/name-registry.js";
import { CORLIB } from "../corlib/lookup.js";
import { makeType, type TypeDeclaration } from "./make-type.js";

export const makeNumericType = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: Omit<TypeDeclaration, "baseType" | "genericParameters">,
  isIntegral: boolean
): TypeHandle =>
  makeType(runtime, loadUnit, declaration, {
    typeKind: "struct",
    isReferenceType: false,
    hasInstances: true,
    defaultBase: CORLIB.valueType,
    configure: (type) => {
      type.isNumeric = true;
      type.isIntegral = isIntegral;
      type.isNativeType = true;
      type.customCheck = isIntegral
        ? (value) => typeof value === "number" && Number.isInteger(value)
        : (value) => typeof value === "number";
    },
  });
