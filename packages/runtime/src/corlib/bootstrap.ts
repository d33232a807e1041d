/**
 * Built-in types of the core load unit
 *
 * Registered (not built) when a runtime is created. System.Object is the
 * root: it and the reflection types are built against a stub runtime type,
 * and finishing Object's initializer marks the root as available.
 */

import type { TypeBuilder } from "../builder/type-builder.js";
import { makeClass, makeType, type TypeShape } from "../definitions/make-type.js";
import { makeNumericType } from "../definitions/numeric.js";
import { requireCoreLoadUnit } from "../identity/load-units.js";
import type { MemberHost, TypeDescriptor, TypeRuntime } from "../model/types.js";
import { CORLIB } from "./lookup.js";

type NumericDeclaration = {
  readonly name: string;
  readonly isIntegral: boolean;
};

const NUMERIC_TYPES: readonly NumericDeclaration[] = [
  { name: "System.Byte", isIntegral: true },
  { name: "System.SByte", isIntegral: true },
  { name: "System.Int16", isIntegral: true },
  { name: "System.UInt16", isIntegral: true },
  { name: CORLIB.int32, isIntegral: true },
  { name: "System.UInt32", isIntegral: true },
  { name: "System.Int64", isIntegral: true },
  { name: "System.UInt64", isIntegral: true },
  { name: CORLIB.single, isIntegral: false },
  { name: CORLIB.double, isIntegral: false },
];

const hostType = (self: MemberHost): TypeDescriptor =>
  self.kind === "instance" ? self.type : self.descriptor;

const declareObjectMembers = (runtime: TypeRuntime, builder: TypeBuilder): void => {
  const object = builder.corlibRef(CORLIB.object);
  const boolean = builder.corlibRef(CORLIB.boolean);
  const instance = { isPublic: true };
  const shared = { isPublic: true, isStatic: true };

  builder.method(instance, ".ctor", builder.signature(null), () => undefined);
  builder.method(
    instance,
    "ToString",
    builder.signature(builder.corlibRef(CORLIB.string)),
    (self) => hostType(self).fullName
  );
  builder.method(
    instance,
    "Equals",
    builder.signature(boolean, [object]),
    (self, other) => self === other
  );
  builder.method(
    instance,
    "GetType",
    builder.signature(builder.corlibRef(CORLIB.type)),
    (self) => hostType(self)
  );
  builder.method(
    shared,
    "ReferenceEquals",
    builder.signature(boolean, [object, object]),
    (_self, left, right) => left === right
  );
  builder.rawMethod(true, "CheckType", (_self, value) => value !== null && value !== undefined);

  runtime.rootInitialized = true;
};

const nativeShape = (
  typeKind: "class" | "struct",
  check: (value: unknown) => boolean
): TypeShape => ({
  typeKind,
  isReferenceType: typeKind === "class",
  hasInstances: true,
  defaultBase: typeKind === "class" ? CORLIB.object : CORLIB.valueType,
  configure: (type) => {
    type.isNativeType = true;
    type.customCheck = check;
  },
});

/**
 * Register the built-in types in the core load unit.
 */
export const bootstrapCorlib = (runtime: TypeRuntime): void => {
  const core = requireCoreLoadUnit(runtime);
  const declareClass = (name: string, baseType?: string) =>
    makeClass(runtime, core, { name, isPublic: true, baseType });

  makeClass(runtime, core, {
    name: CORLIB.object,
    isPublic: true,
    baseType: null,
    initializer: (builder) => declareObjectMembers(runtime, builder),
  });
  declareClass(CORLIB.valueType);
  declareClass(CORLIB.enum, CORLIB.valueType);
  declareClass(CORLIB.memberInfo);
  declareClass(CORLIB.type, CORLIB.memberInfo);
  declareClass(CORLIB.runtimeType, CORLIB.type);
  declareClass(CORLIB.array);
  declareClass(CORLIB.delegate);
  declareClass(CORLIB.multicastDelegate, CORLIB.delegate);

  makeType(
    runtime,
    core,
    { name: CORLIB.string, isPublic: true },
    nativeShape("class", (value) => typeof value === "string")
  );
  makeType(
    runtime,
    core,
    { name: CORLIB.boolean, isPublic: true },
    nativeShape("struct", (value) => typeof value === "boolean")
  );
  makeType(
    runtime,
    core,
    { name: CORLIB.char, isPublic: true },
    nativeShape("struct", (value) => typeof value === "string" && value.length === 1)
  );

  for (const numeric of NUMERIC_TYPES) {
    makeNumericType(runtime, core, { name: numeric.name, isPublic: true }, numeric.isIntegral);
  }
};
