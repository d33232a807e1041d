/**
 * Calls by exact signature
 *
 * Generated code that knows the signature it wants skips overload dispatch
 * and calls the implementation under its mangled key.
 */

import { fail } from "../host/reporting.js";
import { initializeType } from "../initialization/initialize-type.js";
import { lookupFunctionByKeys } from "../model/member-table.js";
import { signatureKey, signatureToString } from "../model/method-signature.js";
import type {
  MemberHost,
  MemberTable,
  MethodSignature,
  RuntimeFunction,
  RuntimeObject,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";
import { escapeName } from "../naming/names.js";
import { createInstanceOfType } from "./construct.js";

const findImplementation = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  table: MemberTable,
  name: string,
  signature: MethodSignature
): RuntimeFunction => {
  const key = signatureKey(runtime, signature, escapeName(name));
  const renamed = type.renamedMethods.get(key);
  const fn = lookupFunctionByKeys(table, renamed === undefined ? [key] : [renamed, key]);
  if (fn) return fn;

  throw fail(
    runtime,
    "TFG2007",
    `Type '${type.fullName}' has no method '${signatureToString(signature, name)}'.`,
    { subject: type.fullName }
  );
};

const requireTemplate = (runtime: TypeRuntime, type: TypeDescriptor): MemberTable => {
  const template = type.publicInterface.instanceTemplate;
  if (template) return template;
  throw fail(runtime, "TFG2007", `Type '${type.fullName}' has no instance methods.`, {
    subject: type.fullName,
  });
};

/**
 * Call the implementation `type` declares or inherits, whatever the
 * receiver's own type overrides (a base call).
 */
export const callSignature = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  self: MemberHost,
  name: string,
  signature: MethodSignature,
  genericArguments: readonly TypeDescriptor[],
  ...args: unknown[]
): unknown => {
  initializeType(runtime, type);
  const fn = findImplementation(runtime, type, requireTemplate(runtime, type), name, signature);
  return fn.invoke(self, [...genericArguments, ...args]);
};

/** Call through the receiver's own template. */
export const callVirtual = (
  runtime: TypeRuntime,
  self: RuntimeObject,
  name: string,
  signature: MethodSignature,
  genericArguments: readonly TypeDescriptor[],
  ...args: unknown[]
): unknown => {
  const fn = findImplementation(runtime, self.type, self.template, name, signature);
  return fn.invoke(self, [...genericArguments, ...args]);
};

export const callStatic = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  name: string,
  signature: MethodSignature,
  genericArguments: readonly TypeDescriptor[],
  ...args: unknown[]
): unknown => {
  initializeType(runtime, type);
  const publicInterface = type.publicInterface;
  const fn = findImplementation(runtime, type, publicInterface.staticTable, name, signature);
  return fn.invoke(publicInterface, [...genericArguments, ...args]);
};

/** Construct through one particular constructor overload. */
export const constructWith = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  signature: MethodSignature,
  ...args: unknown[]
): RuntimeObject => {
  const instance = createInstanceOfType(runtime, type, null);
  findImplementation(runtime, type, instance.template, ".ctor", signature).invoke(instance, args);
  return instance;
};
