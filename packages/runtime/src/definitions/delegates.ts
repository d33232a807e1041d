/**
 * Delegate types and values
 */

import { CORLIB } from "../corlib/lookup.js";
import { functionFromImpl, isRuntimeFunction } from "../model/member-table.js";
import type {
  DelegateValue,
  LoadUnit,
  MemberHost,
  MethodImpl,
  RuntimeFunction,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";
import type { TypeHandle } from "../registry/name-registry.js";
import { makeType, type TypeDeclaration } from "./make-type.js";

export const makeDelegate = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: Omit<TypeDeclaration, "baseType">
): TypeHandle =>
  makeType(runtime, loadUnit, declaration, {
    typeKind: "delegate",
    isReferenceType: true,
    hasInstances: true,
    defaultBase: CORLIB.multicastDelegate,
  });

/**
 * A delegate of `type` over `method`. A bound delegate passes `target` as
 * the receiver; an unbound one passes the delegate type's public interface.
 */
export const newDelegate = (
  type: TypeDescriptor,
  target: MemberHost | null,
  method: RuntimeFunction | MethodImpl
): DelegateValue => ({
  kind: "delegate",
  type,
  target,
  method: isRuntimeFunction(method)
    ? method
    : functionFromImpl(`${type.fullName}.Invoke`, method),
});

export const invokeDelegate = (delegate: DelegateValue, ...args: unknown[]): unknown =>
  delegate.method.invoke(delegate.target ?? delegate.type.publicInterface, args);
