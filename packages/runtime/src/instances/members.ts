/**
 * Member access on instances and public interfaces
 *
 * Instance state lives in the instance's own field map; anything not found
 * there is read from the member table chain (the template for instances, the
 * static table for types). Names are escaped before lookup, so `.ctor` and
 * `get_Name` work as declared.
 */

import { fail } from "../host/reporting.js";
import { initializeType } from "../initialization/initialize-type.js";
import { bindFunction, isRuntimeFunction, lookupEntry } from "../model/member-table.js";
import type {
  MemberHost,
  MemberTable,
  PublicInterface,
  RuntimeFunction,
  TableEntry,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";
import { escapeName } from "../naming/names.js";

type Target = {
  readonly table: MemberTable;
  readonly fields: Map<string, unknown>;
  readonly typeName: string;
};

const targetOf = (runtime: TypeRuntime, host: MemberHost): Target => {
  if (host.kind === "instance") {
    return { table: host.template, fields: host.fields, typeName: host.type.fullName };
  }
  initializeType(runtime, host.descriptor);
  return {
    table: host.staticTable,
    fields: host.fields,
    typeName: host.descriptor.fullName,
  };
};

const missingMember = (runtime: TypeRuntime, typeName: string, name: string) =>
  fail(runtime, "TFG2007", `Type '${typeName}' has no member named '${name}'.`, {
    subject: typeName,
  });

const readEntry = (host: MemberHost, entry: TableEntry): unknown => {
  switch (entry.kind) {
    case "value":
      return entry.value;
    case "function":
      return bindFunction(entry.fn, host);
    case "accessor":
      return entry.get ? entry.get.invoke(host, []) : undefined;
    default:
      return undefined;
  }
};

/**
 * Read a field, property or method. Methods come back bound to the host.
 */
export const getMember = (runtime: TypeRuntime, host: MemberHost, name: string): unknown => {
  const key = escapeName(name);
  const target = targetOf(runtime, host);
  if (target.fields.has(key)) return target.fields.get(key);

  const entry = lookupEntry(target.table, key);
  if (entry === undefined) throw missingMember(runtime, target.typeName, name);
  return readEntry(host, entry);
};

/**
 * Write a field, or a property through its setter.
 */
export const setMember = (
  runtime: TypeRuntime,
  host: MemberHost,
  name: string,
  value: unknown
): void => {
  const key = escapeName(name);
  const target = targetOf(runtime, host);
  const entry = target.fields.has(key) ? undefined : lookupEntry(target.table, key);

  if (entry?.kind === "accessor") {
    if (!entry.set) {
      throw fail(
        runtime,
        "TFG2007",
        `Property '${name}' of type '${target.typeName}' has no setter.`,
        { subject: target.typeName }
      );
    }
    entry.set.invoke(host, [value]);
    return;
  }
  target.fields.set(key, value);
};

const callableOf = (
  runtime: TypeRuntime,
  host: MemberHost,
  name: string
): RuntimeFunction => {
  const key = escapeName(name);
  const target = targetOf(runtime, host);
  const value = target.fields.has(key) ? target.fields.get(key) : undefined;
  if (isRuntimeFunction(value)) return value;

  const entry = lookupEntry(target.table, key);
  if (entry?.kind === "function") return entry.fn;
  if (entry?.kind === "value" && isRuntimeFunction(entry.value)) return entry.value;

  if (entry === undefined && value === undefined) {
    throw missingMember(runtime, target.typeName, name);
  }
  throw fail(
    runtime,
    "TFG2007",
    `Member '${name}' of type '${target.typeName}' is not callable.`,
    { subject: target.typeName }
  );
};

export const invokeMember = (
  runtime: TypeRuntime,
  host: MemberHost,
  name: string,
  ...args: unknown[]
): unknown => callableOf(runtime, host, name).invoke(host, args);

export const invokeStatic = (
  runtime: TypeRuntime,
  type: PublicInterface | TypeDescriptor,
  name: string,
  ...args: unknown[]
): unknown => {
  const publicInterface = type.kind === "type" ? type.publicInterface : type;
  return invokeMember(runtime, publicInterface, name, ...args);
};
