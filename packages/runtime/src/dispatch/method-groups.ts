/**
 * Method groups and overload dispatch
 *
 * Every distinct method name visible on a type becomes one callable entry in
 * its static table or instance template. A name with a single visible,
 * non-generic overload is bound straight to its implementation. Otherwise a
 * dispatcher selects by argument count and then by the runtime types of the
 * arguments, trying fixed-arity overloads in declaration order (first match
 * wins) before generic methods whose generic arity equals the argument count.
 */

import { checkType } from "../assignability/type-checks.js";
import { resolveInContext, resolveGenericMethodSignature } from "../generics/resolve.js";
import { fail, warn } from "../host/reporting.js";
import { isPublicInterface, isTypeDescriptor } from "../model/guards.js";
import {
  createFunction,
  functionEntry,
  lookupFunctionByKeys,
  setEntry,
} from "../model/member-table.js";
import { signatureKey, signatureToString } from "../model/method-signature.js";
import type {
  MemberHost,
  MemberInfo,
  MemberTable,
  MethodRecord,
  MethodSignature,
  RuntimeFunction,
  TableEntry,
  TypeArgument,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";
import { BindingFlags, getMembers } from "../reflection/reflection-cache.js";
import { applyMemberHiding } from "./member-hiding.js";

export type Overload = {
  readonly member: MemberInfo;
  readonly record: MethodRecord;
  /** Signature with the inspected type's generic arguments substituted. */
  readonly signature: MethodSignature;
  readonly implementation: RuntimeFunction;
  readonly description: string;
  parameterTypes: readonly TypeArgument[] | null;
};

type Bucket = {
  readonly overloads: Overload[];
};

type MethodGroupContext = {
  readonly runtime: TypeRuntime;
  readonly type: TypeDescriptor;
  readonly name: string;
  readonly overloads: readonly Overload[];
};

// ═══════════════════════════════════════════════════════════════════════════
// OVERLOADS
// ═══════════════════════════════════════════════════════════════════════════

const missingImplementation = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  description: string
): RuntimeFunction => {
  warn(
    runtime,
    "TFG3006",
    `Method '${description}' of type '${type.fullName}' has no implementation.`,
    type.fullName
  );
  return createFunction(
    description,
    () => {
      throw fail(
        runtime,
        "TFG2007",
        `Method '${description}' of type '${type.fullName}' is not defined.`,
        { subject: type.fullName }
      );
    },
    true
  );
};

/**
 * Implementation keys, most specific first: the key a closed type renamed
 * the method to, the key of the substituted signature, the declared key.
 */
const implementationKeys = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  record: MethodRecord,
  resolved: MethodSignature | null
): readonly string[] => {
  const declared = record.data.mangledName;
  const keys: string[] = [];
  const renamed = type.renamedMethods.get(declared);
  if (renamed !== undefined) keys.push(renamed);
  if (resolved) keys.push(signatureKey(runtime, resolved, record.descriptor.escapedName));
  keys.push(declared);
  return keys;
};

export const createOverload = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  table: MemberTable,
  member: MemberInfo,
  record: MethodRecord
): Overload => {
  const resolved = resolveGenericMethodSignature(runtime, record.data.signature, type);
  const signature = resolved ?? record.data.signature;
  const description = signatureToString(signature, member.name);
  const implementation =
    lookupFunctionByKeys(table, implementationKeys(runtime, type, record, resolved)) ??
    missingImplementation(runtime, type, description);

  return {
    member,
    record,
    signature,
    implementation,
    description,
    parameterTypes: null,
  };
};

const parameterTypesOf = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  overload: Overload
): readonly TypeArgument[] => {
  if (overload.parameterTypes === null) {
    overload.parameterTypes = overload.signature.argumentTypes.map((ref) =>
      resolveInContext(runtime, ref, overload.member.declaringType, type)
    );
  }
  return overload.parameterTypes;
};

// ═══════════════════════════════════════════════════════════════════════════
// SELECTION
// ═══════════════════════════════════════════════════════════════════════════

const argumentMatches = (
  runtime: TypeRuntime,
  expected: TypeArgument,
  value: unknown,
  genericArguments: readonly TypeDescriptor[]
): boolean => {
  let target: TypeDescriptor;
  switch (expected.kind) {
    case "genericParameter":
      return true;
    case "positionalParameter": {
      const bound = genericArguments[expected.index];
      if (bound === undefined) return true;
      target = bound;
      break;
    }
    default:
      target = expected;
  }

  if (value === null) return target.isReferenceType;
  return checkType(runtime, value, target);
};

const selectOverload = (
  context: MethodGroupContext,
  bucket: Bucket,
  args: readonly unknown[],
  offset: number,
  genericArguments: readonly TypeDescriptor[]
): Overload | undefined =>
  bucket.overloads.find((overload) =>
    parameterTypesOf(context.runtime, context.type, overload).every((expected, i) =>
      argumentMatches(context.runtime, expected, args[i + offset], genericArguments)
    )
  );

const noApplicableOverload = (
  context: MethodGroupContext,
  candidates: readonly Overload[],
  argumentCount: number
) =>
  fail(
    context.runtime,
    "TFG2004",
    `No overload of '${context.type.fullName}.${context.name}' accepts the ${argumentCount} argument(s) given. ${candidates.length} candidate(s):\n` +
      candidates.map((candidate) => `  ${candidate.description}`).join("\n"),
    {
      subject: context.type.fullName,
      candidates: candidates.map((candidate) => candidate.description),
    }
  );

// ═══════════════════════════════════════════════════════════════════════════
// GENERIC METHODS
// ═══════════════════════════════════════════════════════════════════════════

const toTypeArgument = (
  context: MethodGroupContext,
  value: unknown,
  index: number
): TypeDescriptor => {
  if (isPublicInterface(value)) return value.descriptor;
  if (isTypeDescriptor(value)) return value;
  throw fail(
    context.runtime,
    "TFG2002",
    `Generic argument #${index} of '${context.name}' is ${value === null || value === undefined ? String(value) : "not a type"}.`,
    { subject: context.type.fullName }
  );
};

/**
 * Bind a generic method to its generic arguments. The returned function
 * keeps the receiver it was bound with and prepends the generic arguments to
 * the actual ones.
 */
const bindGenericMethod = (
  context: MethodGroupContext,
  buckets: ReadonlyMap<number, Bucket>,
  genericArity: number,
  self: MemberHost,
  rawGenericArguments: readonly unknown[]
): RuntimeFunction => {
  if (rawGenericArguments.length !== genericArity) {
    throw fail(
      context.runtime,
      "TFG2003",
      `Method '${context.name}' takes ${genericArity} generic argument(s), got ${rawGenericArguments.length}.`,
      { subject: context.type.fullName }
    );
  }
  const genericArguments = rawGenericArguments.map((value, i) =>
    toTypeArgument(context, value, i)
  );
  const names = genericArguments.map((arg) => arg.fullName).join(", ");

  return createFunction(`${context.name}<${names}>`, (_ignored, actual) => {
    const bucket = buckets.get(actual.length);
    const candidates = [...buckets.values()].flatMap((b) => b.overloads);
    if (!bucket) throw noApplicableOverload(context, candidates, actual.length);

    const fullArguments = [...genericArguments, ...actual];
    const chosen =
      bucket.overloads.length === 1
        ? bucket.overloads[0]
        : selectOverload(context, bucket, fullArguments, genericArity, genericArguments);
    if (!chosen) throw noApplicableOverload(context, bucket.overloads, actual.length);
    return chosen.implementation.invoke(self, fullArguments);
  });
};

// ═══════════════════════════════════════════════════════════════════════════
// GROUPS
// ═══════════════════════════════════════════════════════════════════════════

const addToBucket = (
  buckets: Map<number, Bucket>,
  argumentCount: number,
  overload: Overload
): void => {
  const bucket = buckets.get(argumentCount);
  if (bucket) {
    bucket.overloads.push(overload);
  } else {
    buckets.set(argumentCount, { overloads: [overload] });
  }
};

/**
 * The callable for one method name. A lone non-generic overload is returned
 * as is.
 */
export const makeMethodGroup = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  name: string,
  overloads: readonly Overload[]
): RuntimeFunction => {
  const single = overloads[0];
  if (
    overloads.length === 1 &&
    single !== undefined &&
    single.signature.genericArgumentNames.length === 0
  ) {
    return single.implementation;
  }

  const context: MethodGroupContext = { runtime, type, name, overloads };
  const fixed = new Map<number, Bucket>();
  const generic = new Map<number, Map<number, Bucket>>();

  for (const overload of overloads) {
    const argumentCount = overload.signature.argumentTypes.length;
    const genericArity = overload.signature.genericArgumentNames.length;
    if (genericArity === 0) {
      addToBucket(fixed, argumentCount, overload);
      continue;
    }
    let byArity = generic.get(genericArity);
    if (!byArity) {
      byArity = new Map();
      generic.set(genericArity, byArity);
    }
    addToBucket(byArity, argumentCount, overload);
  }

  return createFunction(`${type.fullName}.${name}`, (self, args) => {
    const bucket = fixed.get(args.length);
    const genericBuckets = generic.get(args.length);

    if (bucket) {
      const lone = bucket.overloads[0];
      if (bucket.overloads.length === 1 && lone !== undefined && !genericBuckets) {
        return lone.implementation.invoke(self, args);
      }
      const chosen = selectOverload(context, bucket, args, 0, []);
      if (chosen) return chosen.implementation.invoke(self, args);
    }

    if (genericBuckets) {
      return bindGenericMethod(context, genericBuckets, args.length, self, args);
    }

    throw noApplicableOverload(context, bucket ? bucket.overloads : overloads, args.length);
  });
};

const groupKey = (member: MemberInfo): string =>
  `${member.isStatic ? "static" : "instance"}$${member.record.descriptor.escapedName}`;

const collectGroups = (
  type: TypeDescriptor
): Map<string, MemberInfo[]> => {
  const members = [
    ...getMembers(type, BindingFlags.Instance, { memberType: "MethodInfo" }),
    ...getMembers(type, BindingFlags.Instance | BindingFlags.DeclaredOnly, {
      memberType: "ConstructorInfo",
    }),
    ...getMembers(type, BindingFlags.Static | BindingFlags.DeclaredOnly, {
      memberType: "MethodInfo",
      allowConstructors: true,
    }),
  ];

  const groups = new Map<string, MemberInfo[]>();
  for (const member of members) {
    const key = groupKey(member);
    const group = groups.get(key);
    if (group) {
      group.push(member);
    } else {
      groups.set(key, [member]);
    }
  }
  return groups;
};

/**
 * Install one method group per visible method name. A raw function already
 * defined under the bare name on the table itself is left alone.
 */
export const buildMethodGroups = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): void => {
  const publicInterface = type.publicInterface;

  for (const members of collectGroups(type).values()) {
    const first = members[0];
    if (!first) continue;

    const table = first.isStatic
      ? publicInterface.staticTable
      : publicInterface.instanceTemplate;
    if (!table) continue;

    const escapedName = first.record.descriptor.escapedName;
    const own = table.entries.get(escapedName);
    if (own?.kind === "function" && !own.fn.isPlaceholder) continue;

    const build = (): TableEntry => {
      const overloads = applyMemberHiding(runtime, type, members).flatMap((member) => {
        const record = member.record;
        return record.kind === "method" || record.kind === "constructor"
          ? [createOverload(runtime, type, table, member, record)]
          : [];
      });
      return functionEntry(makeMethodGroup(runtime, type, first.name, overloads));
    };

    setEntry(
      table,
      escapedName,
      runtime.options.lazyMethodGroups ? { kind: "lazy", compute: build } : build()
    );
  }
};
