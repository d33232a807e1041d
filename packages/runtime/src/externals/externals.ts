/**
 * External implementations
 *
 * Members declared "external" have no translated body; a native stand-in is
 * supplied out of band with `implementExternals`. Those calls are queued per
 * type name and drained the first time the type is constructed, so an
 * external may mention types that do not exist yet when it is registered.
 *
 * Table keys: static members by mangled name, instance members prefixed
 * with `instance$`, raw methods suffixed with `$raw`.
 */

import { assignTypeId } from "../identity/type-ids.js";
import { fail, warn } from "../host/reporting.js";
import { createTypeDescriptor } from "../model/descriptors.js";
import { createFunction, lookupFunction, setEntry } from "../model/member-table.js";
import type {
  ExternalEntry,
  ExternalTable,
  LoadUnit,
  MemberRecord,
  MemberTable,
  RuntimeFunction,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";

export const INSTANCE_PREFIX = "instance$";
export const RAW_SUFFIX = "$raw";

export const externalKey = (isStatic: boolean, key: string): string =>
  isStatic ? key : `${INSTANCE_PREFIX}${key}`;

const getExternalTable = (runtime: TypeRuntime, typeName: string): ExternalTable => {
  const existing = runtime.externalTables.get(typeName);
  if (existing) return existing;
  const table: ExternalTable = { entries: new Map(), initialized: false };
  runtime.externalTables.set(typeName, table);
  return table;
};

/**
 * The external implementation recorded for a member, if any.
 */
export const findExternal = (
  runtime: TypeRuntime,
  typeName: string,
  key: string
): ExternalEntry | undefined => runtime.externalTables.get(typeName)?.entries.get(key);

/**
 * Queue native stand-ins for the members of a type. `define` declares them
 * on a scratch descriptor; every method, raw method and value it declares
 * replaces the matching external placeholder of the real type.
 */
export const queueExternals = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  typeName: string,
  define: (scratch: TypeDescriptor) => void
): void => {
  const table = getExternalTable(runtime, typeName);
  if (table.initialized) {
    throw fail(
      runtime,
      "TFG1006",
      `Type '${typeName}' is already initialized; its externals can no longer be supplied.`,
      { subject: typeName }
    );
  }

  const queue = runtime.externalQueues.get(typeName) ?? [];
  runtime.externalQueues.set(typeName, queue);

  queue.push(() => {
    const scratch = createTypeDescriptor({
      typeKind: "class",
      loadUnit,
      fullName: typeName,
      typeId: assignTypeId(runtime, loadUnit, typeName),
      isReferenceType: true,
      templateParent: null,
    });
    define(scratch);
    collectExternals(scratch, table);
  });
};

const collectExternals = (scratch: TypeDescriptor, table: ExternalTable): void => {
  const { staticTable, instanceTemplate } = scratch.publicInterface;

  const record = (
    isStatic: boolean,
    key: string,
    member: MemberRecord | null,
    tableKey: string
  ) => {
    const source = isStatic ? staticTable : instanceTemplate;
    const entry = source?.entries.get(key);
    if (entry) table.entries.set(tableKey, { member, entry });
  };

  for (const member of scratch.members) {
    if (member.kind !== "method" && member.kind !== "constructor") continue;
    const isStatic = member.descriptor.isStatic;
    record(isStatic, member.data.mangledName, member, externalKey(isStatic, member.data.mangledName));
  }

  const rawKeys = new Set<string>();
  for (const raw of scratch.rawMethods) {
    rawKeys.add(externalKey(raw.isStatic, raw.name));
    record(raw.isStatic, raw.name, null, externalKey(raw.isStatic, `${raw.name}${RAW_SUFFIX}`));
  }

  // Plain values and accessors declared with setValue, constant or property.
  const recordRest = (isStatic: boolean, source: MemberTable | null) => {
    for (const key of source?.entries.keys() ?? []) {
      const tableKey = externalKey(isStatic, key);
      if (!table.entries.has(tableKey) && !rawKeys.has(tableKey)) {
        record(isStatic, key, null, tableKey);
      }
    }
  };
  recordRest(true, staticTable);
  recordRest(false, instanceTemplate);
};

/**
 * Drain the type's queue and splice every collected external into its
 * tables. Externals queued afterwards are rejected.
 */
export const applyExternals = (runtime: TypeRuntime, type: TypeDescriptor): void => {
  const name = type.fullName;
  const queue = runtime.externalQueues.get(name);
  while (queue && queue.length > 0) {
    queue.shift()?.();
  }

  const table = getExternalTable(runtime, name);
  const { staticTable, instanceTemplate } = type.publicInterface;

  for (const [rawKey, external] of table.entries) {
    let key = rawKey;
    let isStatic = true;
    if (key.startsWith(INSTANCE_PREFIX)) {
      isStatic = false;
      key = key.slice(INSTANCE_PREFIX.length);
    }

    const target = isStatic ? staticTable : instanceTemplate;
    if (!target) {
      warn(
        runtime,
        "TFG3004",
        `Type '${name}' has no instance template to apply instance externals to.`,
        name
      );
      continue;
    }

    if (key.endsWith(RAW_SUFFIX)) {
      key = key.slice(0, -RAW_SUFFIX.length);
      type.rawMethods.push({ isStatic, name: key });
    }
    if (external.member) type.members.push(external.member);

    setEntry(target, key, external.entry);
  }

  table.initialized = true;
};

/**
 * Stand-in for an external member nobody has implemented. Calls fall back
 * to an inherited implementation of the same key (warning once), or fail.
 */
export const createExternalStub = (
  runtime: TypeRuntime,
  typeName: string,
  table: MemberTable,
  key: string,
  describe: () => string
): RuntimeFunction => {
  const warnKey = `${typeName}::${key}`;

  return createFunction(
    `<Missing External ${typeName}.${key}>`,
    (self, args) => {
      const inherited = table.parent ? lookupFunction(table.parent, key) : undefined;
      if (inherited && !inherited.isPlaceholder) {
        if (!runtime.warnedPlaceholders.has(warnKey)) {
          runtime.warnedPlaceholders.add(warnKey);
          warn(
            runtime,
            "TFG3005",
            `The external method '${describe()}' of type '${typeName}' has not been implemented; calling inherited method.`,
            typeName
          );
        }
        return inherited.invoke(self, args);
      }

      throw fail(
        runtime,
        "TFG3004",
        `The external method '${describe()}' of type '${typeName}' has not been implemented.`,
        { subject: typeName }
      );
    },
    true
  );
};
