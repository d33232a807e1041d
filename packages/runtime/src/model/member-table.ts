/**
 * Member tables and runtime functions
 */

import type {
  MemberHost,
  MemberTable,
  MethodImpl,
  RuntimeFunction,
  TableEntry,
} from "./types.js";

export const createMemberTable = (
  owner: string,
  parent: MemberTable | null
): MemberTable => ({ owner, entries: new Map(), parent });

export const createFunction = (
  displayName: string,
  invoke: (self: MemberHost, args: readonly unknown[]) => unknown,
  isPlaceholder = false
): RuntimeFunction => ({ kind: "function", displayName, isPlaceholder, invoke });

export const functionFromImpl = (
  displayName: string,
  impl: MethodImpl
): RuntimeFunction =>
  createFunction(displayName, (self, args) => impl(self, ...args));

/**
 * Fix the receiver of a function; the receiver passed at invocation is
 * ignored.
 */
export const bindFunction = (
  fn: RuntimeFunction,
  self: MemberHost
): RuntimeFunction =>
  createFunction(fn.displayName, (_ignored, args) => fn.invoke(self, args), fn.isPlaceholder);

export const isRuntimeFunction = (value: unknown): value is RuntimeFunction =>
  typeof value === "object" &&
  value !== null &&
  "kind" in value &&
  value.kind === "function" &&
  "invoke" in value &&
  typeof value.invoke === "function";

export const valueEntry = (value: unknown): TableEntry => ({
  kind: "value",
  value,
});

export const functionEntry = (fn: RuntimeFunction): TableEntry => ({
  kind: "function",
  fn,
});

/** Entry that exists but holds nothing; shadows the parent's entry. */
export const NULL_ENTRY: TableEntry = { kind: "value", value: null };

export const isEmptyEntry = (entry: TableEntry | undefined): boolean =>
  entry === undefined ||
  (entry.kind === "value" && (entry.value === null || entry.value === undefined));

export const setEntry = (
  table: MemberTable,
  key: string,
  entry: TableEntry
): void => {
  table.entries.set(key, entry);
};

const MAX_ALIAS_DEPTH = 32;

/**
 * Find the table in the parent chain that holds `key`, materializing a lazy
 * entry in place.
 */
export const findEntry = (
  table: MemberTable,
  key: string
): { readonly holder: MemberTable; readonly entry: TableEntry } | undefined => {
  for (
    let current: MemberTable | null = table;
    current !== null;
    current = current.parent
  ) {
    const entry = current.entries.get(key);
    if (entry === undefined) continue;
    if (entry.kind === "lazy") {
      const computed = entry.compute();
      current.entries.set(key, computed);
      return { holder: current, entry: computed };
    }
    return { holder: current, entry };
  }
  return undefined;
};

/**
 * Look up an entry, following aliases. An alias into a table the lookup
 * started below is resolved from the starting table, so overrides win.
 */
export const lookupEntry = (
  table: MemberTable,
  key: string,
  depth = 0
): TableEntry | undefined => {
  const found = findEntry(table, key);
  if (found === undefined) return undefined;
  const entry = found.entry;
  if (entry.kind === "alias" && depth < MAX_ALIAS_DEPTH) {
    const from = derivesFromTable(table, entry.table) ? table : entry.table;
    return lookupEntry(from, entry.key, depth + 1);
  }
  return entry;
};

export const lookupFunction = (
  table: MemberTable,
  key: string
): RuntimeFunction | undefined => {
  const entry = lookupEntry(table, key);
  if (entry?.kind === "function") return entry.fn;
  if (entry?.kind === "value" && isRuntimeFunction(entry.value)) {
    return entry.value;
  }
  return undefined;
};

/** Look up the first key that resolves to a function. */
export const lookupFunctionByKeys = (
  table: MemberTable,
  keys: readonly string[]
): RuntimeFunction | undefined => {
  for (const key of keys) {
    const fn = lookupFunction(table, key);
    if (fn) return fn;
  }
  return undefined;
};

/** The table and its ancestors, nearest first. */
export const tableChain = (table: MemberTable): readonly MemberTable[] => {
  const chain: MemberTable[] = [];
  for (
    let current: MemberTable | null = table;
    current !== null;
    current = current.parent
  ) {
    chain.push(current);
  }
  return chain;
};

export const derivesFromTable = (
  table: MemberTable,
  ancestor: MemberTable
): boolean => tableChain(table).includes(ancestor);
