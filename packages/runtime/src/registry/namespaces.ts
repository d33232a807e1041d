/**
 * Namespace trees
 *
 * Every load unit owns a private tree whose root falls back to the global
 * tree; public types are also installed in the global tree.
 */

import { fail } from "../host/reporting.js";
import { escapeName, getParentName, splitName } from "../naming/names.js";
import type {
  LoadUnit,
  NamespaceEntry,
  NamespaceNode,
  TypeRuntime,
} from "../model/types.js";

export const createNamespaceNode = (
  fullName: string,
  fallback: NamespaceNode | null
): NamespaceNode => ({ fullName, entries: new Map(), fallback, sealed: false });

const lookupChild = (
  node: NamespaceNode,
  key: string,
  allowInheritance: boolean
): NamespaceEntry | undefined => {
  const own = node.entries.get(key);
  if (own !== undefined || !allowInheritance || node.fallback === null) {
    return own;
  }
  return lookupChild(node.fallback, key, true);
};

export type ResolvedName = {
  readonly parent: NamespaceNode;
  readonly key: string;
  readonly fullName: string;
  readonly allowInheritance: boolean;
};

/**
 * Walk every segment but the last. A missing segment is fatal.
 */
export const resolveName = (
  runtime: TypeRuntime,
  root: NamespaceNode,
  name: string,
  allowInheritance: boolean
): ResolvedName => {
  const segments = splitName(name);
  let current = root;

  for (const segment of segments.slice(0, -1)) {
    const key = escapeName(segment);
    const entry = lookupChild(current, key, allowInheritance);
    if (entry?.kind !== "namespace") {
      throw fail(
        runtime,
        "TFG2001",
        `Could not find the name '${key}' in the namespace '${current.fullName || "<global>"}'.`,
        { subject: name }
      );
    }
    current = entry.node;
  }

  const localName = segments[segments.length - 1] ?? name;
  return {
    parent: current,
    key: escapeName(localName),
    fullName: name,
    allowInheritance,
  };
};

export const resolvedEntry = (
  resolved: ResolvedName
): NamespaceEntry | undefined =>
  lookupChild(resolved.parent, resolved.key, resolved.allowInheritance);

export const defineEntry = (
  resolved: ResolvedName,
  entry: NamespaceEntry
): void => {
  resolved.parent.entries.set(resolved.key, entry);
};

/**
 * Create every namespace along `name` under `root`, reusing existing ones.
 */
export const ensureNamespace = (
  root: NamespaceNode,
  name: string,
  sealed = false
): NamespaceNode => {
  if (name === "") return root;

  let current = root;
  let path = "";
  for (const segment of splitName(name)) {
    path = path ? `${path}.${segment}` : segment;
    const key = escapeName(segment);
    const existing = current.entries.get(key);
    if (existing?.kind === "namespace") {
      current = existing.node;
      continue;
    }
    const node = createNamespaceNode(path, null);
    current.entries.set(key, { kind: "namespace", node });
    current = node;
  }
  if (sealed) current.sealed = true;
  return current;
};

/**
 * Declare a namespace in a load unit's private tree and in the global tree.
 */
export const declareNamespace = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  name: string,
  sealed = false
): NamespaceNode => {
  ensureNamespace(runtime.globalNamespace, name, sealed);
  return ensureNamespace(loadUnit.namespace, name, sealed);
};

export const declareParentNamespaces = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  typeName: string,
  isPublic: boolean
): void => {
  const parent = getParentName(typeName);
  if (parent === "") return;
  ensureNamespace(loadUnit.namespace, parent);
  if (isPublic) ensureNamespace(runtime.globalNamespace, parent);
};
