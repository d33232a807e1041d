/**
 * Assignable sets
 *
 * Each type owns the set of identities it may be treated as: itself, every
 * base type and every interface reachable from any of them. Membership in
 * the source's set is the only implementation of "is-a".
 */

import type { TypeDescriptor, TypeRuntime } from "../model/types.js";
import { resolveTypeReference } from "../generics/resolve.js";

const interfacesOf = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): readonly TypeDescriptor[] =>
  type.interfaces.flatMap((ref) => {
    const resolved = resolveTypeReference(runtime, ref, type.loadUnit);
    return resolved.kind === "type" ? [resolved] : [];
  });

/**
 * The types a value of `type` may be treated as, the type itself first.
 */
export const assignableTypesOf = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): readonly TypeDescriptor[] => {
  const seen = new Set<string>();
  const result: TypeDescriptor[] = [];
  const queue: TypeDescriptor[] = [type];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current || seen.has(current.typeId)) continue;
    seen.add(current.typeId);
    result.push(current);

    queue.push(...interfacesOf(runtime, current));
    if (current.baseType) queue.push(current.baseType);
  }
  return result;
};

export const buildAssignableSet = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): ReadonlySet<string> => {
  const result = new Set(assignableTypesOf(runtime, type).map((each) => each.typeId));
  type.assignableTypes = result;
  return result;
};

/**
 * Whether a value of `source` may be treated as `target`. Builds the
 * source's set on demand; the target's set is never needed.
 */
export const isAssignable = (
  runtime: TypeRuntime,
  source: TypeDescriptor,
  target: TypeDescriptor
): boolean => {
  if (target.typeKind === "any" || source === target) return true;
  const set = source.assignableTypes ?? buildAssignableSet(runtime, source);
  return set.has(target.typeId);
};
