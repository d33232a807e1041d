/**
 * Member hiding
 *
 * Of several methods sharing a signature hash (after substituting the
 * inspected type's generic arguments), only one stays visible: a real
 * implementation beats an external placeholder, and among equals the most
 * derived declaration wins.
 */

import { resolveGenericMethodSignature } from "../generics/resolve.js";
import { signatureHash } from "../model/method-signature.js";
import type {
  MemberInfo,
  MethodRecord,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";

type HidingEntry = {
  readonly member: MemberInfo;
  readonly index: number;
  readonly hash: string;
  readonly isPlaceholder: boolean;
  readonly depth: number;
};

export const effectiveSignatureHash = (
  runtime: TypeRuntime,
  record: MethodRecord,
  type: TypeDescriptor
): string => {
  const signature =
    resolveGenericMethodSignature(runtime, record.data.signature, type) ??
    record.data.signature;
  return signatureHash(runtime, signature);
};

const compareEntries = (a: HidingEntry, b: HidingEntry): number => {
  if (a.hash !== b.hash) return a.hash < b.hash ? -1 : 1;
  if (a.isPlaceholder !== b.isPlaceholder) return a.isPlaceholder ? 1 : -1;
  if (a.depth !== b.depth) return b.depth - a.depth;
  return a.index - b.index;
};

/**
 * Drop hidden methods. Survivors keep their original relative order. Members
 * that are not methods pass through untouched.
 */
export const applyMemberHiding = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  members: readonly MemberInfo[]
): readonly MemberInfo[] => {
  const entries: HidingEntry[] = [];
  members.forEach((member, index) => {
    const record = member.record;
    if (record.kind !== "method" && record.kind !== "constructor") return;
    entries.push({
      member,
      index,
      hash: effectiveSignatureHash(runtime, record, type),
      isPlaceholder: record.data.isPlaceholder,
      depth: member.declaringType.inheritanceDepth,
    });
  });

  const visible = new Set<number>();
  let previousHash: string | null = null;
  for (const entry of [...entries].sort(compareEntries)) {
    if (entry.hash === previousHash) continue;
    previousHash = entry.hash;
    visible.add(entry.index);
  }

  const methodIndices = new Set(entries.map((entry) => entry.index));
  return members.filter(
    (_member, index) => !methodIndices.has(index) || visible.has(index)
  );
};
