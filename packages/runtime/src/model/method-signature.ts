/**
 * Method signatures
 *
 * A signature is content-addressed: its hash is built from the identities
 * of its argument and return types and is cached on the signature. The hash
 * doubles as the dispatch key suffix (`Name` + hash) and as the uniqueness
 * key that member hiding compares.
 */

import type {
  LoadUnit,
  MethodSignature,
  TypeReference,
  TypeRuntime,
} from "./types.js";
import { describeTypeReference, hashTypeArgumentArray } from "./type-refs.js";

export const createSignature = (
  context: LoadUnit,
  returnType: TypeReference | null,
  argumentTypes: readonly TypeReference[],
  genericArgumentNames: readonly string[] = []
): MethodSignature => ({
  kind: "signature",
  context,
  returnType,
  argumentTypes,
  genericArgumentNames,
  hash: null,
});

export const genericSuffix = (signature: MethodSignature): string =>
  signature.genericArgumentNames.length > 0
    ? `\`${signature.genericArgumentNames.length}`
    : "";

const computeHash = (runtime: TypeRuntime, signature: MethodSignature): string => {
  const args = hashTypeArgumentArray(
    runtime,
    signature.argumentTypes,
    signature.context
  );
  const result =
    signature.returnType === null
      ? "void"
      : hashTypeArgumentArray(runtime, [signature.returnType], signature.context);
  return `${genericSuffix(signature)}$${args}=${result}`;
};

export const signatureHash = (
  runtime: TypeRuntime,
  signature: MethodSignature
): string => {
  if (signature.hash === null) {
    signature.hash = computeHash(runtime, signature);
  }
  return signature.hash;
};

/** Member-table key of a method: its escaped name followed by the hash. */
export const signatureKey = (
  runtime: TypeRuntime,
  signature: MethodSignature,
  escapedName: string
): string => `${escapedName}${signatureHash(runtime, signature)}`;

const describeArgument = (
  signature: MethodSignature,
  ref: TypeReference
): string => {
  if (typeof ref !== "string" && ref.kind === "positionalParameter") {
    return signature.genericArgumentNames[ref.index] ?? `!!${ref.index}`;
  }
  return describeTypeReference(ref);
};

/**
 * Readable form, e.g. `System.String ToString()` or `T Get<T> (System.Int32)`.
 */
export const signatureToString = (
  signature: MethodSignature,
  name?: string
): string => {
  const returnType =
    signature.returnType === null
      ? "void"
      : describeArgument(signature, signature.returnType);
  const generics =
    signature.genericArgumentNames.length > 0
      ? `<${signature.genericArgumentNames.join(", ")}> `
      : "";
  const args = signature.argumentTypes
    .map((arg) => describeArgument(signature, arg))
    .join(", ");
  return `${returnType} ${name ?? ""}${generics}(${args})`;
};

/**
 * Shared signature instances, so repeated declarations of the same shape in
 * one load unit reuse the cached hash.
 */
export const getCachedSignature = (
  runtime: TypeRuntime,
  context: LoadUnit,
  returnType: TypeReference | null,
  argumentTypes: readonly TypeReference[],
  genericArgumentNames: readonly string[] = []
): MethodSignature => {
  const candidate = createSignature(
    context,
    returnType,
    argumentTypes,
    genericArgumentNames
  );
  const cacheKey = `${context.id}:${signatureHash(runtime, candidate)}`;
  const cached = runtime.signatureCache.get(cacheKey);
  if (cached) return cached;
  runtime.signatureCache.set(cacheKey, candidate);
  return candidate;
};
