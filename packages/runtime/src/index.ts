/**
 * Typeforge Runtime - type registry, generic closure, overload dispatch,
 * interface conformance, assignability and reflection
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";
export * from "./types/result.js";

export * from "./host/errors.js";
export * from "./host/host.js";
export * from "./config/options.js";

export * from "./model/types.js";
export * from "./model/guards.js";
export {
  createFunction,
  functionFromImpl,
  bindFunction,
  isRuntimeFunction,
  lookupEntry,
  lookupFunction,
} from "./model/member-table.js";
export {
  createSignature,
  getCachedSignature,
  signatureHash,
  signatureKey,
  signatureToString,
} from "./model/method-signature.js";
export {
  createGenericParameter,
  createPositionalParameter,
  createTypeRef,
  describeTypeReference,
  hashTypeArgumentArray,
  typeRefTypeId,
} from "./model/type-refs.js";
export { baseChain } from "./model/descriptors.js";

export * from "./naming/names.js";
export { declareLoadUnit, getLoadUnit } from "./identity/load-units.js";
export { assignTypeId } from "./identity/type-ids.js";
export { declareNamespace } from "./registry/namespaces.js";
export {
  type Registration,
  type TypeHandle,
  registerName,
  sealRegistrations,
  resolveType,
  findTypeByName,
  getTypeByName,
} from "./registry/name-registry.js";

export {
  typeRefGet,
  resolveTypeReference,
  resolveSignature,
  resolveGenericMethodSignature,
  type ResolvedSignature,
} from "./generics/resolve.js";
export { closeType, closeGeneric, closeGenericNoInitialize } from "./generics/closure.js";

export { type Overload, makeMethodGroup } from "./dispatch/method-groups.js";
export { applyMemberHiding } from "./dispatch/member-hiding.js";
export {
  assignableTypesOf,
  buildAssignableSet,
  isAssignable,
} from "./assignability/assignable-set.js";
export * from "./assignability/type-checks.js";
export { fixupInterfaces } from "./interfaces/conformance.js";
export { initializeType } from "./initialization/initialize-type.js";
export * from "./reflection/reflection-cache.js";

export * from "./builder/type-builder.js";
export * from "./definitions/make-type.js";
export * from "./definitions/enums.js";
export * from "./definitions/delegates.js";
export * from "./definitions/numeric.js";
export * from "./definitions/external-types.js";
export * from "./definitions/arrays.js";
export * from "./definitions/implement-externals.js";

export { CORLIB, findCorlibType, runtimeTypeOf } from "./corlib/lookup.js";
export { bootstrapCorlib } from "./corlib/bootstrap.js";

export * from "./instances/construct.js";
export * from "./instances/default-values.js";
export * from "./instances/members.js";
export * from "./instances/calls.js";
export { createEnumValue, enumValueToString } from "./instances/enum-values.js";

export * from "./lookup/type-names.js";

export * from "./manifest/types.js";
export { parseManifest } from "./manifest/validate.js";
export { loadManifestFile } from "./manifest/loader.js";
export * from "./manifest/register.js";

export * from "./runtime.js";
