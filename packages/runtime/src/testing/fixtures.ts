/**
 * Shared fixtures for runtime tests
 *
 * Every test builds its own runtime around a recording host, so nothing
 * leaks between tests and diagnostics can be asserted on directly.
 */

import type { RuntimeOptions } from "../config/options.js";
import { CORLIB } from "../corlib/lookup.js";
import { makeClass, makeInterface } from "../definitions/make-type.js";
import { TypeModelError } from "../host/errors.js";
import { createRecordingHost, type RecordingHost } from "../host/host.js";
import { declareLoadUnit } from "../identity/load-units.js";
import { getMember, setMember } from "../instances/members.js";
import type { LoadUnit, TypeRuntime } from "../model/types.js";
import type { TypeHandle } from "../registry/name-registry.js";
import { createRuntime, initialize } from "../runtime.js";
import type { DiagnosticCode, DiagnosticSeverity } from "../types/diagnostic.js";

export type TestRuntime = {
  readonly runtime: TypeRuntime;
  readonly host: RecordingHost;
  readonly zoo: LoadUnit;
};

/**
 * A bootstrapped, sealed runtime with an empty `Zoo` load unit.
 */
export const createTestRuntime = (
  options: Omit<RuntimeOptions, "host"> = {}
): TestRuntime => {
  const host = createRecordingHost();
  const runtime = createRuntime({ ...options, host });
  initialize(runtime);
  return { runtime, host, zoo: declareLoadUnit(runtime, "Zoo") };
};

/** The runtime error an action throws. Anything else is rethrown. */
export const captureError = (action: () => unknown): TypeModelError => {
  try {
    action();
  } catch (failure) {
    if (failure instanceof TypeModelError) return failure;
    throw failure;
  }
  throw new Error("Expected the action to throw.");
};

export const diagnosticCodes = (
  runtime: TypeRuntime,
  severity: DiagnosticSeverity
): readonly DiagnosticCode[] =>
  runtime.diagnostics
    .filter((diagnostic) => diagnostic.severity === severity)
    .map((diagnostic) => diagnostic.code);

export type AnimalTypes = {
  readonly named: TypeHandle;
  readonly animal: TypeHandle;
  readonly dog: TypeHandle;
};

/**
 * `Zoo.INamed { GetName() }`, `Zoo.Animal : INamed` with a `Name` field, a
 * one-argument constructor and a `ToString` override, and `Zoo.Dog : Animal`
 * with no members of its own.
 */
export const declareAnimals = ({ runtime, zoo }: TestRuntime): AnimalTypes => {
  const named = makeInterface(runtime, zoo, {
    name: "Zoo.INamed",
    isPublic: true,
    initializer: (builder) => {
      builder.method(
        { isPublic: true },
        "GetName",
        builder.signature(builder.corlibRef(CORLIB.string))
      );
    },
  });

  const animal = makeClass(runtime, zoo, {
    name: "Zoo.Animal",
    isPublic: true,
    interfaces: ["Zoo.INamed"],
    initializer: (builder) => {
      const string = builder.corlibRef(CORLIB.string);
      builder.field({ isPublic: true }, "Name", string);
      builder.method({ isPublic: true }, ".ctor", builder.signature(null, [string]), (self, name) =>
        setMember(runtime, self, "Name", name)
      );
      builder.method(
        { isPublic: true },
        "ToString",
        builder.signature(string),
        (self) => `Animal ${String(getMember(runtime, self, "Name"))}`
      );
      builder.method({ isPublic: true }, "GetName", builder.signature(string), (self) =>
        getMember(runtime, self, "Name")
      );
    },
  });

  const dog = makeClass(runtime, zoo, {
    name: "Zoo.Dog",
    isPublic: true,
    baseType: "Zoo.Animal",
  });

  return { named, animal, dog };
};

/**
 * `Zoo.Box`1<T>` with a `Value: T` field, `Get(): T` and `Set(T)`.
 */
export const declareBox = ({ runtime, zoo }: TestRuntime): TypeHandle =>
  makeClass(runtime, zoo, {
    name: "Zoo.Box`1",
    isPublic: true,
    genericParameters: ["T"],
    initializer: (builder) => {
      const t = builder.genericParameter("T");
      builder.field({ isPublic: true }, "Value", t);
      builder.method({ isPublic: true }, "Get", builder.signature(t), (self) =>
        getMember(runtime, self, "Value")
      );
      builder.method({ isPublic: true }, "Set", builder.signature(null, [t]), (self, value) =>
        setMember(runtime, self, "Value", value)
      );
    },
  });
