/**
 * Name registry and lazy activation
 *
 * A registration installs a deferred binding. The first access runs the
 * constructor thunk exactly once, then the member initializer. Once the
 * binding is sealed, the first unsealing access also runs the activation pass
 * (method groups, interface fixup, assignability) and schedules the binding
 * to be published as a plain value.
 *
 * Slot states: unconstructed -> constructing -> constructed -> initialized,
 * or failed if a thunk throws. Accessing a binding while it is constructing
 * is a recursive construction and fails fast.
 */

import { isTypeModelError, describeError } from "../host/errors.js";
import { fail, warn } from "../host/reporting.js";
import { isPublicInterface } from "../model/guards.js";
import type {
  Binding,
  LoadUnit,
  NamespaceEntry,
  PublicInterface,
  TypeGetter,
  TypeRuntime,
} from "../model/types.js";
import {
  declareParentNamespaces,
  defineEntry,
  resolveName,
  resolvedEntry,
} from "./namespaces.js";

export type Registration = {
  readonly name: string;
  readonly isPublic: boolean;
  readonly creator: () => PublicInterface;
  /** Declares members; runs once, right after the creator. */
  readonly initializer?: ((value: PublicInterface) => void) | null;
  /** Runs on the first unsealing access of a sealed binding. */
  readonly activate?: (value: PublicInterface) => void;
};

export type TypeHandle = {
  readonly name: string;
  readonly exists: () => boolean;
  /** Construct and, when sealed, fully initialize. */
  readonly get: () => PublicInterface;
  readonly getNoInitialize: () => PublicInterface;
};

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

const validateRegistration = (
  runtime: TypeRuntime,
  registration: Registration
): void => {
  const problems: string[] = [];
  if (typeof registration.name !== "string" || registration.name === "") {
    problems.push("a non-empty name");
  }
  if (typeof registration.isPublic !== "boolean") {
    problems.push("a boolean visibility flag");
  }
  if (typeof registration.creator !== "function") {
    problems.push("a constructor thunk");
  }
  if (
    registration.initializer !== undefined &&
    registration.initializer !== null &&
    typeof registration.initializer !== "function"
  ) {
    problems.push("a function initializer");
  }
  if (problems.length > 0) {
    throw fail(
      runtime,
      "TFG1003",
      `Registration of '${String(registration.name)}' requires ${problems.join(" and ")}.`
    );
  }
};

// ═══════════════════════════════════════════════════════════════════════════
// BINDINGS
// ═══════════════════════════════════════════════════════════════════════════

const construct = (
  runtime: TypeRuntime,
  binding: Binding
): PublicInterface => {
  binding.slot = { state: "constructing" };

  const guard = <T>(step: string, action: () => T): T => {
    try {
      return action();
    } catch (failure) {
      binding.slot = { state: "failed", error: failure };
      if (isTypeModelError(failure)) throw failure;
      throw fail(
        runtime,
        "TFG1005",
        `The ${step} of type '${binding.name}' failed: ${describeError(failure)}`,
        { subject: binding.name, cause: failure }
      );
    }
  };

  const value = guard("constructor", () => {
    const created: unknown = binding.creator();
    if (!isPublicInterface(created)) {
      throw fail(
        runtime,
        "TFG1003",
        `The constructor thunk for '${binding.name}' did not produce a type.`,
        { subject: binding.name }
      );
    }
    return created;
  });

  const initializer = binding.initializer;
  if (initializer) {
    guard("initializer", () => initializer(value));
  }

  binding.slot = { state: "constructed", value };
  return value;
};

const publish = (binding: Binding, value: PublicInterface): void => {
  if (binding.loadUnit.typesByName.get(binding.name) === binding.getter) {
    binding.loadUnit.typesByName.set(binding.name, () => value);
  }
};

const createBinding = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  registration: Registration
): Binding => {
  const binding: Binding = {
    name: registration.name,
    loadUnit,
    isPublic: registration.isPublic,
    creator: registration.creator,
    initializer: registration.initializer ?? null,
    sealed: runtime.sealed,
    slot: { state: "unconstructed" },
    getter: (unseal = true) => {
      const slot = binding.slot;
      let value: PublicInterface;
      switch (slot.state) {
        case "constructing":
          throw fail(
            runtime,
            "TFG1001",
            `Recursive construction of type '${binding.name}'.`,
            { subject: binding.name }
          );
        case "failed":
          throw fail(
            runtime,
            "TFG1005",
            `Type '${binding.name}' failed to load: ${describeError(slot.error)}`,
            { subject: binding.name, cause: slot.error }
          );
        case "unconstructed":
          value = construct(runtime, binding);
          break;
        default:
          value = slot.value;
      }

      if (binding.sealed && unseal) {
        binding.sealed = false;
        registration.activate?.(value);
        binding.slot = { state: "initialized", value };
        runtime.options.host.runLater(() => publish(binding, value));
      }
      return value;
    },
  };
  return binding;
};

// ═══════════════════════════════════════════════════════════════════════════
// NAME TABLES
// ═══════════════════════════════════════════════════════════════════════════

const ambiguousGetter =
  (runtime: TypeRuntime, name: string): TypeGetter =>
  () => {
    throw fail(
      runtime,
      "TFG1004",
      `Type '${name}' is defined as public in more than one load unit; name the load unit to resolve it.`,
      { subject: name }
    );
  };

const definePublicName = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  binding: Binding
): void => {
  const name = binding.name;
  const owner = runtime.publicTypeLoadUnits.get(name);
  const alreadyAmbiguous = runtime.publicTypes.has(name) && owner === undefined;

  // Editions of one library share a load unit id and never conflict.
  const conflicts = alreadyAmbiguous || (owner !== undefined && owner.id !== loadUnit.id);
  if (conflicts) {
    runtime.publicTypes.set(name, ambiguousGetter(runtime, name));
    runtime.publicTypeLoadUnits.delete(name);
  } else {
    runtime.publicTypes.set(name, binding.getter);
    runtime.publicTypeLoadUnits.set(name, loadUnit);
  }

  const globalName = resolveName(runtime, runtime.globalNamespace, name, false);
  const entry: NamespaceEntry = conflicts
    ? { kind: "ambiguous", name }
    : { kind: "binding", binding };
  defineEntry(globalName, entry);
};

const findBinding = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  name: string
): Binding | undefined => {
  const entry = resolvedEntry(resolveName(runtime, loadUnit.namespace, name, false));
  return entry?.kind === "binding" ? entry.binding : undefined;
};

/**
 * Register a deferred binding. A second registration of the same name in the
 * same load unit keeps the first one (or throws under
 * `strictDuplicateDefinitions`).
 */
export const registerName = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  registration: Registration
): Binding => {
  validateRegistration(runtime, registration);
  const name = registration.name;

  declareParentNamespaces(runtime, loadUnit, name, registration.isPublic);
  const existing = findBinding(runtime, loadUnit, name);
  if (existing || loadUnit.typesByName.has(name)) {
    const message = `Type '${name}' has already been defined in load unit '${loadUnit.name}'.`;
    if (runtime.options.strictDuplicateDefinitions || !existing) {
      throw fail(runtime, "TFG1002", message, { subject: name });
    }
    warn(runtime, "TFG1002", `${message} The first definition is kept.`, name);
    return existing;
  }

  const binding = createBinding(runtime, loadUnit, registration);
  defineEntry(resolveName(runtime, loadUnit.namespace, name, false), {
    kind: "binding",
    binding,
  });
  loadUnit.typesByName.set(name, binding.getter);
  if (registration.isPublic) {
    definePublicName(runtime, loadUnit, binding);
  }

  runtime.bindings.push(binding);
  return binding;
};

/**
 * Seal every registration made so far. Registrations made afterwards are
 * sealed from the start.
 */
export const sealRegistrations = (runtime: TypeRuntime): void => {
  for (const binding of runtime.bindings) {
    if (binding.slot.state !== "initialized") {
      binding.sealed = true;
    }
  }
  runtime.sealed = true;
};

// ═══════════════════════════════════════════════════════════════════════════
// LOOKUP
// ═══════════════════════════════════════════════════════════════════════════

const entryValue = (
  runtime: TypeRuntime,
  name: string,
  entry: NamespaceEntry | undefined,
  unseal: boolean
): PublicInterface => {
  switch (entry?.kind) {
    case "binding":
      return entry.binding.getter(unseal);
    case "ambiguous":
      return ambiguousGetter(runtime, entry.name)();
    case "external":
      if (entry.external.value) return entry.external.value;
      throw fail(
        runtime,
        "TFG3004",
        `The external type '${name}' has not been implemented.`,
        { subject: name }
      );
    case "namespace":
      throw fail(runtime, "TFG2001", `'${name}' is a namespace, not a type.`, {
        subject: name,
      });
    default:
      throw fail(runtime, "TFG2001", `The name '${name}' is not defined.`, {
        subject: name,
      });
  }
};

/**
 * Resolve a dotted name to a lazily evaluated handle. Missing intermediate
 * namespaces fail immediately; a missing final name fails only when the
 * handle is dereferenced.
 */
export const resolveType = (
  runtime: TypeRuntime,
  name: string,
  loadUnit?: LoadUnit
): TypeHandle => {
  const root = loadUnit ? loadUnit.namespace : runtime.globalNamespace;
  const resolved = resolveName(runtime, root, name, true);
  return {
    name,
    exists: () => resolvedEntry(resolved) !== undefined,
    get: () => entryValue(runtime, name, resolvedEntry(resolved), true),
    getNoInitialize: () =>
      entryValue(runtime, name, resolvedEntry(resolved), false),
  };
};

/**
 * Find a type by full name: the load unit's own types first, then public
 * types of every load unit. Does not initialize.
 */
export const findTypeByName = (
  runtime: TypeRuntime,
  name: string,
  loadUnit?: LoadUnit
): PublicInterface | undefined => {
  const getter =
    loadUnit?.typesByName.get(name) ?? runtime.publicTypes.get(name);
  return getter ? getter(false) : undefined;
};

export const getTypeByName = (
  runtime: TypeRuntime,
  name: string,
  loadUnit?: LoadUnit
): PublicInterface => {
  const found = findTypeByName(runtime, name, loadUnit);
  if (!found) {
    throw fail(runtime, "TFG2001", `Type '${name}' has not been defined.`, {
      subject: name,
    });
  }
  return found;
};

export const bindingState = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  name: string
): Binding["slot"]["state"] | undefined =>
  findBinding(runtime, loadUnit, name)?.slot.state;
