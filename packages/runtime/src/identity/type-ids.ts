/**
 * Type identities
 *
 * An identity is interned per (load unit, escaped name) the first time it is
 * asked for and never changes. A name made public by one load unit gets that
 * unit's identity no matter which unit asks.
 */

import { escapeName, qualifiedKey } from "../naming/names.js";
import type { LoadUnit, TypeRuntime } from "../model/types.js";

const nextId = (runtime: TypeRuntime): string => String(++runtime.nextTypeId);

export const assignTypeId = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  typeName: string
): string => {
  const owner = runtime.publicTypeLoadUnits.get(typeName) ?? loadUnit;
  const key = `${owner.id}$${escapeName(typeName)}`;

  const existing = runtime.assignedTypeIds.get(key);
  if (existing !== undefined) return existing;

  const id = nextId(runtime);
  runtime.assignedTypeIds.set(key, id);
  return id;
};

export const genericParameterTypeId = (
  runtime: TypeRuntime,
  owner: string,
  name: string
): string => {
  const key = qualifiedKey(owner, name);
  const existing = runtime.genericParameterIds.get(key);
  if (existing !== undefined) return existing;

  const id = nextId(runtime);
  runtime.genericParameterIds.set(key, id);
  return id;
};

export const positionalParameterTypeId = (index: number): string => `!!${index}`;

/**
 * Identity of a closed instantiation: the open identity followed by the
 * argument identities.
 */
export const closedTypeId = (
  openTypeId: string,
  argumentIds: readonly string[]
): string => `${openTypeId}[${argumentIds.join(",")}]`;
