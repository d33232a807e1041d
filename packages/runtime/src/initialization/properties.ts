/**
 * Property accessors
 *
 * A declared property becomes an accessor entry built from the `get_` and
 * `set_` methods in force on the table. Explicit interface properties
 * (`IShape.Area`) are keyed by the escaped interface name followed by `_`.
 */

import { lookupFunction, setEntry } from "../model/member-table.js";
import type { MemberTable, TypeDescriptor } from "../model/types.js";
import { escapeName, getLocalName, getParentName } from "../naming/names.js";

const makeProperty = (
  table: MemberTable,
  name: string,
  interfacePrefix: string
): void => {
  const prefix = interfacePrefix === "" ? "" : `${escapeName(interfacePrefix)}_`;
  setEntry(table, `${prefix}${name}`, {
    kind: "accessor",
    get: lookupFunction(table, `${prefix}get_${name}`) ?? null,
    set: lookupFunction(table, `${prefix}set_${name}`) ?? null,
  });
};

/**
 * Install accessors for every property declared on the type or its bases.
 */
export const instantiateProperties = (type: TypeDescriptor): void => {
  const publicInterface = type.publicInterface;

  for (
    let current: TypeDescriptor | null = type;
    current !== null;
    current = current.baseType
  ) {
    for (const property of current.properties) {
      if (property.isStatic) {
        makeProperty(publicInterface.staticTable, escapeName(property.name), "");
      } else if (publicInterface.instanceTemplate) {
        makeProperty(
          publicInterface.instanceTemplate,
          escapeName(getLocalName(property.name)),
          getParentName(property.name)
        );
      }
    }
  }
};
