/**
 * Assembly-qualified type names
 *
 * `System.Collections.Generic.Dictionary`2[[System.String, Core],[Zoo.Dog, Zoo]][], Core`
 * names a generic type, its arguments (each optionally qualified with its
 * own load unit), array suffixes and finally the load unit of the whole.
 */

import { closeType } from "../generics/closure.js";
import { fail } from "../host/reporting.js";
import { getLoadUnit } from "../identity/load-units.js";
import { arrayTypeOf } from "../definitions/arrays.js";
import type { LoadUnit, TypeDescriptor, TypeRuntime } from "../model/types.js";
import { findTypeByName } from "../registry/name-registry.js";

export type ParsedTypeName = {
  readonly name: string;
  readonly loadUnit: string | null;
  readonly genericArguments: readonly ParsedTypeName[];
  /** Number of `[]` suffixes. */
  readonly arrayRank: number;
};

type Cursor = {
  readonly text: string;
  position: number;
};

const peek = (cursor: Cursor, offset = 0): string =>
  cursor.text.charAt(cursor.position + offset);

const expect = (cursor: Cursor, char: string): boolean => {
  if (peek(cursor) !== char) return false;
  cursor.position++;
  return true;
};

const readUntil = (cursor: Cursor, stops: string): string => {
  const start = cursor.position;
  while (cursor.position < cursor.text.length && !stops.includes(peek(cursor))) {
    cursor.position++;
  }
  return cursor.text.slice(start, cursor.position).trim();
};

/**
 * Parse one type name. Inside generic arguments the load unit runs to the
 * closing bracket; at the top level, to the end of the text.
 */
const parseType = (cursor: Cursor, nested: boolean): ParsedTypeName | null => {
  const name = readUntil(cursor, "[],");
  if (name === "") return null;

  const genericArguments: ParsedTypeName[] = [];
  if (peek(cursor) === "[" && peek(cursor, 1) === "[") {
    cursor.position++;
    do {
      if (!expect(cursor, "[")) return null;
      const argument = parseType(cursor, true);
      if (!argument || !expect(cursor, "]")) return null;
      genericArguments.push(argument);
    } while (expect(cursor, ","));
    if (!expect(cursor, "]")) return null;
  }

  let arrayRank = 0;
  while (peek(cursor) === "[" && peek(cursor, 1) === "]") {
    cursor.position += 2;
    arrayRank++;
  }

  let loadUnit: string | null = null;
  if (expect(cursor, ",")) {
    loadUnit = nested ? readUntil(cursor, "]") : cursor.text.slice(cursor.position).trim();
    if (!nested) cursor.position = cursor.text.length;
    if (loadUnit === "") return null;
  }

  return { name, loadUnit, genericArguments, arrayRank };
};

/** Parse a (possibly assembly-qualified) type name; null when malformed. */
export const parseTypeName = (text: string): ParsedTypeName | null => {
  const cursor: Cursor = { text, position: 0 };
  const parsed = parseType(cursor, false);
  return parsed && cursor.position === text.length ? parsed : null;
};

const resolveParsed = (
  runtime: TypeRuntime,
  parsed: ParsedTypeName,
  context: LoadUnit | undefined
): TypeDescriptor | null => {
  const loadUnit =
    parsed.loadUnit === null ? context : getLoadUnit(runtime, parsed.loadUnit, true);
  const found = findTypeByName(runtime, parsed.name, loadUnit);
  if (!found) return null;

  let type = found.descriptor;
  if (parsed.genericArguments.length > 0) {
    const args: TypeDescriptor[] = [];
    for (const argument of parsed.genericArguments) {
      const resolved = resolveParsed(runtime, argument, context);
      if (!resolved) return null;
      args.push(resolved);
    }
    type = closeType(runtime, type, args);
  }

  for (let rank = 0; rank < parsed.arrayRank; rank++) {
    type = arrayTypeOf(runtime, type);
  }
  return type;
};

const parseOrFail = (runtime: TypeRuntime, name: string): ParsedTypeName => {
  const parsed = parseTypeName(name);
  if (parsed) return parsed;
  throw fail(runtime, "TFG2001", `'${name}' is not a well-formed type name.`, {
    subject: name,
  });
};

/**
 * Look a type up by name, starting in `loadUnit`. Returns null when any
 * part of the name is not defined.
 */
export const getTypeFromLoadUnit = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  name: string
): TypeDescriptor | null => resolveParsed(runtime, parseOrFail(runtime, name), loadUnit);

/**
 * Look a type up by assembly-qualified name. Names without a load unit are
 * searched among public types.
 */
export const getTypeByQualifiedName = (
  runtime: TypeRuntime,
  name: string
): TypeDescriptor | null => resolveParsed(runtime, parseOrFail(runtime, name), undefined);
