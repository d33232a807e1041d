/**
 * Manifest validation
 *
 * Checks the shape of parsed JSON and builds a `Manifest`, collecting every
 * problem rather than stopping at the first.
 */

import { createDiagnostic, type Diagnostic, type DiagnosticCode } from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import type {
  Manifest,
  ManifestEnumMember,
  ManifestField,
  ManifestMethod,
  ManifestProperty,
  ManifestType,
  ManifestTypeKind,
} from "./types.js";

const TYPE_KINDS: readonly ManifestTypeKind[] = [
  "class",
  "struct",
  "interface",
  "static",
  "enum",
  "delegate",
];

type Fields = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is Fields =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isTypeKind = (value: unknown): value is ManifestTypeKind =>
  TYPE_KINDS.some((kind) => kind === value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

type Problems = {
  readonly source: string;
  readonly diagnostics: Diagnostic[];
};

const report = (
  problems: Problems,
  code: DiagnosticCode,
  message: string
): void => {
  problems.diagnostics.push(createDiagnostic(code, "error", message, problems.source));
};

// ═══════════════════════════════════════════════════════════════════════════
// FIELD READERS
// ═══════════════════════════════════════════════════════════════════════════

const readBoolean = (
  problems: Problems,
  record: Fields,
  key: string,
  where: string,
  code: DiagnosticCode
): boolean => {
  const value = record[key];
  if (value === undefined) return false;
  if (typeof value === "boolean") return value;
  report(problems, code, `${where}: '${key}' must be a boolean.`);
  return false;
};

const readStrings = (
  problems: Problems,
  record: Fields,
  key: string,
  where: string,
  code: DiagnosticCode
): readonly string[] => {
  const value = record[key];
  if (value === undefined) return [];
  if (isStringArray(value)) return value;
  report(problems, code, `${where}: '${key}' must be an array of strings.`);
  return [];
};

const readName = (
  problems: Problems,
  record: Fields,
  where: string,
  code: DiagnosticCode
): string | null => {
  const name = record["name"];
  if (typeof name === "string" && name !== "") return name;
  report(problems, code, `${where}: 'name' must be a non-empty string.`);
  return null;
};

/** Each element of an optional array, or nothing when the key is absent. */
const readList = <T>(
  problems: Problems,
  record: Fields,
  key: string,
  where: string,
  readItem: (item: Fields, itemWhere: string) => T | null
): readonly T[] => {
  const value = record[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    report(problems, "TFG9010", `${where}: '${key}' must be an array.`);
    return [];
  }

  const items: T[] = [];
  value.forEach((item: unknown, index) => {
    const itemWhere = `${where}.${key}[${index}]`;
    if (!isRecord(item)) {
      report(problems, "TFG9010", `${itemWhere}: must be an object.`);
      return;
    }
    const parsed = readItem(item, itemWhere);
    if (parsed !== null) items.push(parsed);
  });
  return items;
};

// ═══════════════════════════════════════════════════════════════════════════
// MEMBERS
// ═══════════════════════════════════════════════════════════════════════════

const readField =
  (problems: Problems) =>
  (item: Fields, where: string): ManifestField | null => {
    const name = readName(problems, item, where, "TFG9010");
    const type = item["type"];
    if (typeof type !== "string" || type === "") {
      report(problems, "TFG9010", `${where}: 'type' must be a non-empty string.`);
      return null;
    }
    return name === null
      ? null
      : {
          name,
          type,
          static: readBoolean(problems, item, "static", where, "TFG9010"),
          public: readBoolean(problems, item, "public", where, "TFG9010"),
        };
  };

const readMethod =
  (problems: Problems) =>
  (item: Fields, where: string): ManifestMethod | null => {
    const name = readName(problems, item, where, "TFG9010");
    const returnType = item["returnType"] ?? null;
    if (returnType !== null && typeof returnType !== "string") {
      report(problems, "TFG9010", `${where}: 'returnType' must be a string or null.`);
      return null;
    }
    return name === null
      ? null
      : {
          name,
          returnType,
          parameters: readStrings(problems, item, "parameters", where, "TFG9010"),
          genericParameters: readStrings(problems, item, "genericParameters", where, "TFG9010"),
          static: readBoolean(problems, item, "static", where, "TFG9010"),
          public: readBoolean(problems, item, "public", where, "TFG9010"),
        };
  };

const readProperty =
  (problems: Problems) =>
  (item: Fields, where: string): ManifestProperty | null => {
    const name = readName(problems, item, where, "TFG9010");
    return name === null
      ? null
      : {
          name,
          static: readBoolean(problems, item, "static", where, "TFG9010"),
          public: readBoolean(problems, item, "public", where, "TFG9010"),
        };
  };

const readEnumMember =
  (problems: Problems) =>
  (item: Fields, where: string): ManifestEnumMember | null => {
    const name = readName(problems, item, where, "TFG9010");
    const value = item["value"];
    if (typeof value !== "number" || !Number.isInteger(value)) {
      report(problems, "TFG9011", `${where}: 'value' must be an integer.`);
      return null;
    }
    return name === null ? null : { name, value };
  };

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

const readType = (
  problems: Problems,
  item: unknown,
  index: number
): ManifestType | null => {
  const where = `types[${index}]`;
  if (!isRecord(item)) {
    report(problems, "TFG9007", `${where}: a type declaration must be an object.`);
    return null;
  }

  const name = readName(problems, item, where, "TFG9008");
  const kind = item["kind"];
  if (!isTypeKind(kind)) {
    report(
      problems,
      "TFG9009",
      `${where}: 'kind' must be one of ${TYPE_KINDS.join(", ")}, got ${String(JSON.stringify(kind))}.`
    );
  }

  const baseType = item["baseType"] ?? null;
  if (baseType !== null && typeof baseType !== "string") {
    report(problems, "TFG9008", `${where}: 'baseType' must be a string.`);
  }

  const isPublic = readBoolean(problems, item, "public", where, "TFG9008");
  const genericParameters = readStrings(problems, item, "genericParameters", where, "TFG9008");
  const interfaces = readStrings(problems, item, "interfaces", where, "TFG9008");
  const fields = readList(problems, item, "fields", where, readField(problems));
  const methods = readList(problems, item, "methods", where, readMethod(problems));
  const properties = readList(problems, item, "properties", where, readProperty(problems));
  const members = readList(problems, item, "members", where, readEnumMember(problems));
  const flags = readBoolean(problems, item, "flags", where, "TFG9008");

  if (name === null || !isTypeKind(kind) || (baseType !== null && typeof baseType !== "string")) {
    return null;
  }
  return {
    kind,
    name,
    public: isPublic,
    baseType,
    genericParameters,
    interfaces,
    fields,
    methods,
    properties,
    members,
    flags,
  };
};

/**
 * Validate parsed JSON as a manifest. `source` names the file in
 * diagnostics.
 */
export const parseManifest = (
  value: unknown,
  source = "<manifest>"
): Result<Manifest, readonly Diagnostic[]> => {
  const problems: Problems = { source, diagnostics: [] };

  if (!isRecord(value)) {
    report(problems, "TFG9004", "A manifest must be a JSON object.");
    return error(problems.diagnostics);
  }

  const loadUnit = value["loadUnit"];
  if (typeof loadUnit !== "string" || loadUnit.trim() === "") {
    report(problems, "TFG9005", "'loadUnit' must be a non-empty string.");
  }

  const rawTypes = value["types"];
  if (!Array.isArray(rawTypes)) {
    report(problems, "TFG9006", "'types' must be an array.");
    return error(problems.diagnostics);
  }

  const types = rawTypes.flatMap((item: unknown, index) => {
    const parsed = readType(problems, item, index);
    return parsed ? [parsed] : [];
  });

  if (problems.diagnostics.length > 0 || typeof loadUnit !== "string") {
    return error(problems.diagnostics);
  }
  return ok({ loadUnit, types });
};
