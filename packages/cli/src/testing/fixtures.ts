/**
 * Shared fixtures for CLI tests: manifests written to a temporary project
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ResolvedConfig } from "../types.js";

export const ZOO_MANIFEST = {
  loadUnit: "Zoo",
  types: [
    {
      kind: "interface",
      name: "Zoo.INamed",
      public: true,
      methods: [{ name: "GetName", returnType: "System.String", public: true }],
    },
    {
      kind: "class",
      name: "Zoo.Animal",
      public: true,
      interfaces: ["Zoo.INamed"],
      fields: [{ name: "Name", type: "System.String", public: true }],
      methods: [
        { name: ".ctor", parameters: ["System.String"], public: true },
        { name: "GetName", returnType: "System.String", public: true },
      ],
    },
    {
      kind: "class",
      name: "Zoo.Box`1",
      public: true,
      genericParameters: ["T"],
      fields: [{ name: "Value", type: "T", public: true }],
    },
  ],
};

/** A class whose base type was never declared. */
export const STRAY_MANIFEST = {
  loadUnit: "Strays",
  types: [{ kind: "class", name: "Strays.Stray", public: true, baseType: "Strays.Missing" }],
};

export type TempProject = {
  readonly root: string;
  /** Write a JSON file under the project and return its path. */
  readonly write: (name: string, content: unknown) => string;
  readonly dispose: () => void;
};

export const createTempProject = (): TempProject => {
  const root = mkdtempSync(join(tmpdir(), "typeforge-cli-"));
  return {
    root,
    write: (name, content) => {
      const path = join(root, name);
      writeFileSync(path, typeof content === "string" ? content : JSON.stringify(content));
      return path;
    },
    dispose: () => {
      rmSync(root, { recursive: true, force: true });
    },
  };
};

export const testConfig = (
  manifests: readonly string[],
  overrides: Partial<ResolvedConfig> = {}
): ResolvedConfig => ({
  projectRoot: "/project",
  manifests,
  runtimeOptions: {},
  logLevel: "silent",
  typeName: undefined,
  json: false,
  verbose: false,
  quiet: false,
  ...overrides,
});
