/**
 * Type manifests: JSON descriptions of declaration requests
 *
 * Type references are type-name strings (`System.Int32`,
 * `Box`1[[System.String]]`, `T` for a generic parameter of the declaring
 * type, `!!0` for a method's first generic parameter).
 */

export type ManifestTypeKind =
  | "class"
  | "struct"
  | "interface"
  | "static"
  | "enum"
  | "delegate";

export type ManifestField = {
  readonly name: string;
  readonly type: string;
  readonly static: boolean;
  readonly public: boolean;
};

export type ManifestMethod = {
  readonly name: string;
  /** null for void. */
  readonly returnType: string | null;
  readonly parameters: readonly string[];
  readonly genericParameters: readonly string[];
  readonly static: boolean;
  readonly public: boolean;
};

export type ManifestProperty = {
  readonly name: string;
  readonly static: boolean;
  readonly public: boolean;
};

export type ManifestEnumMember = {
  readonly name: string;
  readonly value: number;
};

export type ManifestType = {
  readonly kind: ManifestTypeKind;
  readonly name: string;
  readonly public: boolean;
  readonly baseType: string | null;
  readonly genericParameters: readonly string[];
  readonly interfaces: readonly string[];
  readonly fields: readonly ManifestField[];
  readonly methods: readonly ManifestMethod[];
  readonly properties: readonly ManifestProperty[];
  readonly members: readonly ManifestEnumMember[];
  readonly flags: boolean;
};

export type Manifest = {
  readonly loadUnit: string;
  readonly types: readonly ManifestType[];
};
