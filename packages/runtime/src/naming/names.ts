/**
 * Name escaping and splitting
 *
 * Declared names carry characters that cannot appear in a member key:
 * generic arity markers (`List`1`), nested type separators (`Outer+Inner`),
 * compiler-generated names (`<Main>b__0`) and namespace dots. Escaped names
 * are the keys used in namespaces, member tables and identity strings.
 */

const SEPARATORS = /[./+]/g;

const escapeAngleGroups = (name: string): string =>
  name.replace(
    /<([^<>]*)>/g,
    (_match, inner: string) => `$l${inner.replace(SEPARATORS, "_")}$g`
  );

export const escapeName = (name: string): string =>
  escapeAngleGroups(name)
    .replace(/`/g, () => "$b")
    .replace(SEPARATORS, "_")
    .replace(/</g, () => "$l")
    .replace(/>/g, () => "$g");

/**
 * Split a dotted name into its segments. Dots inside `<...>` groups do not
 * split.
 */
export const splitName = (name: string): readonly string[] => {
  if (!name.includes("<")) {
    return name.split(".");
  }

  const segments: string[] = [];
  let current = "";
  let depth = 0;
  for (const char of name) {
    if (char === "<") depth++;
    if (char === ">") depth = Math.max(0, depth - 1);
    if (char === "." && depth === 0) {
      segments.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  segments.push(current);
  return segments;
};

export const getLocalName = (name: string): string => {
  const segments = splitName(name);
  return segments[segments.length - 1] ?? name;
};

export const getParentName = (name: string): string => {
  const segments = splitName(name);
  return segments.slice(0, -1).join(".");
};

/**
 * Key for a name declared inside an owner, e.g. a generic parameter `T`
 * declared by `Box`1`.
 */
export const qualifiedKey = (owner: string, name: string): string =>
  `${escapeName(owner)}$${escapeName(name)}`;

/**
 * Key for an explicit interface implementation: `IComparable.CompareTo`
 * becomes `IComparable_CompareTo`.
 */
export const interfaceQualifiedKey = (
  interfaceName: string,
  memberKey: string
): string => escapeName(`${getLocalName(interfaceName)}.${memberKey}`);

const SPECIAL_NAMES: ReadonlySet<string> = new Set([
  ".ctor",
  ".cctor",
  "_ctor",
  "_cctor",
]);

export const isSpecialName = (name: string): boolean => SPECIAL_NAMES.has(name);

/**
 * Static constructor keys, in the order they run. Types split across partial
 * declarations may carry more than one.
 */
export const STATIC_CONSTRUCTOR_KEYS: readonly string[] = [
  "_cctor",
  "_cctor2",
  "_cctor3",
  "_cctor4",
  "_cctor5",
];
