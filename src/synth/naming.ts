export type AsClassName = (kind: string) => string;

// Globals and names the rendered declarations import or declare themselves.
const RESERVED_NAMES = new Set([
  "AnyNode",
  "Array",
  "BigInt",
  "Boolean",
  "Date",
  "Error",
  "Function",
  "Map",
  "Math",
  "Number",
  "Object",
  "Promise",
  "Record",
  "RegExp",
  "Set",
  "String",
  "Symbol",
  "TypedBranch",
  "TypedLeaf",
  "TypedToken",
]);

/**
 * `binary_expression` → `BinaryExpression`. Names that would shadow a global
 * take a `Node` suffix: `number` → `NumberNode`, `ERROR` → `ErrorNode`.
 */
export function snakeToPascal(kind: string): string {
  const name = kind
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join("");
  return RESERVED_NAMES.has(name) ? `${name}Node` : name;
}
