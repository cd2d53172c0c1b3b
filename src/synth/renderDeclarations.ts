import type { NodeKindRef } from "../schema/types.js";
import type { SynthesizedField, TypeSet } from "./types.js";

export interface RenderDeclarationsOptions {
  /** Module the node base classes are imported from. */
  readonly runtimeModule?: string;
}

const DEFAULT_RUNTIME_MODULE = "typed-syntax-provider";
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Render TypeScript declarations for a synthesized type set: an interface per
 * leaf and record kind, a closed union alias per union kind, and `AnyNode`.
 */
export function renderDeclarations(
  typeSet: TypeSet,
  options: RenderDeclarationsOptions = {}
): string {
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  const className = (kind: string): string => typeSet.classNames.get(kind) ?? kind;
  const typeOf = (ref: NodeKindRef): string =>
    ref.named
      ? className(ref.name)
      : `TypedToken & { readonly type: ${JSON.stringify(ref.name)} }`;
  const alternatives = (refs: readonly NodeKindRef[]): string =>
    unique(refs.map(typeOf)).join(" | ");

  const extras = typeSet.schema.extras.map((name) => ({ name, named: true }));
  const blocks: string[] = [
    `import type { TypedBranch, TypedLeaf, TypedToken } from ${JSON.stringify(runtimeModule)};`,
  ];
  const concrete: string[] = [];

  for (const definition of typeSet.schema.kinds.values()) {
    const name = className(definition.name);
    const tag = JSON.stringify(definition.name);
    switch (definition.shape) {
      case "leaf":
        concrete.push(name);
        blocks.push(`export interface ${name} extends TypedLeaf {\n  readonly type: ${tag};\n}`);
        break;
      case "record": {
        concrete.push(name);
        const type = typeSet.types.get(definition.name);
        const fields = type?.shape === "record" ? type.fields : [];
        const fieldLines = fields.map(
          (field) => `  readonly ${propertyKey(field.name)}: ${fieldType(field, alternatives)};`
        );
        blocks.push(`export type ${name}Fields = {\n${fieldLines.join("\n")}${fieldLines.length ? "\n" : ""}};`);
        const childRefs = [...(definition.children?.allowedKinds ?? []), ...extras];
        blocks.push(
          [
            `export interface ${name} extends TypedBranch {`,
            `  readonly type: ${tag};`,
            `  readonly fields: ${name}Fields;`,
            `  readonly children: readonly ${sequenceElement(alternatives(childRefs))}[];`,
            "}",
          ].join("\n")
        );
        break;
      }
      case "union":
        blocks.push(`export type ${name} = ${alternatives(definition.alternatives)};`);
        break;
    }
  }

  blocks.push(`export type AnyNode = ${concrete.length ? concrete.join(" | ") : "never"};`);
  return `${blocks.join("\n\n")}\n`;
}

function fieldType(
  field: SynthesizedField,
  alternatives: (refs: readonly NodeKindRef[]) => string
): string {
  const type = alternatives(
    field.alternatives.map((slot) => ({ name: slot.kind, named: slot.named }))
  );
  switch (field.multiplicity) {
    case "one":
      return type;
    case "optional":
      return `${type} | null`;
    case "many":
      return `readonly ${sequenceElement(type)}[]`;
  }
}

function sequenceElement(type: string): string {
  return IDENTIFIER.test(type) ? type : `(${type})`;
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
