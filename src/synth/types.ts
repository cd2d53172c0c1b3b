import {
  ConversionError,
  ConversionErrorCode,
  SynthesisError,
} from "../errors.js";
import type { SourceRange } from "../parser/untypedTree.js";
import type { GrammarSchema, Multiplicity } from "../schema/types.js";
import {
  TypedBranch,
  TypedLeaf,
  TypedToken,
  isFieldSequence,
  type FieldValue,
  type TypedNode,
} from "./typedNode.js";

/** Concrete kinds a slot admits, split by named and anonymous. */
export interface KindSet {
  readonly named: ReadonlySet<string>;
  readonly anonymous: ReadonlySet<string>;
}

export function admits(set: KindSet, type: string, named: boolean): boolean {
  return named ? set.named.has(type) : set.anonymous.has(type);
}

export function admitsNode(set: KindSet, node: TypedNode): boolean {
  return admits(set, node.type, node.shape !== "token");
}

/**
 * Forward-declared reference to a synthesized type. Slots are allocated for
 * every kind before any type is built and filled once all types exist.
 */
export class TypeSlot {
  readonly kind: string;
  readonly named: boolean;
  private resolved?: SynthesizedType;

  constructor(kind: string, named: boolean) {
    this.kind = kind;
    this.named = named;
  }

  get type(): SynthesizedType {
    if (!this.resolved) {
      throw new SynthesisError(`Type for "${this.kind}" has not been synthesized`, this.kind);
    }
    return this.resolved;
  }

  fill(type: SynthesizedType): void {
    if (this.resolved) {
      throw new SynthesisError(`Type for "${this.kind}" was synthesized twice`, this.kind);
    }
    this.resolved = type;
  }
}

export interface SynthesizedField {
  readonly name: string;
  readonly multiplicity: Multiplicity;
  /** Declared alternatives, unions left unexpanded. */
  readonly alternatives: readonly TypeSlot[];
  /** Concrete kinds admitted, with union alternatives expanded. */
  readonly accepts: KindSet;
}

export type SynthesizedType = LeafType | RecordType | UnionType | TokenType;

export class TokenType {
  readonly shape = "token";
  readonly kind: string;

  constructor(kind: string) {
    this.kind = kind;
  }

  create(text: string = this.kind, range?: SourceRange): TypedToken {
    return new TypedToken(this.kind, text, range);
  }
}

export interface LeafInit {
  readonly text: string;
  readonly range?: SourceRange;
}

export class LeafType {
  readonly shape = "leaf";
  readonly kind: string;
  readonly className: string;

  constructor(kind: string, className: string) {
    this.kind = kind;
    this.className = className;
  }

  create(init: LeafInit): TypedLeaf {
    return new TypedLeaf(this.kind, init.text, init.range);
  }
}

export interface RecordInit {
  readonly fields?: Readonly<Record<string, FieldValue | undefined>>;
  readonly children?: readonly TypedNode[];
}

export class RecordType {
  readonly shape = "record";
  readonly kind: string;
  readonly className: string;
  readonly fields: readonly SynthesizedField[];
  readonly children: SynthesizedField | undefined;
  /** Kinds admitted as unfielded children of every record. */
  readonly extras: KindSet;
  private readonly fieldsByName: ReadonlyMap<string, SynthesizedField>;

  constructor(
    kind: string,
    className: string,
    fields: readonly SynthesizedField[],
    children: SynthesizedField | undefined,
    extras: KindSet
  ) {
    this.kind = kind;
    this.className = className;
    this.fields = Object.freeze([...fields]);
    this.children = children;
    this.extras = extras;
    this.fieldsByName = new Map(fields.map((field) => [field.name, field]));
  }

  field(name: string): SynthesizedField | undefined {
    return this.fieldsByName.get(name);
  }

  /** Build a branch by hand. The result carries no position data. */
  create(init: RecordInit = {}): TypedBranch {
    const given = init.fields ?? {};
    for (const name of Object.keys(given)) {
      if (!this.fieldsByName.has(name)) {
        throw new ConversionError(`Kind "${this.kind}" has no field "${name}"`, {
          code: ConversionErrorCode.KindMismatch,
          kind: this.kind,
          field: name,
        });
      }
    }

    const values: Record<string, FieldValue> = {};
    for (const field of this.fields) {
      const value = given[field.name];
      const nodes = value === undefined || value === null ? [] : isFieldSequence(value) ? value : [value];
      if (field.multiplicity !== "many" && value !== undefined && value !== null && isFieldSequence(value)) {
        throw arityError(this.kind, field, nodes.length);
      }
      for (const node of nodes) {
        this.requireAdmitted(field, node);
      }
      values[field.name] = settleField(this.kind, field, nodes);
    }

    const children = init.children ?? [];
    let counted = 0;
    for (const child of children) {
      if (this.children && admitsNode(this.children.accepts, child)) {
        counted += 1;
      } else if (!admitsNode(this.extras, child)) {
        throw new ConversionError(`Kind "${this.kind}" does not admit child "${child.type}"`, {
          code: ConversionErrorCode.KindMismatch,
          kind: child.type,
          range: child.range,
          field: "children",
          parentKind: this.kind,
        });
      }
    }
    if (this.children) {
      checkArity(this.kind, this.children, counted);
    }

    return new TypedBranch(this.kind, values, children);
  }

  private requireAdmitted(field: SynthesizedField, node: TypedNode): void {
    if (!admitsNode(field.accepts, node)) {
      throw new ConversionError(
        `Field "${field.name}" of "${this.kind}" does not admit "${node.type}"`,
        {
          code: ConversionErrorCode.KindMismatch,
          kind: node.type,
          range: node.range,
          field: field.name,
          parentKind: this.kind,
        }
      );
    }
  }
}

export class UnionType {
  readonly shape = "union";
  readonly kind: string;
  readonly className: string;
  readonly variants: readonly TypeSlot[];
  /** Declared alternatives; closed, with no fallback variant. */
  readonly variantTags: ReadonlySet<string>;
  /** Every kind a node of this union may carry, nested unions expanded. */
  readonly concreteKinds: KindSet;

  constructor(kind: string, className: string, variants: readonly TypeSlot[], concreteKinds: KindSet) {
    this.kind = kind;
    this.className = className;
    this.variants = Object.freeze([...variants]);
    this.variantTags = new Set(variants.map((slot) => slot.kind));
    this.concreteKinds = concreteKinds;
  }

  includes(node: TypedNode): boolean {
    return admitsNode(this.concreteKinds, node);
  }
}

export interface TypeSet {
  readonly schema: GrammarSchema;
  /** Named kinds; a collapsed single-alternative union maps to its alternative's type. */
  readonly types: ReadonlyMap<string, SynthesizedType>;
  readonly tokens: ReadonlyMap<string, TokenType>;
  /** Class name of every named kind, collapsed unions included. */
  readonly classNames: ReadonlyMap<string, string>;
  readonly extras: KindSet;
  /** Warning-severity findings from synthesis. */
  readonly diagnostics: readonly SynthesisError[];
}

export function checkArity(
  kind: string,
  field: SynthesizedField,
  count: number,
  range?: SourceRange
): void {
  if (
    (field.multiplicity === "one" && count !== 1) ||
    (field.multiplicity === "optional" && count > 1)
  ) {
    throw arityError(kind, field, count, range);
  }
}

/** Field value for already-checked nodes: a node, `null`, or a sequence. */
export function settleField(
  kind: string,
  field: SynthesizedField,
  nodes: readonly TypedNode[],
  range?: SourceRange
): FieldValue {
  checkArity(kind, field, nodes.length, range);
  if (field.multiplicity === "many") {
    return Object.freeze([...nodes]);
  }
  return nodes[0] ?? null;
}

export function arityError(
  kind: string,
  field: SynthesizedField,
  count: number,
  range?: SourceRange
): ConversionError {
  const expected = field.multiplicity === "one" ? "exactly one child" : "at most one child";
  return new ConversionError(
    `Field "${field.name}" of "${kind}" expects ${expected} but found ${count}`,
    {
      code: ConversionErrorCode.FieldArityMismatch,
      kind,
      range,
      field: field.name,
    }
  );
}
