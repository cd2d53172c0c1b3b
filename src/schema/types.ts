export type Multiplicity = "one" | "optional" | "many";

export type NodeKindShape = "leaf" | "record" | "union";

export interface NodeKindRef {
  /** Kind name as the parser reports it. */
  readonly name: string;
  /** False for anonymous punctuation and keyword tokens. */
  readonly named: boolean;
}

export interface FieldDescriptor {
  /** Field name, or `children` for the unnamed-children slot. */
  readonly name: string;
  readonly allowedKinds: readonly NodeKindRef[];
  readonly multiplicity: Multiplicity;
}

export interface LeafKindDefinition {
  readonly shape: "leaf";
  readonly name: string;
}

export interface RecordKindDefinition {
  readonly shape: "record";
  readonly name: string;
  /** Named fields in declaration order. */
  readonly fields: readonly FieldDescriptor[];
  readonly children?: FieldDescriptor;
}

export interface UnionKindDefinition {
  readonly shape: "union";
  readonly name: string;
  readonly alternatives: readonly NodeKindRef[];
}

export type NodeKindDefinition =
  | LeafKindDefinition
  | RecordKindDefinition
  | UnionKindDefinition;

export interface GrammarSchema {
  /** Named kinds keyed by name, in description order. */
  readonly kinds: ReadonlyMap<string, NodeKindDefinition>;
  /** Anonymous token kinds. */
  readonly tokens: ReadonlySet<string>;
  /** Kinds that may appear as unfielded children of any record. */
  readonly extras: readonly string[];
}

export const ERROR_KIND = "ERROR";

/** One entry of a tree-sitter style `node-types.json` document. */
export interface NodeTypeDescription {
  readonly type: string;
  readonly named: boolean;
  readonly fields?: Readonly<Record<string, ChildrenDescription>>;
  readonly children?: ChildrenDescription;
  readonly subtypes?: readonly NodeKindRefDescription[];
}

export interface ChildrenDescription {
  readonly multiple?: boolean;
  readonly required?: boolean;
  readonly types: readonly NodeKindRefDescription[];
}

export interface NodeKindRefDescription {
  readonly type: string;
  readonly named: boolean;
}
