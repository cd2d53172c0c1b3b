import type { SourceRange } from "../parser/untypedTree.js";

/** Source text a branch covers that belongs to none of its typed children. */
export interface TriviaSegment {
  /** Offset of the text within the original source. */
  readonly offset: number;
  readonly text: string;
}

export type TypedNode = TypedLeaf | TypedBranch | TypedToken;

export type FieldValue = TypedNode | null | readonly TypedNode[];

export type FieldMap = Readonly<Record<string, FieldValue>>;

/** A named terminal such as an identifier or a number literal. */
export class TypedLeaf {
  readonly shape = "leaf";
  readonly type: string;
  readonly text: string;
  readonly range?: SourceRange;

  constructor(type: string, text: string, range?: SourceRange) {
    this.type = type;
    this.text = text;
    this.range = range;
  }
}

/** An anonymous token a field descriptor explicitly retains. */
export class TypedToken {
  readonly shape = "token";
  readonly type: string;
  readonly text: string;
  readonly range?: SourceRange;

  constructor(type: string, text: string, range?: SourceRange) {
    this.type = type;
    this.text = text;
    this.range = range;
  }
}

export class TypedBranch {
  readonly shape = "branch";
  readonly type: string;
  /** Field values in declaration order. */
  readonly fields: FieldMap;
  /** Unfielded named children, extras included, in source order. */
  readonly children: readonly TypedNode[];
  readonly range?: SourceRange;
  /**
   * Verbatim text between and around children. Present on branches produced
   * from a parse tree; hand-built branches leave it undefined.
   */
  readonly trivia?: readonly TriviaSegment[];

  constructor(
    type: string,
    fields: FieldMap,
    children: readonly TypedNode[],
    range?: SourceRange,
    trivia?: readonly TriviaSegment[]
  ) {
    this.type = type;
    this.fields = Object.freeze({ ...fields });
    this.children = Object.freeze([...children]);
    this.range = range;
    this.trivia = trivia ? Object.freeze([...trivia]) : undefined;
  }

  /** Typed nodes held by fields, in declaration order, then children. */
  childNodes(): TypedNode[] {
    const nodes: TypedNode[] = [];
    for (const value of Object.values(this.fields)) {
      if (value === null) {
        continue;
      }
      if (isFieldSequence(value)) {
        nodes.push(...value);
      } else {
        nodes.push(value);
      }
    }
    nodes.push(...this.children);
    return nodes;
  }
}

export function isFieldSequence(value: FieldValue): value is readonly TypedNode[] {
  return Array.isArray(value);
}
