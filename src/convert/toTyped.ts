import { ConversionError, ConversionErrorCode } from "../errors.js";
import { formatRange, type SourceRange, type UntypedNode } from "../parser/untypedTree.js";
import { ERROR_KIND } from "../schema/types.js";
import {
  TypedBranch,
  TypedLeaf,
  TypedToken,
  type FieldValue,
  type TriviaSegment,
  type TypedNode,
} from "../synth/typedNode.js";
import {
  admits,
  arityError,
  settleField,
  checkArity,
  type RecordType,
  type SynthesizedField,
  type TypeSet,
} from "../synth/types.js";
import { ParseError } from "./parseError.js";

/**
 * How unnamed raw children are matched to fields.
 *
 * - `named`: the parser labels fielded children (`UntypedNode.field`).
 * - `positional`: fields are filled in declaration order from the named
 *   children in source order; see `PositionalAssigner`.
 */
export type FieldAssignment = "named" | "positional";

export interface ToTypedOptions {
  readonly fieldAssignment?: FieldAssignment;
  /** Throw `ParseError` on `ERROR` nodes instead of converting them. */
  readonly raiseParseError?: boolean;
  /** Reported in `ParseError` messages. */
  readonly filename?: string;
}

interface ConversionContext {
  readonly typeSet: TypeSet;
  readonly fieldAssignment: FieldAssignment;
  readonly raiseParseError: boolean;
  readonly filename?: string;
  readonly root: UntypedNode;
}

type Assignment =
  | { readonly slot: "field"; readonly field: SynthesizedField }
  | { readonly slot: "children" }
  | { readonly slot: "extra" }
  | { readonly slot: "trivia" };

const TO_CHILDREN: Assignment = { slot: "children" };
const TO_EXTRA: Assignment = { slot: "extra" };
const TO_TRIVIA: Assignment = { slot: "trivia" };

interface Assigner {
  assign(child: UntypedNode): Assignment;
}

export function toTyped(
  node: UntypedNode,
  typeSet: TypeSet,
  options: ToTypedOptions = {}
): TypedNode {
  if (!node.named) {
    throw new ConversionError(
      `Anonymous node "${node.type}" at ${formatRange(node.range)} cannot be converted on its own`,
      { code: ConversionErrorCode.KindMismatch, kind: node.type, range: node.range }
    );
  }
  return convertNode(node, {
    typeSet,
    fieldAssignment: options.fieldAssignment ?? "named",
    raiseParseError: options.raiseParseError ?? false,
    filename: options.filename,
    root: node,
  });
}

function convertNode(node: UntypedNode, context: ConversionContext): TypedNode {
  const definition = context.typeSet.schema.kinds.get(node.type);
  const type = context.typeSet.types.get(node.type);
  if (!definition || !type) {
    throw new ConversionError(
      `Unknown node kind "${node.type}" at ${formatRange(node.range)}`,
      { code: ConversionErrorCode.UnknownKind, kind: node.type, range: node.range }
    );
  }

  if (node.type === ERROR_KIND && context.raiseParseError) {
    throw new ParseError(
      node,
      { contents: context.root.text, offset: context.root.range.start },
      context.filename
    );
  }

  // Union kinds, collapsed ones included, only appear as wrappers around one alternative.
  if (definition.shape === "union") {
    return convertUnionWrapper(node, context);
  }

  switch (type.shape) {
    case "leaf":
      checkLeafChildren(node, context);
      return new TypedLeaf(node.type, node.text, copyRange(node.range));
    case "record":
      return convertRecord(node, type, context);
    default:
      throw new ConversionError(
        `Kind "${node.type}" at ${formatRange(node.range)} has no constructible type`,
        { code: ConversionErrorCode.KindMismatch, kind: node.type, range: node.range }
      );
  }
}

/**
 * A leaf keeps its whole text, so named children inside it must be extras.
 * They are still converted, which raises `ParseError` for nested `ERROR`
 * nodes when asked to.
 */
function checkLeafChildren(node: UntypedNode, context: ConversionContext): void {
  for (const child of node.children) {
    if (!child.named) {
      continue;
    }
    if (!admits(context.typeSet.extras, child.type, true)) {
      if (!context.typeSet.types.has(child.type)) {
        throw new ConversionError(
          `Unknown node kind "${child.type}" at ${formatRange(child.range)}`,
          {
            code: ConversionErrorCode.UnknownKind,
            kind: child.type,
            range: child.range,
            parentKind: node.type,
          }
        );
      }
      throw childMismatch(node, child);
    }
    convertNode(child, context);
  }
}

function convertUnionWrapper(node: UntypedNode, context: ConversionContext): TypedNode {
  const named = node.children.filter((child) => child.named);
  const [child] = named;
  if (!child || named.length !== 1) {
    throw new ConversionError(
      `Union node "${node.type}" at ${formatRange(node.range)} must wrap exactly one alternative, found ${named.length}`,
      { code: ConversionErrorCode.KindMismatch, kind: node.type, range: node.range }
    );
  }

  const type = context.typeSet.types.get(node.type);
  const admitted =
    type?.shape === "union"
      ? admits(type.concreteKinds, child.type, true)
      : type?.kind === child.type;
  if (!admitted) {
    throw new ConversionError(
      `"${child.type}" at ${formatRange(child.range)} is not an alternative of union "${node.type}"`,
      {
        code: ConversionErrorCode.KindMismatch,
        kind: child.type,
        range: child.range,
        parentKind: node.type,
      }
    );
  }

  if (child.range.start !== node.range.start || child.range.end !== node.range.end) {
    throw new ConversionError(
      `Union node "${node.type}" at ${formatRange(node.range)} carries text outside its alternative`,
      { code: ConversionErrorCode.KindMismatch, kind: node.type, range: node.range }
    );
  }

  return convertNode(child, context);
}

function convertRecord(
  node: UntypedNode,
  type: RecordType,
  context: ConversionContext
): TypedBranch {
  const assigner: Assigner =
    context.fieldAssignment === "positional" && node.type !== ERROR_KIND
      ? new PositionalAssigner(node, type)
      : new NamedAssigner(node, type);

  const buckets = new Map<string, TypedNode[]>(type.fields.map((field) => [field.name, []]));
  const children: TypedNode[] = [];
  const trivia: TriviaSegment[] = [];
  let declaredChildren = 0;

  const origin = node.range.start;
  let cursor = origin;
  const gapTo = (offset: number): void => {
    if (offset > cursor) {
      trivia.push({ offset: cursor, text: node.text.slice(cursor - origin, offset - origin) });
      cursor = offset;
    }
  };

  for (const child of node.children) {
    if (child.named && !context.typeSet.types.has(child.type)) {
      throw new ConversionError(
        `Unknown node kind "${child.type}" at ${formatRange(child.range)}`,
        {
          code: ConversionErrorCode.UnknownKind,
          kind: child.type,
          range: child.range,
          parentKind: node.type,
        }
      );
    }

    gapTo(child.range.start);
    const assignment = assigner.assign(child);
    if (assignment.slot === "trivia") {
      trivia.push({ offset: child.range.start, text: child.text });
    } else {
      const converted = child.named
        ? convertNode(child, context)
        : new TypedToken(child.type, child.text, copyRange(child.range));
      switch (assignment.slot) {
        case "field":
          buckets.get(assignment.field.name)?.push(converted);
          break;
        case "children":
          declaredChildren += 1;
          children.push(converted);
          break;
        case "extra":
          children.push(converted);
          break;
      }
    }
    cursor = Math.max(cursor, child.range.end);
  }
  gapTo(node.range.end);

  const values: Record<string, FieldValue> = {};
  for (const field of type.fields) {
    values[field.name] = settleField(node.type, field, buckets.get(field.name) ?? [], node.range);
  }
  if (type.children) {
    checkArity(node.type, type.children, declaredChildren, node.range);
  }

  return new TypedBranch(node.type, values, children, copyRange(node.range), trivia);
}

class NamedAssigner implements Assigner {
  private readonly node: UntypedNode;
  private readonly type: RecordType;

  constructor(node: UntypedNode, type: RecordType) {
    this.node = node;
    this.type = type;
  }

  assign(child: UntypedNode): Assignment {
    // Field labels inside ERROR nodes describe the broken production, not ERROR itself.
    if (child.field !== undefined && this.node.type !== ERROR_KIND) {
      const field = this.type.field(child.field);
      if (!field) {
        throw new ConversionError(
          `Kind "${this.node.type}" has no field "${child.field}" (child "${child.type}" at ${formatRange(child.range)})`,
          {
            code: ConversionErrorCode.KindMismatch,
            kind: child.type,
            range: child.range,
            field: child.field,
            parentKind: this.node.type,
          }
        );
      }
      if (admits(field.accepts, child.type, child.named)) {
        return { slot: "field", field };
      }
      if (!child.named) {
        return TO_TRIVIA;
      }
      throw fieldMismatch(this.node, field, child);
    }
    return unfielded(this.node, this.type, child);
  }
}

/**
 * Fills fields in declaration order from children in source order. The
 * current field takes each child it admits; `one` and `optional` fields then
 * move on while `many` fields keep consuming. A named child the current field
 * rejects skips past it, which is an arity error for an empty `one` field.
 * An anonymous child fills the first field from the current one that admits
 * it, passing only `optional` and `many` fields; otherwise it is trivia and
 * the position stays.
 */
class PositionalAssigner implements Assigner {
  private readonly node: UntypedNode;
  private readonly type: RecordType;
  private readonly counts = new Map<string, number>();
  private index = 0;

  constructor(node: UntypedNode, type: RecordType) {
    this.node = node;
    this.type = type;
  }

  assign(child: UntypedNode): Assignment {
    const fields = this.type.fields;
    if (!child.named) {
      const target = this.tokenTarget(child);
      if (target !== undefined) {
        this.index = target;
        return this.take(fields[target]);
      }
      return this.index >= fields.length ? unfielded(this.node, this.type, child) : TO_TRIVIA;
    }

    while (this.index < fields.length) {
      const current = fields[this.index];
      if (admits(current.accepts, child.type, true)) {
        return this.take(current);
      }
      if (admits(this.type.extras, child.type, true)) {
        return TO_EXTRA;
      }
      if (current.multiplicity === "one" && this.count(current) === 0) {
        if (this.admittedLater(child)) {
          throw arityError(this.node.type, current, 0, this.node.range);
        }
        throw fieldMismatch(this.node, current, child);
      }
      this.index += 1;
    }

    if (admits(this.type.extras, child.type, true)) {
      return TO_EXTRA;
    }
    if (this.type.children && admits(this.type.children.accepts, child.type, true)) {
      return TO_CHILDREN;
    }
    const crowded = fields.find(
      (field) =>
        field.multiplicity !== "many" &&
        this.count(field) > 0 &&
        admits(field.accepts, child.type, true)
    );
    if (crowded) {
      throw arityError(this.node.type, crowded, this.count(crowded) + 1, this.node.range);
    }
    throw childMismatch(this.node, child);
  }

  private take(field: SynthesizedField): Assignment {
    this.counts.set(field.name, this.count(field) + 1);
    if (field.multiplicity !== "many") {
      this.index += 1;
    }
    return { slot: "field", field };
  }

  /** First field from the current one that admits the token, passing only fields that may stay empty. */
  private tokenTarget(child: UntypedNode): number | undefined {
    const fields = this.type.fields;
    for (let index = this.index; index < fields.length; index += 1) {
      const field = fields[index];
      if (admits(field.accepts, child.type, false)) {
        return index;
      }
      if (field.multiplicity === "one" && this.count(field) === 0) {
        return undefined;
      }
    }
    return undefined;
  }

  private count(field: SynthesizedField): number {
    return this.counts.get(field.name) ?? 0;
  }

  private admittedLater(child: UntypedNode): boolean {
    const later = this.type.fields.slice(this.index + 1);
    return (
      later.some((field) => admits(field.accepts, child.type, true)) ||
      (this.type.children !== undefined && admits(this.type.children.accepts, child.type, true))
    );
  }
}

function unfielded(node: UntypedNode, type: RecordType, child: UntypedNode): Assignment {
  if (!child.named) {
    return type.children && admits(type.children.accepts, child.type, false)
      ? TO_CHILDREN
      : TO_TRIVIA;
  }
  if (admits(type.extras, child.type, true)) {
    return TO_EXTRA;
  }
  if (type.children && admits(type.children.accepts, child.type, true)) {
    return TO_CHILDREN;
  }
  throw childMismatch(node, child);
}

function fieldMismatch(
  node: UntypedNode,
  field: SynthesizedField,
  child: UntypedNode
): ConversionError {
  return new ConversionError(
    `Field "${field.name}" of "${node.type}" does not admit "${child.type}" at ${formatRange(child.range)}`,
    {
      code: ConversionErrorCode.KindMismatch,
      kind: child.type,
      range: child.range,
      field: field.name,
      parentKind: node.type,
    }
  );
}

function childMismatch(node: UntypedNode, child: UntypedNode): ConversionError {
  return new ConversionError(
    `"${child.type}" at ${formatRange(child.range)} is not admitted as a child of "${node.type}"`,
    {
      code: ConversionErrorCode.KindMismatch,
      kind: child.type,
      range: child.range,
      parentKind: node.type,
    }
  );
}

function copyRange(range: SourceRange): SourceRange {
  return { start: range.start, end: range.end };
}
