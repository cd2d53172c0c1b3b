import type { SourceRange } from "./parser/untypedTree.js";

export class TypedTreeError extends Error {
  readonly range?: SourceRange;

  constructor(message: string, range?: SourceRange) {
    super(message);
    this.name = "TypedTreeError";
    this.range = range;
  }
}

/** The grammar description is malformed or references undeclared kinds. */
export class SchemaError extends TypedTreeError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "SchemaError";
    this.path = path;
  }
}

export type SynthesisSeverity = "error" | "warning";

export class SynthesisError extends TypedTreeError {
  readonly kind: string;
  readonly severity: SynthesisSeverity;

  constructor(message: string, kind: string, severity: SynthesisSeverity = "error") {
    super(message);
    this.name = "SynthesisError";
    this.kind = kind;
    this.severity = severity;
  }
}

export enum ConversionErrorCode {
  KindMismatch = "kind_mismatch",
  FieldArityMismatch = "field_arity_mismatch",
  UnknownKind = "unknown_kind",
}

export interface ConversionErrorDetails {
  readonly code: ConversionErrorCode;
  /** Kind of the node the mismatch was detected on. */
  readonly kind: string;
  readonly range?: SourceRange;
  readonly field?: string;
  readonly parentKind?: string;
}

export class ConversionError extends TypedTreeError {
  readonly code: ConversionErrorCode;
  readonly kind: string;
  readonly field?: string;
  readonly parentKind?: string;

  constructor(message: string, details: ConversionErrorDetails) {
    super(message, details.range);
    this.name = "ConversionError";
    this.code = details.code;
    this.kind = details.kind;
    this.field = details.field;
    this.parentKind = details.parentKind;
  }
}

export class ReconstructionError extends TypedTreeError {
  readonly kind: string;

  constructor(message: string, kind: string) {
    super(message);
    this.name = "ReconstructionError";
    this.kind = kind;
  }
}

export class EquivalenceError extends TypedTreeError {
  /** Path of the first differing node, such as `add.left.children[0]`. */
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "EquivalenceError";
    this.path = path;
  }
}

export class RegistryError extends TypedTreeError {
  readonly identity: string;

  constructor(message: string, identity: string) {
    super(message);
    this.name = "RegistryError";
    this.identity = identity;
  }
}
