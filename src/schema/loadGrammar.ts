import { SchemaError } from "../errors.js";
import {
  ERROR_KIND,
  type FieldDescriptor,
  type GrammarSchema,
  type Multiplicity,
  type NodeKindDefinition,
  type NodeKindRef,
} from "./types.js";

export interface LoadGrammarOptions {
  /**
   * Named kinds the parser may insert anywhere, such as comments. Kinds the
   * description does not declare are registered as leaves.
   */
  readonly extras?: readonly string[];
}

interface PendingKind {
  readonly name: string;
  readonly entry: Record<string, unknown> | undefined;
  readonly path: string;
}

/**
 * Load a `node-types.json` style description into a validated, frozen schema.
 * Keys the loader does not know are ignored.
 */
export function loadGrammar(
  description: unknown,
  options: LoadGrammarOptions = {}
): GrammarSchema {
  if (!Array.isArray(description)) {
    throw new SchemaError("Grammar description must be an array of node types");
  }

  // First pass: register every kind so references may point forward.
  const pending = new Map<string, PendingKind>();
  const tokens = new Set<string>();
  description.forEach((entry: unknown, index) => {
    const path = `[${index}]`;
    if (!isRecord(entry)) {
      throw new SchemaError("Node type entry must be an object", path);
    }
    const ref = readRef(entry, path);
    if (!ref.named) {
      if (entry.fields !== undefined || entry.children !== undefined || entry.subtypes !== undefined) {
        throw new SchemaError(`Anonymous kind "${ref.name}" cannot declare structure`, path);
      }
      tokens.add(ref.name);
      return;
    }
    if (pending.has(ref.name)) {
      throw new SchemaError(`Duplicate definition of kind "${ref.name}"`, path);
    }
    pending.set(ref.name, { name: ref.name, entry, path: ref.name });
  });

  const extras: string[] = [];
  for (const extra of options.extras ?? []) {
    if (!pending.has(extra)) {
      pending.set(extra, { name: extra, entry: undefined, path: extra });
    }
    if (!extras.includes(extra)) {
      extras.push(extra);
    }
  }
  if (!pending.has(ERROR_KIND)) {
    pending.set(ERROR_KIND, { name: ERROR_KIND, entry: undefined, path: ERROR_KIND });
  }
  if (!extras.includes(ERROR_KIND)) {
    extras.push(ERROR_KIND);
  }

  // Second pass: fill in definitions now that every name is known.
  const resolver: ReferenceResolver = {
    resolve(value, path) {
      const ref = readRef(value, path);
      const declared = ref.named ? pending.has(ref.name) : tokens.has(ref.name);
      if (!declared) {
        const label = ref.named ? "kind" : "token";
        throw new SchemaError(`Reference to undeclared ${label} "${ref.name}"`, path);
      }
      return ref;
    },
  };

  const kinds = new Map<string, NodeKindDefinition>();
  for (const kind of pending.values()) {
    kinds.set(kind.name, defineKind(kind, resolver, pending));
  }

  return Object.freeze({
    kinds,
    tokens,
    extras: Object.freeze(extras),
  });
}

interface ReferenceResolver {
  resolve(value: unknown, path: string): NodeKindRef;
}

function defineKind(
  kind: PendingKind,
  resolver: ReferenceResolver,
  pending: ReadonlyMap<string, PendingKind>
): NodeKindDefinition {
  const { entry, name, path } = kind;
  if (!entry) {
    return name === ERROR_KIND
      ? defineErrorKind(pending)
      : Object.freeze({ shape: "leaf", name });
  }

  // An empty "fields" object declares no content.
  const hasFields =
    entry.fields !== undefined &&
    (!isRecord(entry.fields) || Object.keys(entry.fields).length > 0);
  const hasChildren = entry.children !== undefined;

  if (entry.subtypes !== undefined) {
    if (hasFields || hasChildren) {
      throw new SchemaError(
        `Kind "${name}" declares both subtypes and fields or children`,
        path
      );
    }
    const alternatives = readRefList(entry.subtypes, `${path}.subtypes`, resolver);
    return Object.freeze({ shape: "union", name, alternatives });
  }

  if (!hasFields && !hasChildren) {
    return Object.freeze({ shape: "leaf", name });
  }

  const fields: FieldDescriptor[] = [];
  if (hasFields) {
    if (!isRecord(entry.fields)) {
      throw new SchemaError(`"fields" must be an object`, path);
    }
    for (const [fieldName, field] of Object.entries(entry.fields)) {
      fields.push(readField(fieldName, field, `${path}.fields.${fieldName}`, resolver));
    }
  }

  const children = hasChildren
    ? readField("children", entry.children, `${path}.children`, resolver)
    : undefined;

  return Object.freeze({
    shape: "record",
    name,
    fields: Object.freeze(fields),
    children,
  });
}

function defineErrorKind(pending: ReadonlyMap<string, PendingKind>): NodeKindDefinition {
  const allowedKinds = Object.freeze(
    [...pending.keys()].map((name) => Object.freeze({ name, named: true }))
  );
  return Object.freeze({
    shape: "record",
    name: ERROR_KIND,
    fields: Object.freeze([]),
    children: Object.freeze({ name: "children", allowedKinds, multiplicity: "many" }),
  });
}

function readField(
  name: string,
  value: unknown,
  path: string,
  resolver: ReferenceResolver
): FieldDescriptor {
  if (!isRecord(value)) {
    throw new SchemaError("Field description must be an object", path);
  }
  const multiple = readFlag(value, "multiple", path);
  const required = readFlag(value, "required", path);
  const allowedKinds = readRefList(value.types, `${path}.types`, resolver);
  const multiplicity: Multiplicity = multiple ? "many" : required ? "one" : "optional";
  return Object.freeze({ name, allowedKinds, multiplicity });
}

function readRefList(
  value: unknown,
  path: string,
  resolver: ReferenceResolver
): readonly NodeKindRef[] {
  if (!Array.isArray(value)) {
    throw new SchemaError("Expected an array of kind references", path);
  }
  if (value.length === 0) {
    throw new SchemaError("At least one allowed kind is required", path);
  }
  const refs: NodeKindRef[] = [];
  value.forEach((item: unknown, index) => {
    const ref = resolver.resolve(item, `${path}[${index}]`);
    if (!refs.some((existing) => existing.name === ref.name && existing.named === ref.named)) {
      refs.push(Object.freeze(ref));
    }
  });
  return Object.freeze(refs);
}

function readRef(value: unknown, path: string): NodeKindRef {
  if (!isRecord(value)) {
    throw new SchemaError("Kind reference must be an object", path);
  }
  const { type, named } = value;
  if (typeof type !== "string" || type.length === 0) {
    throw new SchemaError(`Missing required string key "type"`, path);
  }
  if (typeof named !== "boolean") {
    throw new SchemaError(`Missing required boolean key "named"`, path);
  }
  return { name: type, named };
}

function readFlag(value: Record<string, unknown>, key: string, path: string): boolean {
  const flag = value[key];
  if (flag === undefined) {
    return false;
  }
  if (typeof flag !== "boolean") {
    throw new SchemaError(`"${key}" must be a boolean`, path);
  }
  return flag;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
