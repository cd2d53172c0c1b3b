import { SynthesisError } from "../errors.js";
import type {
  FieldDescriptor,
  GrammarSchema,
  NodeKindRef,
  UnionKindDefinition,
} from "../schema/types.js";
import { snakeToPascal, type AsClassName } from "./naming.js";
import {
  LeafType,
  RecordType,
  TokenType,
  TypeSlot,
  UnionType,
  type KindSet,
  type SynthesizedField,
  type SynthesizedType,
  type TypeSet,
} from "./types.js";

export interface SynthesizeOptions {
  /** Maps a kind name to its class name. Defaults to snake_case → PascalCase. */
  readonly asClassName?: AsClassName;
  /** Receives warning-severity findings as they are made. */
  readonly onDiagnostic?: (diagnostic: SynthesisError) => void;
}

export function synthesize(schema: GrammarSchema, options: SynthesizeOptions = {}): TypeSet {
  const asClassName = options.asClassName ?? snakeToPascal;
  const diagnostics: SynthesisError[] = [];
  const warn = (diagnostic: SynthesisError): void => {
    diagnostics.push(diagnostic);
    options.onDiagnostic?.(diagnostic);
  };

  const slots = new Map<string, TypeSlot>();
  for (const name of schema.kinds.keys()) {
    slots.set(name, new TypeSlot(name, true));
  }
  const tokenSlots = new Map<string, TypeSlot>();
  for (const token of schema.tokens) {
    tokenSlots.set(token, new TypeSlot(token, false));
  }

  const slotFor = (ref: NodeKindRef, owner: string): TypeSlot => {
    const slot = ref.named ? slots.get(ref.name) : tokenSlots.get(ref.name);
    if (!slot) {
      throw new SynthesisError(
        `Kind "${owner}" references "${ref.name}", which is not in the schema`,
        owner
      );
    }
    return slot;
  };

  const classNames = assignClassNames(schema, asClassName);
  const expansions = expandUnions(schema);
  const extras = kindSetOf(
    schema.extras.map((name) => ({ name, named: true })),
    expansions
  );

  const synthesizeField = (field: FieldDescriptor, owner: string): SynthesizedField =>
    Object.freeze({
      name: field.name,
      multiplicity: field.multiplicity,
      alternatives: Object.freeze(field.allowedKinds.map((ref) => slotFor(ref, owner))),
      accepts: kindSetOf(field.allowedKinds, expansions),
    });

  const tokens = new Map<string, TokenType>();
  for (const [token, slot] of tokenSlots) {
    const type = new TokenType(token);
    tokens.set(token, type);
    slot.fill(type);
  }

  const collapsed: UnionKindDefinition[] = [];
  for (const definition of schema.kinds.values()) {
    const { name } = definition;
    const slot = slotFor({ name, named: true }, name);
    const className = classNames.get(name) ?? asClassName(name);
    switch (definition.shape) {
      case "leaf":
        slot.fill(new LeafType(name, className));
        break;
      case "record": {
        const fields = definition.fields.map((field) => synthesizeField(field, name));
        const children = definition.children
          ? synthesizeField(definition.children, name)
          : undefined;
        slot.fill(new RecordType(name, className, fields, children, extras));
        break;
      }
      case "union": {
        const variants = definition.alternatives.map((ref) => slotFor(ref, name));
        if (variants.length === 1) {
          warn(
            new SynthesisError(
              `Union "${name}" has a single alternative "${definition.alternatives[0]?.name}" and collapses to it`,
              name,
              "warning"
            )
          );
          collapsed.push(definition);
          break;
        }
        slot.fill(new UnionType(name, className, variants, expansions.get(name) ?? emptyKindSet()));
        break;
      }
    }
  }

  // Collapsed unions alias their alternative, possibly through other collapsed unions.
  for (const definition of collapsed) {
    const target = resolveCollapsed(definition, schema);
    slotFor({ name: definition.name, named: true }, definition.name).fill(
      slotFor(target, definition.name).type
    );
  }

  const types = new Map<string, SynthesizedType>();
  for (const [name, slot] of slots) {
    types.set(name, slot.type);
  }

  return Object.freeze({
    schema,
    types,
    tokens,
    classNames,
    extras,
    diagnostics: Object.freeze(diagnostics),
  });
}

function assignClassNames(schema: GrammarSchema, asClassName: AsClassName): Map<string, string> {
  const byClass = new Map<string, string>();
  const byKind = new Map<string, string>();
  for (const name of schema.kinds.keys()) {
    const className = asClassName(name);
    if (!className) {
      throw new SynthesisError(`Kind "${name}" has no usable class name`, name);
    }
    const clash = byClass.get(className);
    if (clash !== undefined) {
      throw new SynthesisError(
        `Kinds "${clash}" and "${name}" both map to class name "${className}"`,
        name
      );
    }
    byClass.set(className, name);
    byKind.set(name, className);
  }
  return byKind;
}

function resolveCollapsed(definition: UnionKindDefinition, schema: GrammarSchema): NodeKindRef {
  const visited = new Set<string>([definition.name]);
  let current = definition.alternatives[0];
  while (current) {
    if (!current.named) {
      return current;
    }
    const target = schema.kinds.get(current.name);
    if (target?.shape !== "union" || target.alternatives.length !== 1) {
      return current;
    }
    if (visited.has(target.name)) {
      throw new SynthesisError(
        `Single-alternative unions form a cycle through "${target.name}"`,
        definition.name
      );
    }
    visited.add(target.name);
    current = target.alternatives[0];
  }
  throw new SynthesisError(`Union "${definition.name}" has no alternatives`, definition.name);
}

/** Transitive concrete kinds of every union, computed with a worklist. */
function expandUnions(schema: GrammarSchema): Map<string, KindSet> {
  const expansions = new Map<string, KindSet>();
  for (const definition of schema.kinds.values()) {
    if (definition.shape !== "union") {
      continue;
    }
    const named = new Set<string>();
    const anonymous = new Set<string>();
    const pending: NodeKindRef[] = [...definition.alternatives];
    for (let ref = pending.pop(); ref; ref = pending.pop()) {
      if (!ref.named) {
        anonymous.add(ref.name);
        continue;
      }
      if (named.has(ref.name)) {
        continue;
      }
      named.add(ref.name);
      const target = schema.kinds.get(ref.name);
      if (target?.shape === "union") {
        pending.push(...target.alternatives);
      }
    }
    expansions.set(definition.name, { named, anonymous });
  }
  return expansions;
}

function kindSetOf(refs: readonly NodeKindRef[], expansions: ReadonlyMap<string, KindSet>): KindSet {
  const named = new Set<string>();
  const anonymous = new Set<string>();
  for (const ref of refs) {
    if (!ref.named) {
      anonymous.add(ref.name);
      continue;
    }
    named.add(ref.name);
    const expansion = expansions.get(ref.name);
    if (expansion) {
      expansion.named.forEach((name) => named.add(name));
      expansion.anonymous.forEach((name) => anonymous.add(name));
    }
  }
  return { named, anonymous };
}

function emptyKindSet(): KindSet {
  return { named: new Set(), anonymous: new Set() };
}
