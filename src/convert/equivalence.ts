import { EquivalenceError } from "../errors.js";
import { isFieldSequence, type FieldValue, type TypedNode } from "../synth/typedNode.js";

interface Difference {
  readonly path: string;
  readonly reason: string;
}

/** Structural comparison that ignores positions and trivia. */
export function isEquivalent(left: TypedNode, right: TypedNode): boolean {
  return findDifference(left, right, left.type) === undefined;
}

export function assertEquivalent(left: TypedNode, right: TypedNode): void {
  const difference = findDifference(left, right, left.type);
  if (difference) {
    throw new EquivalenceError(
      `Trees differ at ${difference.path}: ${difference.reason}`,
      difference.path
    );
  }
}

function findDifference(left: TypedNode, right: TypedNode, path: string): Difference | undefined {
  if (left.type !== right.type || left.shape !== right.shape) {
    return { path, reason: `"${left.type}" (${left.shape}) vs "${right.type}" (${right.shape})` };
  }
  if (left.shape !== "branch") {
    return right.shape === "branch" || left.text === right.text
      ? undefined
      : { path, reason: `text ${JSON.stringify(left.text)} vs ${JSON.stringify(right.text)}` };
  }
  if (right.shape !== "branch") {
    return undefined;
  }

  const names = new Set([...Object.keys(left.fields), ...Object.keys(right.fields)]);
  for (const name of names) {
    const difference = compareValues(left.fields[name] ?? null, right.fields[name] ?? null, `${path}.${name}`);
    if (difference) {
      return difference;
    }
  }
  return compareSequences(left.children, right.children, `${path}.children`);
}

function compareValues(left: FieldValue, right: FieldValue, path: string): Difference | undefined {
  if (left === null || right === null) {
    return left === right ? undefined : { path, reason: left === null ? "absent vs present" : "present vs absent" };
  }
  if (isFieldSequence(left) || isFieldSequence(right)) {
    if (!isFieldSequence(left) || !isFieldSequence(right)) {
      return { path, reason: "sequence vs single node" };
    }
    return compareSequences(left, right, path);
  }
  return findDifference(left, right, path);
}

function compareSequences(
  left: readonly TypedNode[],
  right: readonly TypedNode[],
  path: string
): Difference | undefined {
  if (left.length !== right.length) {
    return { path, reason: `${left.length} vs ${right.length} nodes` };
  }
  for (let index = 0; index < left.length; index += 1) {
    const difference = findDifference(left[index], right[index], `${path}[${index}]`);
    if (difference) {
      return difference;
    }
  }
  return undefined;
}
