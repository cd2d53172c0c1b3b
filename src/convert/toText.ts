import { ReconstructionError } from "../errors.js";
import type { TypedBranch, TypedNode } from "../synth/typedNode.js";

export interface ToTextOptions {
  /** Throw instead of falling back to the canonical rendering. */
  readonly strict?: boolean;
  /** Receives each branch that had to be rendered canonically. */
  readonly onReconstructionError?: (error: ReconstructionError) => void;
}

interface Piece {
  readonly offset: number;
  readonly render: () => string;
}

/**
 * Reconstruct source text. Nodes produced by `toTyped` reproduce their
 * original range exactly; hand-built branches are rendered canonically.
 */
export function toText(node: TypedNode, options: ToTextOptions = {}): string {
  switch (node.shape) {
    case "leaf":
    case "token":
      return node.text;
    case "branch":
      return branchText(node, options);
  }
}

function branchText(node: TypedBranch, options: ToTextOptions): string {
  const pieces = positionedPieces(node, options);
  if (pieces) {
    return pieces
      .sort((left, right) => left.offset - right.offset)
      .map((piece) => piece.render())
      .join("");
  }

  const error = new ReconstructionError(
    `Node "${node.type}" carries no position data and is rendered canonically`,
    node.type
  );
  if (options.strict) {
    throw error;
  }
  options.onReconstructionError?.(error);
  return canonicalText(node, options);
}

function positionedPieces(node: TypedBranch, options: ToTextOptions): Piece[] | undefined {
  if (!node.range || !node.trivia) {
    return undefined;
  }
  const pieces: Piece[] = node.trivia.map((segment) => ({
    offset: segment.offset,
    render: () => segment.text,
  }));
  for (const child of node.childNodes()) {
    if (!child.range) {
      return undefined;
    }
    pieces.push({ offset: child.range.start, render: () => toText(child, options) });
  }
  return pieces;
}

/** Fields in declaration order, then children, separated by single spaces. */
function canonicalText(node: TypedBranch, options: ToTextOptions): string {
  return node
    .childNodes()
    .map((child) => toText(child, options))
    .filter((text) => text.length > 0)
    .join(" ");
}
