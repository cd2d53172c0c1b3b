import { TypedTreeError } from "../errors.js";
import type { UntypedNode } from "./untypedTree.js";

/** The subset of a tree-sitter syntax node (node or web bindings) read here. */
export interface TreeSitterNodeLike {
  readonly type: string;
  readonly isNamed: boolean;
  readonly text: string;
  readonly startIndex: number;
  readonly endIndex: number;
  walk(): TreeSitterCursorLike;
}

export interface TreeSitterCursorLike {
  readonly currentNode: TreeSitterNodeLike;
  readonly currentFieldName: string | null | undefined;
  gotoFirstChild(): boolean;
  gotoNextSibling(): boolean;
  gotoParent(): boolean;
}

export interface TreeSitterTreeLike {
  readonly rootNode: TreeSitterNodeLike;
}

export function fromTreeSitterTree(tree: TreeSitterTreeLike): UntypedNode {
  return fromTreeSitterNode(tree.rootNode);
}

/** Copy a tree-sitter subtree, keeping anonymous tokens and field names. */
export function fromTreeSitterNode(node: TreeSitterNodeLike): UntypedNode {
  return fromCursor(node.walk());
}

function fromCursor(cursor: TreeSitterCursorLike): UntypedNode {
  const node = cursor.currentNode;
  const field = cursor.currentFieldName ?? undefined;
  const children: UntypedNode[] = [];
  if (cursor.gotoFirstChild()) {
    do {
      children.push(fromCursor(cursor));
    } while (cursor.gotoNextSibling());
    if (!cursor.gotoParent()) {
      throw new TypedTreeError(`Tree cursor could not return to "${node.type}"`);
    }
  }
  return {
    type: node.type,
    named: node.isNamed,
    text: node.text,
    range: { start: node.startIndex, end: node.endIndex },
    ...(field === undefined ? {} : { field }),
    children,
  };
}
