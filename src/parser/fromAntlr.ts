import {
  ErrorNode,
  ParserRuleContext,
  TerminalNode,
  Token,
  type ParseTree,
  type Vocabulary,
} from "antlr4ng";

import { TypedTreeError } from "../errors.js";
import { ERROR_KIND } from "../schema/types.js";
import type { SourceRange, UntypedNode } from "./untypedTree.js";

export interface AntlrRecognizerInfo {
  readonly ruleNames: readonly string[];
  readonly vocabulary: Vocabulary;
}

/**
 * Adapt an antlr4ng parse tree. Rule contexts become named nodes; tokens with
 * a literal name such as `'+'` become anonymous nodes of kind `+`, all others
 * named nodes of their symbolic name. ANTLR does not label children with
 * field names, so convert the result with positional field assignment.
 */
export function fromAntlrTree(
  tree: ParseTree,
  recognizer: AntlrRecognizerInfo,
  source: string
): UntypedNode {
  const root = toUntyped(tree, recognizer, source);
  if (!root) {
    throw new TypedTreeError("Parse tree has no content besides end of input");
  }
  return root;
}

function toUntyped(
  node: ParseTree,
  recognizer: AntlrRecognizerInfo,
  source: string
): UntypedNode | undefined {
  if (node instanceof ErrorNode) {
    const range = tokenRange(node.symbol);
    return { type: ERROR_KIND, named: true, text: slice(source, range), range, children: [] };
  }

  if (node instanceof TerminalNode) {
    const symbol = node.symbol;
    if (symbol.type === Token.EOF) {
      return undefined;
    }
    const { vocabulary } = recognizer;
    const literal = vocabulary.getLiteralName(symbol.type);
    const type = literal
      ? unquoteLiteral(literal)
      : vocabulary.getSymbolicName(symbol.type) ?? vocabulary.getDisplayName(symbol.type);
    const range = tokenRange(symbol);
    return { type, named: !literal, text: slice(source, range), range, children: [] };
  }

  if (node instanceof ParserRuleContext) {
    const type = recognizer.ruleNames[node.ruleIndex] ?? `rule_${node.ruleIndex}`;
    const children: UntypedNode[] = [];
    const count = node.getChildCount();
    for (let i = 0; i < count; i += 1) {
      const child = node.getChild(i);
      const converted = child ? toUntyped(child, recognizer, source) : undefined;
      if (converted) {
        children.push(converted);
      }
    }

    // An empty rule reports the token before it as its stop token.
    const start = node.start?.start ?? children[0]?.range.start ?? 0;
    const end = Math.max(start, (node.stop?.stop ?? start - 1) + 1);
    const range = { start, end };
    return { type, named: true, text: slice(source, range), range, children };
  }

  throw new TypedTreeError("Unsupported parse tree node");
}

function tokenRange(symbol: Token): SourceRange {
  const start = symbol.start;
  return { start, end: Math.max(start, symbol.stop + 1) };
}

function slice(source: string, range: SourceRange): string {
  return source.slice(range.start, range.end);
}

function unquoteLiteral(literal: string): string {
  const body = literal.startsWith("'") && literal.endsWith("'") ? literal.slice(1, -1) : literal;
  return body.replace(/\\(.)/g, "$1");
}
