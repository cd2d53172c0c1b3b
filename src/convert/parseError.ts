import { TypedTreeError } from "../errors.js";
import type { UntypedNode } from "../parser/untypedTree.js";

export interface SourcePosition {
  /** One-based line number. */
  readonly line: number;
  /** Zero-based column within the line. */
  readonly column: number;
}

export interface ParseErrorSource {
  /** Text the offsets below are relative to, usually the whole document. */
  readonly contents: string;
  /** Source offset of the first character of `contents`. */
  readonly offset: number;
}

/** Raised for `ERROR` nodes when conversion is asked to reject them. */
export class ParseError extends TypedTreeError {
  readonly node: UntypedNode;
  readonly filename?: string;
  readonly startPosition: SourcePosition;
  readonly endPosition: SourcePosition;

  constructor(node: UntypedNode, source: ParseErrorSource, filename?: string) {
    const start = positionAt(source.contents, node.range.start - source.offset);
    const end = positionAt(source.contents, node.range.end - source.offset);
    const location = filename ? `in ${filename} ` : "";
    super(
      `Parse error ${location}${describeSpan(start, end)}:\n${annotate(source.contents, start, end)}`,
      { start: node.range.start, end: node.range.end }
    );
    this.name = "ParseError";
    this.node = node;
    this.filename = filename;
    this.startPosition = start;
    this.endPosition = end;
  }
}

export function positionAt(contents: string, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, contents.length));
  let line = 1;
  let lineStart = 0;
  for (let index = 0; index < clamped; index += 1) {
    if (contents.charCodeAt(index) === 10) {
      line += 1;
      lineStart = index + 1;
    }
  }
  return { line, column: clamped - lineStart };
}

function describeSpan(start: SourcePosition, end: SourcePosition): string {
  if (start.line === end.line) {
    return `on line ${start.line} between column ${start.column} and ${end.column}`;
  }
  return `between line ${start.line}, column ${start.column} and line ${end.line}, column ${end.column}`;
}

function annotate(contents: string, start: SourcePosition, end: SourcePosition): string {
  const lines = contents.split(/\r?\n/).slice(start.line - 1, end.line);
  const annotated: string[] = [];
  lines.forEach((line, index) => {
    const first = index === 0;
    const last = index === lines.length - 1;
    const from = first ? start.column : 0;
    const to = last ? end.column : line.length;
    const width = first && last ? Math.max(1, to - from) : Math.max(0, to - from);
    annotated.push(line, `${" ".repeat(from)}${"^".repeat(width)}`);
  });
  return annotated.join("\n");
}
