export interface SourceRange {
  /** Inclusive zero-based start offset within the input string. */
  start: number;
  /** Exclusive zero-based end offset within the input string. */
  end: number;
}

export interface UntypedNode {
  /** Node kind reported by the parser. */
  type: string;
  /** False for anonymous punctuation and keyword tokens. */
  named: boolean;
  /** Exact source text covered by `range`. */
  text: string;
  /** Source-range information for downstream tooling. */
  range: SourceRange;
  /** Field name the parser assigned to this node within its parent, if any. */
  field?: string;
  /** Child nodes in source order, anonymous tokens included. */
  children: UntypedNode[];
}

export function formatRange(range: SourceRange | undefined): string {
  return range ? `${range.start}..${range.end}` : "unknown range";
}
