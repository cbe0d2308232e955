/**
 * Offset <-> line/column lookups over a single source string.
 * Lines and columns are 1-based.
 */
export class LineIndex {
  private readonly starts: number[];

  constructor(private readonly content: string) {
    this.starts = [0];
    for (let i = 0; i < content.length; i++) {
      if (content.charCodeAt(i) === 10) {
        this.starts.push(i + 1);
      }
    }
  }

  get lineCount(): number {
    return this.starts.length;
  }

  /** Offset of the first character of a 1-based line */
  lineStart(line: number): number {
    const clamped = Math.min(Math.max(line, 1), this.starts.length);
    return this.starts[clamped - 1] ?? 0;
  }

  lineOf(offset: number): number {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }

  columnOf(offset: number): number {
    return offset - this.lineStart(this.lineOf(offset)) + 1;
  }

  /** Text of a 1-based line without its newline */
  lineText(line: number): string {
    const start = this.lineStart(line);
    const next = line < this.starts.length ? this.lineStart(line + 1) - 1 : this.content.length;
    return this.content.slice(start, next);
  }
}

/**
 * Index of the `}` closing the `{` at `openIndex`, or -1 when the block never closes.
 */
export function findMatchingBrace(content: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < content.length; i++) {
    const ch = content[i];
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Body between the first `{` at or after `from` and its matching `}`.
 * An unclosed block runs to the end of the content.
 */
export function extractBlock(content: string, from: number): { body: string; bodyStart: number; end: number } | null {
  const open = content.indexOf('{', from);
  if (open === -1) return null;

  const close = findMatchingBrace(content, open);
  const end = close === -1 ? content.length : close;
  return { body: content.slice(open + 1, end), bodyStart: open + 1, end };
}

/**
 * Running brace depth at the start of every line (index 0 is line 1).
 */
export function depthAtLineStarts(content: string): number[] {
  const depths = [0];
  let depth = 0;
  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (ch === '{') depth++;
    else if (ch === '}') depth = Math.max(0, depth - 1);
    else if (ch === '\n') depths.push(depth);
  }
  return depths;
}

/**
 * Brace depth immediately before `offset`, given the per-line table from {@link depthAtLineStarts}.
 */
export function depthAt(content: string, index: LineIndex, lineDepths: number[], offset: number): number {
  const line = index.lineOf(offset);
  let depth = lineDepths[line - 1] ?? 0;
  for (let i = index.lineStart(line); i < offset; i++) {
    const ch = content[i];
    if (ch === '{') depth++;
    else if (ch === '}') depth = Math.max(0, depth - 1);
  }
  return depth;
}

/**
 * Split on `separator` only where no (), [] or {} bracket is open.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);

    if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

/**
 * Count non-overlapping matches of a global pattern.
 */
export function countMatches(content: string, pattern: RegExp): number {
  return Array.from(content.matchAll(pattern)).length;
}
