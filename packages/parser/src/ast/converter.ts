import { MAX_AST_CONVERSION_DEPTH } from '@symbolscope/core';
import type { ASTNode } from './types.js';

export interface CstPoint {
  row: number;
  column: number;
}

/**
 * The slice of a tree-sitter SyntaxNode the converter reads.
 * Indexes are string offsets into the parsed content; rows and columns are 0-based.
 */
export interface CstNode {
  readonly type: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: CstPoint;
  readonly endPosition: CstPoint;
  readonly children: readonly CstNode[];
}

export interface ConversionResult {
  root: ASTNode;
  /** Deepest level reached by a converted (non-sentinel) node; the root is depth 0 */
  maxDepth: number;
  truncatedCount: number;
}

/**
 * Source slice for `[start, end)`, or '' when the bounds fall outside the content.
 */
export function safeSlice(content: string, start: number, end: number): string {
  if (start < 0 || end < 0 || start > end || end > content.length || start >= content.length) {
    return '';
  }
  return content.slice(start, end);
}

/**
 * Convert a concrete syntax tree into AST nodes, depth-first.
 *
 * A node at depth `maxDepth` or deeper is replaced by a `<type>_truncated` sentinel
 * with no children, so no node sits deeper than the cap.
 */
export function convertTree(
  root: CstNode,
  content: string,
  filePath: string,
  maxDepth: number = MAX_AST_CONVERSION_DEPTH,
): ConversionResult {
  const result = { maxDepth: 0, truncatedCount: 0 };

  const convert = (node: CstNode, depth: number): ASTNode => {
    if (depth >= maxDepth) {
      result.truncatedCount++;
      return {
        id: `truncated-node-${node.startIndex}-${node.endIndex}`,
        type: `${node.type}_truncated`,
        value: `// Truncated at depth ${depth}`,
        location: { filePath, line: 1, column: 1, endLine: 1, endColumn: 1 },
        children: [],
      };
    }

    if (depth > result.maxDepth) result.maxDepth = depth;

    return {
      id: `node-${node.startIndex}-${node.endIndex}`,
      type: node.type,
      value: safeSlice(content, node.startIndex, node.endIndex),
      location: {
        filePath,
        line: node.startPosition.row + 1,
        column: node.startPosition.column + 1,
        endLine: node.endPosition.row + 1,
        endColumn: node.endPosition.column + 1,
      },
      children: node.children.map(child => convert(child, depth + 1)),
    };
  };

  return { root: convert(root, 0), ...result };
}
