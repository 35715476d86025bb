/**
 * Shared tree-sitter utilities: node text and positions.
 */

import type Parser from 'tree-sitter';

/**
 * 1-based source location, as shown to users.
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a tree-sitter node position to SourceLocation.
 * Tree-sitter uses 0-based positions, we use 1-based.
 */
export function getLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Identity of a node within the tree that produced it.
 * Only meaningful for lookups against that same tree.
 */
export type NodeId = number;

export function getNodeId(node: Parser.SyntaxNode): NodeId {
  return node.id;
}
