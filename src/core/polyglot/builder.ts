/**
 * Link pass: finds evaluate calls in one parsed tree and builds the
 * subtree for each.
 */
import type Parser from 'tree-sitter';
import { getNodeId, type NodeId } from '../../languages/tree-sitter/TreeSitterUtils.js';

export interface LinkHooks<T> {
  isEvalCall(node: Parser.SyntaxNode): boolean;
  /** Builds the subtree for an evaluate call, or returns null on failure */
  makeSubtree(node: Parser.SyntaxNode): T | null;
  onFailure(node: Parser.SyntaxNode): void;
}

/**
 * Walks the tree from `root` in first-child / next-sibling order.
 *
 * Evaluate calls are leaves of this walk: their arguments are never
 * searched, and their siblings are. The returned map is complete when the
 * function returns; nothing is published while the walk is in progress.
 */
export function buildLinks<T>(
  root: Parser.SyntaxNode,
  hooks: LinkHooks<T>
): Map<NodeId, T> {
  const links = new Map<NodeId, T>();

  const visit = (first: Parser.SyntaxNode): void => {
    // Siblings are walked iteratively, children recursively
    let node: Parser.SyntaxNode | null = first;
    while (node) {
      if (hooks.isEvalCall(node)) {
        const subtree = hooks.makeSubtree(node);
        if (subtree === null) {
          hooks.onFailure(node);
        } else {
          links.set(getNodeId(node), subtree);
        }
      } else {
        const child = node.firstChild;
        if (child) {
          visit(child);
        }
      }
      node = node.nextSibling;
    }
  };

  visit(root);
  return links;
}
