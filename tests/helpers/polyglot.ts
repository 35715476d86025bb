/**
 * Test helpers for walking polyglot trees.
 */
import type Parser from 'tree-sitter';
import {
  buildPolyglotTree,
  type BuildOptions,
  type PolyglotTree,
} from '../../src/core/polyglot/polyglot-tree.js';
import type { DiagnosticsCollector } from '../../src/core/polyglot/diagnostics.js';
import { PolyglotZipper } from '../../src/core/polyglot/zipper.js';
import type { LanguageId } from '../../src/languages/types.js';

/**
 * Builds a tree from code and fails the test if the root cannot be built.
 */
export function buildTree(
  code: string,
  language: LanguageId,
  options: BuildOptions = {}
): { tree: PolyglotTree; diagnostics: DiagnosticsCollector } {
  const { tree, diagnostics } = buildPolyglotTree(code, language, options);
  if (!tree) {
    throw new Error(`no tree for ${language} code: ${code}`);
  }
  return { tree, diagnostics };
}

/**
 * Depth-first search through the forest, crossing into subtrees.
 */
export function findZipper(
  start: PolyglotZipper,
  predicate: (zipper: PolyglotZipper) => boolean
): PolyglotZipper | null {
  if (predicate(start)) return start;
  let child = start.firstChild();
  while (child) {
    const found = findZipper(child, predicate);
    if (found) return found;
    child = child.nextSibling();
  }
  return null;
}

export function requireZipper(
  tree: PolyglotTree,
  predicate: (zipper: PolyglotZipper) => boolean
): PolyglotZipper {
  const found = findZipper(PolyglotZipper.fromTree(tree), predicate);
  if (!found) throw new Error('no matching node');
  return found;
}

/**
 * Depth-first search within one parsed tree.
 */
export function findNode(
  node: Parser.SyntaxNode,
  predicate: (node: Parser.SyntaxNode) => boolean
): Parser.SyntaxNode | null {
  if (predicate(node)) return node;
  for (const child of node.children) {
    const found = findNode(child, predicate);
    if (found) return found;
  }
  return null;
}

/**
 * Language chain from `tree` down through its first subtree at each level.
 */
export function firstSubtreeChain(tree: PolyglotTree): LanguageId[] {
  const chain: LanguageId[] = [tree.language];
  let current: PolyglotTree | undefined = tree.getSubtrees()[0];
  while (current) {
    chain.push(current.language);
    current = current.getSubtrees()[0];
  }
  return chain;
}
