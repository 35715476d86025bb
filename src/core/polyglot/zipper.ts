/**
 * Read-only cursor over a polyglot tree forest.
 *
 * A zipper is a (tree, node) pair. Moving to the first child of an evaluate
 * call that has a subtree replaces the pair with (subtree, subtree root);
 * every other movement stays inside the current tree.
 */
import type Parser from 'tree-sitter';
import type { InteropCallKind, LanguageId } from '../../languages/types.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import type { PolyglotTree } from './polyglot-tree.js';

export interface ZipperPosition {
  readonly tree: PolyglotTree;
  readonly node: Parser.SyntaxNode;
}

/** Kind reported for interop call nodes in place of the parser's own kind. */
export const INTEROP_NODE_KINDS = {
  eval: 'interop-evaluate-call',
  import: 'interop-import-call',
  export: 'interop-export-call',
} as const satisfies Record<InteropCallKind, string>;

export type InteropNodeKind = (typeof INTEROP_NODE_KINDS)[InteropCallKind];

export class PolyglotZipper {
  private constructor(private position: ZipperPosition) {}

  /**
   * A zipper positioned at the root of `tree`.
   */
  static fromTree(tree: PolyglotTree): PolyglotZipper {
    return new PolyglotZipper({ tree, node: tree.rootNode });
  }

  /** The tree the current node belongs to */
  get tree(): PolyglotTree {
    return this.position.tree;
  }

  get node(): Parser.SyntaxNode {
    return this.position.node;
  }

  get language(): LanguageId {
    return this.position.tree.language;
  }

  /** Current (tree, node) pair; replaced, never mutated, on movement */
  get current(): ZipperPosition {
    return this.position;
  }

  clone(): PolyglotZipper {
    return new PolyglotZipper(this.position);
  }

  /** The interop call family of the node, or null for any other node */
  interopCallKind(): InteropCallKind | null {
    return this.position.tree.classifyCall(this.position.node);
  }

  isEvalCall(): boolean {
    return this.interopCallKind() === 'eval';
  }

  isImportCall(): boolean {
    return this.interopCallKind() === 'import';
  }

  isExportCall(): boolean {
    return this.interopCallKind() === 'export';
  }

  /**
   * The node's kind, or one of INTEROP_NODE_KINDS for interop calls.
   */
  kind(): string {
    const callKind = this.interopCallKind();
    return callKind ? INTEROP_NODE_KINDS[callKind] : this.position.node.type;
  }

  /** Source text spanned by the node */
  code(): string {
    return this.position.tree.nodeText(this.position.node);
  }

  startPosition(): Parser.Point {
    return this.position.node.startPosition;
  }

  endPosition(): Parser.Point {
    return this.position.node.endPosition;
  }

  /**
   * Binding name of an import or export call; null when the language gives
   * it no static name.
   *
   * @throws InvalidArgumentError when the node is neither an import nor an export call
   */
  bindingName(): string | null {
    const callKind = this.interopCallKind();
    if (callKind !== 'import' && callKind !== 'export') {
      throw new InvalidArgumentError(
        `bindingName() is only valid on ${INTEROP_NODE_KINDS.import} and ${INTEROP_NODE_KINDS.export} nodes, not ${this.kind()}`
      );
    }
    return this.position.tree.bindingName(this.position.node);
  }

  private linkedSubtree(): PolyglotTree | undefined {
    return this.position.tree.getSubtree(this.position.node);
  }

  /** Number of children; a linked evaluate call has exactly one */
  get childCount(): number {
    return this.linkedSubtree() ? 1 : this.position.node.childCount;
  }

  private rootOf(tree: PolyglotTree): ZipperPosition {
    return { tree, node: tree.rootNode };
  }

  private firstChildPosition(): ZipperPosition | null {
    const subtree = this.linkedSubtree();
    if (subtree) {
      return this.rootOf(subtree);
    }
    const child = this.position.node.firstChild;
    return child ? { tree: this.position.tree, node: child } : null;
  }

  private moveTo(position: ZipperPosition | null): boolean {
    if (!position) {
      return false;
    }
    this.position = position;
    return true;
  }

  /**
   * Moves to the first child, crossing into the linked subtree when the
   * node is an evaluate call. Returns false and stays put when there is none.
   */
  gotoFirstChild(): boolean {
    return this.moveTo(this.firstChildPosition());
  }

  /** Moves to the next sibling within the current tree. */
  gotoNextSibling(): boolean {
    const sibling = this.position.node.nextSibling;
    return this.moveTo(sibling ? { tree: this.position.tree, node: sibling } : null);
  }

  /** Moves to the previous sibling within the current tree. */
  gotoPrevSibling(): boolean {
    const sibling = this.position.node.previousSibling;
    return this.moveTo(sibling ? { tree: this.position.tree, node: sibling } : null);
  }

  firstChild(): PolyglotZipper | null {
    const position = this.firstChildPosition();
    return position ? new PolyglotZipper(position) : null;
  }

  /**
   * Zipper for the child at index `i`. On an evaluate call this is the root
   * of the linked subtree whatever `i` is, or null when the call has none.
   */
  child(i: number): PolyglotZipper | null {
    if (this.isEvalCall()) {
      const subtree = this.linkedSubtree();
      return subtree ? new PolyglotZipper(this.rootOf(subtree)) : null;
    }
    const node = this.position.node.child(i);
    return node ? new PolyglotZipper({ tree: this.position.tree, node }) : null;
  }

  nextSibling(): PolyglotZipper | null {
    const copy = this.clone();
    return copy.gotoNextSibling() ? copy : null;
  }

  prevSibling(): PolyglotZipper | null {
    const copy = this.clone();
    return copy.gotoPrevSibling() ? copy : null;
  }
}
