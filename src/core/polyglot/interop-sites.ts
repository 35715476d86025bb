/**
 * Lists every interop call site across a polyglot forest.
 */
import type { SourceLocation } from '../../languages/tree-sitter/TreeSitterUtils.js';
import type { InteropCallKind, LanguageId } from '../../languages/types.js';
import type { PolyglotProcessor } from './processor.js';
import type { PolyglotZipper } from './zipper.js';

export interface InteropSite {
  kind: InteropCallKind;
  /** Language of the fragment containing the call */
  language: LanguageId;
  /** File of that fragment; null for inline fragments */
  file: string | null;
  location: SourceLocation;
  code: string;
  /** Binding name of import/export calls; always null for eval calls */
  bindingName: string | null;
  /** For eval calls: language of the linked subtree, null when not linked */
  target: LanguageId | null;
  /** Number of language boundaries crossed to reach the call */
  depth: number;
}

export class InteropSiteCollector implements PolyglotProcessor {
  private sites: InteropSite[] = [];

  process(zipper: PolyglotZipper): void {
    this.sites = [];
    this.visit(zipper, 0);
  }

  private visit(zipper: PolyglotZipper, depth: number): void {
    const kind = zipper.interopCallKind();
    let childDepth = depth;

    if (kind) {
      const first = kind === 'eval' ? zipper.firstChild() : null;
      const crossed = first !== null && first.tree !== zipper.tree;
      const start = zipper.startPosition();
      this.sites.push({
        kind,
        language: zipper.language,
        file: zipper.tree.filePath,
        location: { line: start.row + 1, column: start.column + 1 },
        code: zipper.code(),
        bindingName: kind === 'eval' ? null : zipper.bindingName(),
        target: crossed ? first.language : null,
        depth,
      });
      if (crossed) {
        childDepth = depth + 1;
      }
    }

    let child = zipper.firstChild();
    while (child) {
      this.visit(child, childDepth);
      child = child.nextSibling();
    }
  }

  getResult(): readonly InteropSite[] {
    return this.sites;
  }
}
