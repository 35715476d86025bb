/**
 * Renders a polyglot forest as an indented outline, one node per line.
 * Leaves are followed by their source text; evaluate calls are followed by
 * the root of their subtree.
 */
import type { PolyglotProcessor } from './processor.js';
import type { PolyglotZipper } from './zipper.js';

export interface TreePrinterOptions {
  /** Indentation per level (default two spaces) */
  indent?: string;
}

export class TreePrinter implements PolyglotProcessor {
  private readonly indent: string;
  private lines: string[] = [];

  constructor(options: TreePrinterOptions = {}) {
    this.indent = options.indent ?? '  ';
  }

  process(zipper: PolyglotZipper): void {
    this.lines = [];
    this.print(zipper, 0);
  }

  private print(zipper: PolyglotZipper, depth: number): void {
    const prefix = this.indent.repeat(depth);
    let child = zipper.firstChild();

    if (!child) {
      this.lines.push(`${prefix}${zipper.kind()} ${JSON.stringify(zipper.code())}`);
      return;
    }

    this.lines.push(`${prefix}${zipper.kind()}`);
    while (child) {
      this.print(child, depth + 1);
      child = child.nextSibling();
    }
  }

  getResult(): string {
    return this.lines.join('\n');
  }
}
