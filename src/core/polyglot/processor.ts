/**
 * Consumers of a polyglot tree.
 */
import type { PolyglotZipper } from './zipper.js';

/**
 * Receives a zipper at the root of a tree, once per `PolyglotTree.apply`.
 * How it walks the forest from there is up to the processor.
 */
export interface PolyglotProcessor {
  process(zipper: PolyglotZipper): void;
}
