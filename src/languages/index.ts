/**
 * Language support exports barrel file.
 */
export * from './types.js';
export * from './adapters.js';
export * from './registry.js';
export * from './tree-sitter/TreeSitterUtils.js';
export { createParser, parseSource, type ParseOutcome } from './tree-sitter/grammars.js';
