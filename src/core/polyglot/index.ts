/**
 * Polyglot tree exports barrel file.
 */
export * from './polyglot-tree.js';
export * from './zipper.js';
export * from './processor.js';
export * from './diagnostics.js';
export * from './argument-resolver.js';
export * from './builder.js';
export * from './tree-printer.js';
export * from './interop-sites.js';
