/**
 * polyglot-tree: syntax trees that span the language boundaries of
 * polyglot programs.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Trees, zippers and processors
export * from './core/polyglot/index.js';

// Language adapters
export * from './languages/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
