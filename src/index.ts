/**
 * dialect-forge: composable SQL dialect grammars.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Keywords
export * from './core/keywords/index.js';

// Grammar
export * from './core/grammar/index.js';

// Dialects and registry
export * from './core/dialect/index.js';

// Matching
export * from './core/matching/index.js';

// Built-in dialects
export * from './dialects/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
