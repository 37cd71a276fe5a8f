/**
 * Matching barrel export.
 */
export * from './types.js';
export * from './lexer.js';
export * from './matcher.js';
