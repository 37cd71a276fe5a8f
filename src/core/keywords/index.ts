/**
 * Keyword exports barrel file.
 */
export * from './keyword-set.js';
export * from './keyword-loader.js';
