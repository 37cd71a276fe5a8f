/**
 * Configuration barrel export.
 */
export * from './schema.js';
export * from './loader.js';
