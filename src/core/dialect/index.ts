/**
 * Dialect exports barrel file.
 */
export * from './segment.js';
export * from './dialect.js';
export * from './resolver.js';
export * from './registry.js';
export * from './schema.js';
export * from './loader.js';
export * from './export.js';
