/**
 * Grammar exports barrel file.
 */
export * from './types.js';
export * from './builders.js';
export * from './wrapper.js';
export * from './walk.js';
export * from './schema.js';
export * from './describe.js';
