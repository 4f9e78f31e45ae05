/**
 * Result cache barrel file.
 */
export * from './types.js';
export * from './decode.js';
export * from './sqlite-cache.js';
export * from './memory-cache.js';
export * from './open.js';
