/**
 * Rules barrel file.
 */
export * from './types.js';
export * from './base.js';
export * from './size.js';
export * from './encoding.js';
export * from './whitespace.js';
export * from './naming.js';
export * from './duplication.js';
export * from './registry.js';
export * from './builtin.js';
