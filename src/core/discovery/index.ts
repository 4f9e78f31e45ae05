/**
 * File discovery barrel file.
 */
export * from './types.js';
export * from './walker.js';
