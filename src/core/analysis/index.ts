/**
 * Analysis barrel file.
 */
export * from './types.js';
export * from './content.js';
export * from './scoring.js';
export * from './analyzer.js';
export * from './runner.js';
