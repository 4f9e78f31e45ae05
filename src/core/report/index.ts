/**
 * Report barrel file.
 */
export * from './types.js';
export * from './schema.js';
export * from './aggregator.js';
export * from './view.js';
export * from './serializer.js';
