/**
 * filequal - file quality analysis engine.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Rules
export * from './core/rules/index.js';

// Discovery
export * from './core/discovery/index.js';

// Cache
export * from './core/cache/index.js';

// Analysis
export * from './core/analysis/index.js';

// Reports
export * from './core/report/index.js';

export { ENGINE_VERSION, REPORT_FORMAT_VERSION } from './core/version.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
