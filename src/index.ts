/**
 * rect-area: overflow-aware rectangle area computation.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Integer types
export * from './core/integer/index.js';

// Area computation
export * from './core/area/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
