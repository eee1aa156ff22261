/**
 * @seqview/core: errors, logging and option validation shared by the
 * seqview packages.
 *
 * @module @seqview/core
 */

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Configuration
export * from './config/index.js';
