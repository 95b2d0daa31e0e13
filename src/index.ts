/**
 * REASON - simulated disease-analysis harness
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Storage: document cache + dataset store
export * from './storage/index.js';

// Knowledge: disease, pathway, drug, literature and validation lookups
export * from './knowledge/index.js';

// Pipeline: staged analysis run and result artifacts
export * from './pipeline/index.js';

// Config
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// CLI
export * from './cli/exports.js';
