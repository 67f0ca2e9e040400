/**
 * Utility functions for the block inspector
 */

export * from './units/index.js';
export * from './block-analysis/index.js';
export * from './evm/index.js';
export * from './retry/index.js';
export * from './export/index.js';
export * from './format/index.js';
