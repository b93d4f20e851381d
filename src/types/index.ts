/**
 * vastcheck type exports.
 */

export * from './exit-codes.js';
export * from './rules.js';
export * from './validation.js';
export * from './config.js';
