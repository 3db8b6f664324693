/**
 * seedsweep shared utilities
 */

export * from './types.js';
export * from './logger.js';
export * from './validation.js';
export * from './duration.js';
export * from './metrics.js';
