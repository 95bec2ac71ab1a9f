/**
 * Centralized exports for all models
 */

export * from './brands.js';
export * from './states.js';
export * from './result.js';
export * from './errors.js';
export * from './schemas.js';
