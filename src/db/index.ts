/**
 * Database layer exports
 */

export * from './connection.js';
export * from './runs-repository.js';
export * from './events-repository.js';
