export * from './base.js';
export * from './build-executor.js';
export * from './execa-invoker.js';
