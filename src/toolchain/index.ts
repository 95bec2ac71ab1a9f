export * from './base.js';
export * from './environment.js';
export * from './factory.js';
export * from './installer.js';
export * from './linux.js';
export * from './macos.js';
export * from './windows.js';
export * from './version.js';
