/**
 * @rigkeeper/core -- shared types, errors and utilities.
 */

export * from './errors/index.js';
export * from './interfaces/observer.js';
export * from './types/config.js';
export * from './utils/index.js';
