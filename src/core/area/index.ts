/**
 * Area computation barrel.
 */
export * from './types.js';
export * from './validator.js';
export * from './calculator.js';
export * from './engine.js';
