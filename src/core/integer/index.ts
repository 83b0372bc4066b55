export * from './fixed-width.js';
