export * from './alert.types.js';
