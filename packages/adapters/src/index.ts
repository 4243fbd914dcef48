export * from './quotes/index.js';
export * from './reference/index.js';
