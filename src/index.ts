export * from './config/index.js';
export * from './harness/index.js';
export * from './kernel/index.js';
export * from './source/index.js';
