export * from './ambient-globals.js';
export * from './extraction-config-loader.js';
export * from './extraction-config-types.js';
