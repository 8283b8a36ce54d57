export * from './entry-points.js';
export * from './load-extraction-source.js';
export * from './name-bindings.js';
export * from './neutralize-source.js';
export * from './syntax-support.js';
export * from './transpile-source.js';
