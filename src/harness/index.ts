export * from './logger.js';
export * from './run-extraction.js';
