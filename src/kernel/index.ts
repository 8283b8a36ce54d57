export * from './capability.js';
export * from './capability-resolver.js';
export * from './collector.js';
export * from './container-variants.js';
export * from './declaration-nodes.js';
export * from './declaration-registry.js';
export * from './diagnostics.js';
export * from './extraction-error.js';
export * from './graph-serializer.js';
export * from './interpreter.js';
export * from './operators.js';
export * from './output-validator.js';
export * from './quest-variants.js';
export * from './requirement-variants.js';
export * from './schemas-document.js';
export * from './scope.js';
export * from './variant-arguments.js';
