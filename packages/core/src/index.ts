// Public API - resource model used by the CLI and any host application
export * from './culture-key.js';
export * from './errors.js';
export * from './resource-language.js';
export * from './value-projection.js';
export * from './format-parameters.js';
export * from './resource-entry.js';
export * from './resource-entity.js';
export * from './entity-report.js';
export * from './config/index.js';

// Internal API - helpers shared with the CLI
export * from './change-notifier.js';
export * from './debug.js';
export * from './hash.js';
