// Export all services

export * from './condition/condition-evaluator.js';
export * from './rendering/filters.js';
export * from './rendering/string-renderer.js';
export * from './rendering/template-file-resolver.js';
export * from './rendering/project-renderer.js';
export * from './rendering/rollback.js';
export * from './variables/system-variables.js';
export * from './variables/value-checks.js';
export * from './variables/variable-resolver.js';
export * from './validation/cross-validator.js';
export * from './storage/cache.js';
export * from './config/config-service.js';
export * from './template/template-loader.js';
export * from './template/template-service.js';
export * from './hooks/index.js';
export * from './prompt/index.js';
export * from './generation/project-generator.js';
