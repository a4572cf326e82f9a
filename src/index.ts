// Public API of the project scaffolder

export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/validation.js';
export * from './core/expression.js';
export * from './core/schemas.js';
export * from './models/index.js';
export * from './services/index.js';
