// Export all domain models

export * from './types.js';
export * from './variable.js';
export * from './structure.js';
export * from './action.js';
export * from './template.js';
export * from './render.js';
export * from './validation.js';
