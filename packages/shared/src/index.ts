// Types
export * from './types/stack.js';
export * from './types/plan.js';
export * from './types/operation.js';
export * from './types/progress.js';
export * from './types/health.js';
export * from './types/swap.js';

// Schemas
export * from './schemas/stackDescription.js';
export * from './schemas/persisted.js';
