// Public API — everything a host process needs to keep project caches fresh
export * from './core/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './projects/index.js';
export * from './loaders/index.js';
export * from './infrastructure/index.js';
export * from './scheduling/index.js';
