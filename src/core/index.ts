// Core module exports
export * from './types/index.js';
export * from './interfaces/index.js';
export * from './errors.js';
export * from './config.js';
export * from './generation-parameters.js';
export * from './memory-job-repository.js';
export * from './redis-job-repository.js';
export * from './job-registry.js';
export * from './admission-gate.js';
export * from './queue-position.js';
export * from './result-store.js';
export * from './result-sweeper.js';
export * from './services.js';
export * from './utils/index.js';
