// Core type definitions

export type { Timestamp } from './timestamp.js';
export * from './job.js';
export type * from './generator.js';
