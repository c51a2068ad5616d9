export * from './logger.js';
export { TimestampUtil } from './timestamp.js';
export * from './validation.js';
