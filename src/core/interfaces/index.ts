export type { JobRepository } from './job-repository.js';
