// Queue services - wires the repository, registry, admission gate, position
// estimator and result store from one AppConfig

import { AdmissionGate } from './admission-gate.js';
import type { AppConfig } from './config.js';
import type { JobRepository } from './interfaces/job-repository.js';
import { JobRegistry } from './job-registry.js';
import { MemoryJobRepository } from './memory-job-repository.js';
import { QueuePositionEstimator } from './queue-position.js';
import { RedisJobRepository } from './redis-job-repository.js';
import { ResultStore } from './result-store.js';
import type { Timestamp } from './types/timestamp.js';

export interface QueueServices {
  repository: JobRepository;
  registry: JobRegistry;
  gate: AdmissionGate;
  estimator: QueuePositionEstimator;
  store: ResultStore;
}

export function createJobRepository(config: AppConfig): JobRepository {
  if (config.jobStore === 'memory') {
    return new MemoryJobRepository();
  }
  return new RedisJobRepository(config.redisUrl, {
    keyPrefix: config.redisKeyPrefix,
    recordTtlSeconds: config.jobRecordTtlSeconds,
  });
}

export function createQueueServices(
  config: AppConfig,
  repository: JobRepository = createJobRepository(config),
  now?: () => Timestamp
): QueueServices {
  const registry = new JobRegistry(repository, { leaseMs: config.jobLeaseMs, now });
  return {
    repository,
    registry,
    gate: new AdmissionGate(registry, { maxQueueSize: config.maxQueueSize, now }),
    estimator: new QueuePositionEstimator(registry, now),
    store: new ResultStore(config.resultsFolder, { ttlMs: config.jobResultTtlMs, now }),
  };
}
