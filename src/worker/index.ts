#!/usr/bin/env node
// Standalone worker entry point - runs a worker pool against the shared
// Redis job store, alongside an API server started with EMBEDDED_WORKERS=false

import dotenv from 'dotenv';
import { loadConfig, AppConfig } from '../core/config.js';
import type { JobRepository } from '../core/interfaces/job-repository.js';
import { JobRegistry } from '../core/job-registry.js';
import { RedisJobRepository } from '../core/redis-job-repository.js';
import { ResultStore } from '../core/result-store.js';
import type { ImageGenerator } from '../core/types/generator.js';
import { logger } from '../core/utils/logger.js';
import { createGenerator } from './generators/index.js';
import { JobLeaseMonitor } from './job-lease-monitor.js';
import { WorkerPool } from './worker-pool.js';

dotenv.config();

class Worker {
  private repository: JobRepository;
  private generator: ImageGenerator;
  private pool: WorkerPool;
  private leaseMonitor: JobLeaseMonitor;
  private store: ResultStore;

  constructor(config: AppConfig) {
    this.repository = new RedisJobRepository(config.redisUrl, {
      keyPrefix: config.redisKeyPrefix,
      recordTtlSeconds: config.jobRecordTtlSeconds,
    });
    const registry = new JobRegistry(this.repository, { leaseMs: config.jobLeaseMs });
    this.store = new ResultStore(config.resultsFolder, { ttlMs: config.jobResultTtlMs });
    this.generator = createGenerator(config.generator);
    this.pool = new WorkerPool(registry, this.store, this.generator, {
      concurrency: config.maxConcurrentJobs,
      jobTimeoutMs: config.jobTimeoutMs,
      leaseMs: config.jobLeaseMs,
      pollIntervalMs: config.workerPollIntervalMs,
      poolId: config.workerId,
    });
    this.leaseMonitor = new JobLeaseMonitor(
      registry,
      Math.max(1000, Math.floor(config.jobLeaseMs / 2))
    );
  }

  async start(): Promise<void> {
    try {
      logger.info('Starting worker service...');

      await this.repository.connect();
      await this.store.initialize();
      await this.generator.initialize();
      this.pool.start();
      this.leaseMonitor.start();

      logger.info(`Worker service ${this.pool.poolId} started successfully`);
    } catch (error) {
      logger.error('Failed to start worker service:', error);
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    logger.info('Stopping worker service...');

    this.leaseMonitor.stop();
    await this.pool.stop();
    await this.generator.cleanup();
    await this.repository.disconnect();

    logger.info('Worker service stopped successfully');
  }
}

async function main() {
  const config = loadConfig();
  if (config.jobStore !== 'redis') {
    throw new Error('FATAL: a standalone worker needs JOB_STORE=redis');
  }

  const worker = new Worker(config);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await worker.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await worker.start();
}

process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

main().catch(error => {
  logger.error('Failed to start worker:', error);
  process.exit(1);
});
