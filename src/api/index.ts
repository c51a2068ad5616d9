#!/usr/bin/env node
// API entry point - HTTP server plus, unless disabled, the embedded worker
// pool, result sweeper and lease monitor

import dotenv from 'dotenv';
import { loadConfig } from '../core/config.js';
import { ResultSweeper } from '../core/result-sweeper.js';
import { createQueueServices } from '../core/services.js';
import type { ImageGenerator } from '../core/types/generator.js';
import { logger } from '../core/utils/logger.js';
import { createGenerator } from '../worker/generators/index.js';
import { JobLeaseMonitor } from '../worker/job-lease-monitor.js';
import { WorkerPool } from '../worker/worker-pool.js';
import { ImageJobAPIServer } from './image-job-api-server.js';

dotenv.config();

async function main() {
  const config = loadConfig();

  logger.info('Starting image job API server...');
  logger.info(`Port: ${config.port}`);
  logger.info(`Job store: ${config.jobStore}${config.jobStore === 'redis' ? ` (${config.redisUrl})` : ''}`);
  logger.info(
    `Queue: ${config.maxQueueSize} jobs, ${config.maxConcurrentJobs} slot(s), timeout ${config.jobTimeoutMs}ms`
  );

  if (config.jobStore === 'memory' && !config.embeddedWorkers) {
    throw new Error('FATAL: JOB_STORE=memory requires EMBEDDED_WORKERS=true');
  }

  const services = createQueueServices(config);
  await services.repository.connect();
  await services.store.initialize();

  const apiServer = new ImageJobAPIServer(
    {
      port: config.port,
      corsOrigins: config.corsOrigins,
      maxUploadBytes: config.maxUploadBytes,
      allowedExtensions: config.allowedExtensions,
      generationDefaults: config.generationDefaults,
      resultTtlMs: config.jobResultTtlMs,
      staticDir: config.staticDir,
      profilesFile: config.profilesFile,
    },
    services
  );

  const sweeper = new ResultSweeper(
    services.store,
    config.jobResultTtlMs,
    config.resultSweepIntervalMs
  );
  const leaseMonitor = new JobLeaseMonitor(
    services.registry,
    Math.max(1000, Math.floor(config.jobLeaseMs / 2))
  );

  let pool: WorkerPool | undefined;
  let generator: ImageGenerator | undefined;
  if (config.embeddedWorkers) {
    generator = createGenerator(config.generator);
    await generator.initialize();

    const embeddedPool = new WorkerPool(services.registry, services.store, generator, {
      concurrency: config.maxConcurrentJobs,
      jobTimeoutMs: config.jobTimeoutMs,
      leaseMs: config.jobLeaseMs,
      pollIntervalMs: config.workerPollIntervalMs,
    });
    services.gate.on('admitted', () => embeddedPool.notify());
    embeddedPool.start();
    pool = embeddedPool;
  }

  // Graceful shutdown handling
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info(`Received ${signal}, shutting down API server...`);
    try {
      await apiServer.stop();
      await pool?.stop();
      await generator?.cleanup();
      leaseMonitor.stop();
      await sweeper.stop();
      await services.repository.disconnect();
      logger.info('API server shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await apiServer.start();
  sweeper.start();
  leaseMonitor.start();

  logger.info('Image job API server is running');
}

// Error handling
process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

process.on('uncaughtException', error => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

main().catch(error => {
  logger.error('API server startup failed:', error);
  process.exit(1);
});
