// JobRegistry - single source of truth for job records and their lifecycle
//
// Transitions are compare-and-set in the repository: a mutator that loses a
// race returns false instead of overwriting a newer state.

import type { JobRepository } from './interfaces/job-repository.js';
import { ClaimedJob, FailureKind, Job, JobStatus, QueueCounts } from './types/job.js';
import { TimestampUtil, type Timestamp } from './utils/timestamp.js';
import { logger } from './utils/logger.js';

const UNKNOWN_ERROR = 'Unknown error';

export interface JobRegistryOptions {
  leaseMs: number;
  now?: () => Timestamp;
}

export class JobRegistry {
  private readonly leaseMs: number;
  private readonly now: () => Timestamp;

  constructor(
    private repository: JobRepository,
    options: JobRegistryOptions
  ) {
    this.leaseMs = options.leaseMs;
    this.now = options.now ?? TimestampUtil.now;
  }

  /**
   * Records a queued job unless the queue is full. The capacity check and
   * the insert happen in one repository step.
   */
  async register(job: Job, sourceImage: Buffer, maxQueueSize: number): Promise<boolean> {
    if (job.status !== JobStatus.QUEUED) {
      throw new Error(`Job ${job.id} must be registered as queued, got ${job.status}`);
    }
    return this.repository.admit(job, sourceImage, maxQueueSize);
  }

  async get(jobId: string): Promise<Job | null> {
    return this.repository.getJob(jobId);
  }

  async claimNext(workerId: string): Promise<ClaimedJob | null> {
    const startTime = this.now();
    const claimed = await this.repository.claimNext(
      workerId,
      startTime,
      TimestampUtil.addMilliseconds(startTime, this.leaseMs)
    );
    if (claimed) {
      logger.info(`Worker ${workerId} claimed job ${claimed.job.id}`);
    }
    return claimed;
  }

  async renewLease(jobId: string, workerId: string): Promise<boolean> {
    const renewed = await this.repository.renewLease(
      jobId,
      workerId,
      TimestampUtil.addMilliseconds(this.now(), this.leaseMs)
    );
    if (!renewed) {
      logger.warn(`Lease renewal for job ${jobId} by worker ${workerId} was refused`);
    }
    return renewed;
  }

  async complete(jobId: string, resultRef: string): Promise<boolean> {
    const finished = await this.repository.finish(
      jobId,
      { status: JobStatus.COMPLETED, result_ref: resultRef },
      this.now()
    );
    if (!finished) {
      logger.warn(`Job ${jobId} is no longer processing, completion not recorded`);
    }
    return finished;
  }

  async fail(jobId: string, error: string, kind: FailureKind): Promise<boolean> {
    const finished = await this.repository.finish(
      jobId,
      { status: JobStatus.FAILED, error: error || UNKNOWN_ERROR, error_kind: kind },
      this.now()
    );
    if (!finished) {
      logger.warn(`Job ${jobId} is no longer processing, failure (${kind}) not recorded`);
    }
    return finished;
  }

  /**
   * Fails every processing job whose worker stopped renewing its lease.
   * Returns the ids that were failed.
   */
  async failExpiredLeases(): Promise<string[]> {
    const expired = await this.repository.findExpiredLeases(this.now());
    const failed: string[] = [];

    for (const jobId of expired) {
      const finished = await this.repository.finish(
        jobId,
        {
          status: JobStatus.FAILED,
          error: 'Worker stopped responding before the job finished',
          error_kind: FailureKind.WORKER_LOST,
        },
        this.now()
      );
      if (finished) {
        logger.warn(`Job ${jobId} failed: worker lease expired`);
        failed.push(jobId);
      }
    }
    return failed;
  }

  async getQueuePosition(jobId: string): Promise<number | null> {
    return this.repository.getQueuePosition(jobId);
  }

  async listQueued(limit?: number): Promise<string[]> {
    return this.repository.listQueued(limit);
  }

  async getCounts(): Promise<QueueCounts> {
    return this.repository.getCounts();
  }

  async isHealthy(): Promise<boolean> {
    return this.repository.ping();
  }
}
