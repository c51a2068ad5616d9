// Redis job repository - job hashes, a sequence-scored pending zset and a
// processing set, shared by the API process and any standalone workers

import { Redis } from 'ioredis';
import type { JobRepository } from './interfaces/job-repository.js';
import type { Timestamp } from './types/timestamp.js';
import {
  ClaimedJob,
  GenerationParameters,
  isFailureKind,
  isJobStatus,
  Job,
  JobOutcome,
  JobStatus,
  QueueCounts,
} from './types/job.js';
import {
  ADMIT_JOB_SCRIPT,
  CLAIM_JOB_SCRIPT,
  FINISH_JOB_SCRIPT,
  RENEW_LEASE_SCRIPT,
} from './redis-scripts.js';
import { logger } from './utils/logger.js';
import { TimestampUtil } from './utils/timestamp.js';

export interface RedisJobRepositoryOptions {
  keyPrefix: string;
  // Seconds a terminal job record is kept; 0 keeps it forever
  recordTtlSeconds: number;
}

const optionalString = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

export class RedisJobRepository implements JobRepository {
  private redis: Redis;
  private ownsConnection: boolean;
  private keys: {
    pending: string;
    processing: string;
    seq: string;
    dequeuedSeq: string;
    jobPrefix: string;
  };

  constructor(
    connection: string | Redis,
    private options: RedisJobRepositoryOptions
  ) {
    if (typeof connection === 'string') {
      this.redis = new Redis(connection, {
        enableReadyCheck: true,
        maxRetriesPerRequest: 3,
        lazyConnect: true,
      });
      this.ownsConnection = true;
      this.setupEventHandlers();
    } else {
      this.redis = connection;
      this.ownsConnection = false;
    }

    const prefix = options.keyPrefix;
    this.keys = {
      pending: `${prefix}jobs:pending`,
      processing: `${prefix}jobs:processing`,
      seq: `${prefix}jobs:seq`,
      dequeuedSeq: `${prefix}jobs:dequeued_seq`,
      jobPrefix: `${prefix}job:`,
    };
  }

  private setupEventHandlers(): void {
    this.redis.on('connect', () => {
      logger.info('Redis connected');
    });

    this.redis.on('close', () => {
      logger.warn('Redis connection closed');
    });

    this.redis.on('error', error => {
      logger.error('Redis error:', error);
    });
  }

  private jobKey(jobId: string): string {
    return `${this.keys.jobPrefix}${jobId}`;
  }

  async connect(): Promise<void> {
    if (this.ownsConnection && this.redis.status === 'wait') {
      await this.redis.connect();
    }
    await this.redis.ping();
    logger.info('Redis job repository connected');
  }

  async disconnect(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.quit();
    }
    logger.info('Redis job repository disconnected');
  }

  async ping(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch {
      return false;
    }
  }

  async admit(job: Job, sourceImage: Buffer, maxQueueSize: number): Promise<boolean> {
    const result = await this.redis.eval(
      ADMIT_JOB_SCRIPT,
      4,
      this.keys.pending,
      this.keys.processing,
      this.keys.seq,
      this.jobKey(job.id),
      maxQueueSize.toString(),
      job.id,
      JSON.stringify(job.parameters),
      job.submit_time.toString(),
      sourceImage.toString('base64')
    );

    const seq = Number(result);
    if (seq === -1) {
      throw new Error(`Job ${job.id} already exists`);
    }
    return seq > 0;
  }

  async getJob(jobId: string): Promise<Job | null> {
    const data = await this.redis.hgetall(this.jobKey(jobId));
    if (!data.id) return null;
    return this.parseJob(data);
  }

  async claimNext(
    workerId: string,
    startTime: Timestamp,
    leaseExpiresAt: Timestamp
  ): Promise<ClaimedJob | null> {
    const result = await this.redis.eval(
      CLAIM_JOB_SCRIPT,
      3,
      this.keys.pending,
      this.keys.processing,
      this.keys.dequeuedSeq,
      this.keys.jobPrefix,
      startTime.toString(),
      leaseExpiresAt.toString(),
      workerId
    );
    if (typeof result !== 'string' || result === '') return null;

    const data = await this.redis.hgetall(this.jobKey(result));
    if (!data.id) {
      throw new Error(`Claimed job ${result} has no record`);
    }

    return {
      job: this.parseJob(data),
      source_image: Buffer.from(data.source_image ?? '', 'base64'),
    };
  }

  async renewLease(jobId: string, workerId: string, leaseExpiresAt: Timestamp): Promise<boolean> {
    const result = await this.redis.eval(
      RENEW_LEASE_SCRIPT,
      1,
      this.jobKey(jobId),
      workerId,
      leaseExpiresAt.toString()
    );
    return Number(result) === 1;
  }

  async finish(jobId: string, outcome: JobOutcome, finishTime: Timestamp): Promise<boolean> {
    const resultRef = outcome.status === JobStatus.COMPLETED ? outcome.result_ref : '';
    const error = outcome.status === JobStatus.FAILED ? outcome.error : '';
    const errorKind = outcome.status === JobStatus.FAILED ? outcome.error_kind : '';

    const result = await this.redis.eval(
      FINISH_JOB_SCRIPT,
      2,
      this.jobKey(jobId),
      this.keys.processing,
      jobId,
      outcome.status,
      finishTime.toString(),
      resultRef,
      error,
      errorKind,
      this.options.recordTtlSeconds.toString()
    );
    return Number(result) === 1;
  }

  async findExpiredLeases(now: Timestamp): Promise<string[]> {
    const jobIds = await this.redis.smembers(this.keys.processing);
    if (jobIds.length === 0) return [];

    const pipeline = this.redis.pipeline();
    for (const jobId of jobIds) {
      pipeline.hget(this.jobKey(jobId), 'lease_expires_at');
    }
    const results = (await pipeline.exec()) ?? [];

    const expired: string[] = [];
    jobIds.forEach((jobId, index) => {
      const [error, value] = results[index] ?? [null, null];
      if (error) {
        logger.warn(`Failed to read lease for job ${jobId}:`, error);
        return;
      }
      // A processing id without a lease has lost its record
      if (typeof value !== 'string' || Number(value) <= now) {
        expired.push(jobId);
      }
    });
    return expired;
  }

  async getQueuePosition(jobId: string): Promise<number | null> {
    const results = await this.redis
      .multi()
      .hmget(this.jobKey(jobId), 'status', 'seq')
      .get(this.keys.dequeuedSeq)
      .exec();
    if (!results) return null;

    const [[jobError, fields], [seqError, dequeued]] = results;
    if (jobError) throw jobError;
    if (seqError) throw seqError;
    if (!Array.isArray(fields)) return null;

    const status: unknown = fields[0];
    const seq: unknown = fields[1];
    if (status !== JobStatus.QUEUED || typeof seq !== 'string') return null;

    const dequeuedSeq = typeof dequeued === 'string' ? Number(dequeued) : 0;
    // Jobs leave the queue only from the head, so sequence numbers stay contiguous
    return Number(seq) - dequeuedSeq;
  }

  async listQueued(limit?: number): Promise<string[]> {
    if (limit !== undefined && limit <= 0) return [];
    return this.redis.zrange(this.keys.pending, 0, limit === undefined ? -1 : limit - 1);
  }

  async getCounts(): Promise<QueueCounts> {
    const [queued, processing] = await Promise.all([
      this.redis.zcard(this.keys.pending),
      this.redis.scard(this.keys.processing),
    ]);
    return { queued, processing };
  }

  private parseJob(data: Record<string, string>): Job {
    const status = data.status ?? '';
    if (!isJobStatus(status)) {
      throw new Error(`Job ${data.id} has unknown status '${status}'`);
    }
    const parameters: GenerationParameters = JSON.parse(data.parameters ?? '{}');

    const job: Job = {
      id: data.id ?? '',
      status,
      parameters,
      submit_time: TimestampUtil.parseOptional(data.submit_time) ?? 0,
    };

    const startTime = TimestampUtil.parseOptional(data.start_time);
    const finishTime = TimestampUtil.parseOptional(data.finish_time);
    const resultRef = optionalString(data.result_ref);
    const error = optionalString(data.error);
    const workerId = optionalString(data.worker_id);
    const errorKind = data.error_kind ?? '';

    if (startTime !== undefined) job.start_time = startTime;
    if (finishTime !== undefined) job.finish_time = finishTime;
    if (resultRef !== undefined) job.result_ref = resultRef;
    if (error !== undefined) job.error = error;
    if (isFailureKind(errorKind)) job.error_kind = errorKind;
    if (workerId !== undefined) job.worker_id = workerId;

    return job;
  }
}
