// In-process job repository for single-process deployments and tests
//
// Every method body runs without awaiting, so each call is atomic with
// respect to every other call on the same event loop.

import type { JobRepository } from './interfaces/job-repository.js';
import type { Timestamp } from './types/timestamp.js';
import {
  ClaimedJob,
  Job,
  JobOutcome,
  JobStatus,
  QueueCounts,
} from './types/job.js';

interface StoredJob {
  job: Job;
  seq: number;
  source_image?: Buffer;
  lease_expires_at?: Timestamp;
}

const cloneJob = (job: Job): Job => ({ ...job, parameters: { ...job.parameters } });

export class MemoryJobRepository implements JobRepository {
  private jobs = new Map<string, StoredJob>();
  private pending: string[] = [];
  private processing = new Set<string>();
  private lastSeq = 0;
  private dequeuedSeq = 0;

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async ping(): Promise<boolean> {
    return true;
  }

  async admit(job: Job, sourceImage: Buffer, maxQueueSize: number): Promise<boolean> {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }
    if (this.pending.length + this.processing.size >= maxQueueSize) {
      return false;
    }

    this.lastSeq += 1;
    this.jobs.set(job.id, {
      job: cloneJob(job),
      seq: this.lastSeq,
      source_image: Buffer.from(sourceImage),
    });
    this.pending.push(job.id);
    return true;
  }

  async getJob(jobId: string): Promise<Job | null> {
    const stored = this.jobs.get(jobId);
    return stored ? cloneJob(stored.job) : null;
  }

  async claimNext(
    workerId: string,
    startTime: Timestamp,
    leaseExpiresAt: Timestamp
  ): Promise<ClaimedJob | null> {
    const jobId = this.pending.shift();
    if (jobId === undefined) return null;

    const stored = this.jobs.get(jobId);
    if (!stored) {
      throw new Error(`Queued job ${jobId} has no record`);
    }

    stored.job.status = JobStatus.PROCESSING;
    stored.job.start_time = startTime;
    stored.job.worker_id = workerId;
    stored.lease_expires_at = leaseExpiresAt;
    this.processing.add(jobId);
    this.dequeuedSeq = stored.seq;

    return {
      job: cloneJob(stored.job),
      source_image: stored.source_image ?? Buffer.alloc(0),
    };
  }

  async renewLease(jobId: string, workerId: string, leaseExpiresAt: Timestamp): Promise<boolean> {
    const stored = this.jobs.get(jobId);
    if (!stored || stored.job.status !== JobStatus.PROCESSING || stored.job.worker_id !== workerId) {
      return false;
    }
    stored.lease_expires_at = leaseExpiresAt;
    return true;
  }

  async finish(jobId: string, outcome: JobOutcome, finishTime: Timestamp): Promise<boolean> {
    const stored = this.jobs.get(jobId);
    if (!stored || stored.job.status !== JobStatus.PROCESSING) {
      return false;
    }

    stored.job.status = outcome.status;
    stored.job.finish_time = finishTime;
    if (outcome.status === JobStatus.COMPLETED) {
      stored.job.result_ref = outcome.result_ref;
    } else {
      stored.job.error = outcome.error;
      stored.job.error_kind = outcome.error_kind;
    }

    delete stored.source_image;
    delete stored.lease_expires_at;
    this.processing.delete(jobId);
    return true;
  }

  async findExpiredLeases(now: Timestamp): Promise<string[]> {
    const expired: string[] = [];
    for (const jobId of this.processing) {
      const lease = this.jobs.get(jobId)?.lease_expires_at;
      if (lease !== undefined && lease <= now) {
        expired.push(jobId);
      }
    }
    return expired;
  }

  async getQueuePosition(jobId: string): Promise<number | null> {
    const stored = this.jobs.get(jobId);
    if (!stored || stored.job.status !== JobStatus.QUEUED) return null;
    // Jobs leave the queue only from the head, so sequence numbers stay contiguous
    return stored.seq - this.dequeuedSeq;
  }

  async listQueued(limit?: number): Promise<string[]> {
    return limit === undefined ? [...this.pending] : this.pending.slice(0, limit);
  }

  async getCounts(): Promise<QueueCounts> {
    return { queued: this.pending.length, processing: this.processing.size };
  }
}
