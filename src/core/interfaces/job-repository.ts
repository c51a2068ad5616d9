// JobRepository interface - storage backend for job records and the FIFO queue
//
// Every method that changes state is a single atomic step in the backend, so
// callers never observe a half-applied transition.

import type { Timestamp } from '../types/timestamp.js';
import type { ClaimedJob, Job, JobOutcome, QueueCounts } from '../types/job.js';

export interface JobRepository {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  ping(): Promise<boolean>;

  /**
   * Stores a queued job and appends it to the queue unless queued + processing
   * jobs already reach `maxQueueSize`. Returns false (and writes nothing) when
   * the queue is full.
   */
  admit(job: Job, sourceImage: Buffer, maxQueueSize: number): Promise<boolean>;

  getJob(jobId: string): Promise<Job | null>;

  /**
   * Removes the head of the queue and marks it processing for `workerId`.
   */
  claimNext(
    workerId: string,
    startTime: Timestamp,
    leaseExpiresAt: Timestamp
  ): Promise<ClaimedJob | null>;

  // Extends the lease of a processing job owned by `workerId`
  renewLease(jobId: string, workerId: string, leaseExpiresAt: Timestamp): Promise<boolean>;

  /**
   * Moves a processing job to its terminal state. Returns false when the job
   * is not processing (already finished, unknown, or still queued).
   */
  finish(jobId: string, outcome: JobOutcome, finishTime: Timestamp): Promise<boolean>;

  // Ids of processing jobs whose lease expired before `now`
  findExpiredLeases(now: Timestamp): Promise<string[]>;

  // 1-based rank among queued jobs, null when the job is not queued
  getQueuePosition(jobId: string): Promise<number | null>;

  listQueued(limit?: number): Promise<string[]>;

  getCounts(): Promise<QueueCounts>;
}
