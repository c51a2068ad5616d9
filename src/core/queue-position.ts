// QueuePositionEstimator - where a queued job stands, computed on demand

import { JobRegistry } from './job-registry.js';
import type { QueueSnapshot } from './types/job.js';
import { TimestampUtil, type Timestamp } from './utils/timestamp.js';

export class QueuePositionEstimator {
  private readonly now: () => Timestamp;

  constructor(
    private registry: JobRegistry,
    now?: () => Timestamp
  ) {
    this.now = now ?? TimestampUtil.now;
  }

  /**
   * 1-based rank among currently queued jobs, in submission order. Null for
   * jobs that are processing, finished or unknown. May be stale by the time
   * the caller reads it.
   */
  async position(jobId: string): Promise<number | null> {
    return this.registry.getQueuePosition(jobId);
  }

  async snapshot(limit?: number): Promise<QueueSnapshot> {
    const takenAt = this.now();
    const jobIds = await this.registry.listQueued(limit);
    return { job_ids: jobIds, taken_at: takenAt };
  }
}
