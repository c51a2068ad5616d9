// AdmissionGate - bounded-queue admission control for new submissions

import { EventEmitter } from 'events';
import { JobRegistry } from './job-registry.js';
import { AdmissionResult, Job, JobStatus, JobSubmission } from './types/job.js';
import { TimestampUtil, type Timestamp } from './utils/timestamp.js';
import { logger } from './utils/logger.js';

export interface AdmissionGateOptions {
  maxQueueSize: number;
  now?: () => Timestamp;
}

/**
 * Accepts a submission when fewer than `maxQueueSize` jobs are queued or
 * processing. Emits `admitted` with the new job so idle worker slots in the
 * same process can claim it without waiting for their next poll.
 */
export class AdmissionGate extends EventEmitter {
  readonly maxQueueSize: number;
  private readonly now: () => Timestamp;

  constructor(
    private registry: JobRegistry,
    options: AdmissionGateOptions
  ) {
    super();
    this.maxQueueSize = options.maxQueueSize;
    this.now = options.now ?? TimestampUtil.now;
  }

  async submit(jobId: string, submission: JobSubmission): Promise<AdmissionResult> {
    const job: Job = {
      id: jobId,
      status: JobStatus.QUEUED,
      parameters: { ...submission.parameters },
      submit_time: this.now(),
    };

    let admitted: boolean;
    try {
      admitted = await this.registry.register(job, submission.source_image, this.maxQueueSize);
    } catch (error) {
      logger.error(`Failed to store job ${jobId}:`, error);
      throw error;
    }

    if (!admitted) {
      logger.warn(`Job ${jobId} rejected: queue is at capacity (${this.maxQueueSize})`);
      return { accepted: false, reason: 'capacity_exceeded' };
    }

    logger.info(`Job ${jobId} admitted to queue`);
    this.emit('admitted', job);
    return { accepted: true, job };
  }
}
