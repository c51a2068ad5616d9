// WorkerPool - fixed number of execution slots that claim queued jobs in FIFO
// order, run the generator and record the outcome

import { v4 as uuidv4 } from 'uuid';
import { GeneratorFailure } from '../core/errors.js';
import { JobRegistry } from '../core/job-registry.js';
import { ResultStore } from '../core/result-store.js';
import type { GeneratedImage, ImageGenerator } from '../core/types/generator.js';
import { ClaimedJob, FailureKind, Job } from '../core/types/job.js';
import { logger } from '../core/utils/logger.js';

export interface WorkerPoolOptions {
  concurrency: number;
  jobTimeoutMs: number;
  leaseMs: number;
  // How long an idle slot sleeps before checking the queue again
  pollIntervalMs: number;
  poolId?: string;
}

export class WorkerPool {
  readonly poolId: string;
  private running = false;
  private slots: Promise<void>[] = [];
  private waiters = new Set<() => void>();
  private activeJobs = new Map<string, string>();

  constructor(
    private registry: JobRegistry,
    private store: ResultStore,
    private generator: ImageGenerator,
    private options: WorkerPoolOptions
  ) {
    if (options.concurrency < 1) {
      throw new Error(`Worker pool needs at least one slot, got ${options.concurrency}`);
    }
    this.poolId = options.poolId ?? `pool-${uuidv4().slice(0, 8)}`;
  }

  get activeCount(): number {
    return this.activeJobs.size;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      logger.warn(`Worker pool ${this.poolId} is already running`);
      return;
    }

    this.running = true;
    for (let i = 1; i <= this.options.concurrency; i++) {
      this.slots.push(this.runSlot(`${this.poolId}-slot-${i}`));
    }

    logger.info(
      `Worker pool ${this.poolId} started with ${this.options.concurrency} slot(s) using generator ${this.generator.name}`
    );
  }

  /**
   * Stops claiming new jobs and waits for in-flight jobs to finish.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    logger.info(`Stopping worker pool ${this.poolId} (${this.activeJobs.size} job(s) in flight)`);
    this.running = false;
    this.notify();
    await Promise.all(this.slots);
    this.slots = [];
    logger.info(`Worker pool ${this.poolId} stopped`);
  }

  // Wakes idle slots, e.g. when a job was just admitted in this process
  notify(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }

  private async runSlot(slotId: string): Promise<void> {
    while (this.running) {
      let claimed: ClaimedJob | null;
      try {
        claimed = await this.registry.claimNext(slotId);
      } catch (error) {
        logger.error(`Worker ${slotId} failed to claim a job:`, error);
        await this.waitForWork();
        continue;
      }

      if (!claimed) {
        await this.waitForWork();
        continue;
      }

      await this.executeJob(slotId, claimed);
    }
  }

  private waitForWork(): Promise<void> {
    return new Promise(resolve => {
      if (!this.running) {
        resolve();
        return;
      }
      let timer: NodeJS.Timeout | undefined;
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      this.waiters.add(done);
      timer = setTimeout(done, this.options.pollIntervalMs);
    });
  }

  private async executeJob(slotId: string, claimed: ClaimedJob): Promise<void> {
    const { job, source_image } = claimed;
    const startedAt = Date.now();
    this.activeJobs.set(job.id, slotId);

    let leaseLost = false;
    const leaseTimer = setInterval(
      () => {
        void this.renewLease(job.id, slotId).then(renewed => {
          if (!renewed) leaseLost = true;
        });
      },
      Math.max(1, Math.floor(this.options.leaseMs / 3))
    );

    logger.info(
      `Worker ${slotId} starting job ${job.id} (${job.parameters.width}x${job.parameters.height}, ${job.parameters.num_inference_steps} steps)`
    );

    try {
      let image: GeneratedImage;
      try {
        image = await this.generateWithTimeout(job, source_image);
      } catch (error) {
        const failure = GeneratorFailure.from(error);
        logger.error(
          `Worker ${slotId} job ${job.id} failed (${failure.kind}) after ${Date.now() - startedAt}ms: ${failure.message}`
        );
        await this.registry.fail(job.id, failure.message, failure.kind);
        return;
      }

      if (leaseLost) {
        logger.warn(`Worker ${slotId} lost the lease on job ${job.id}, discarding its result`);
        return;
      }

      let resultRef: string;
      try {
        resultRef = await this.store.put(job.id, image.data);
      } catch (error) {
        logger.error(`Worker ${slotId} could not store the result of job ${job.id}:`, error);
        const message = error instanceof Error ? error.message : String(error);
        await this.registry.fail(
          job.id,
          `Failed to store result: ${message}`,
          FailureKind.INTERNAL_ERROR
        );
        return;
      }

      if (!(await this.registry.complete(job.id, resultRef))) {
        // Already finalised elsewhere, most likely failed by the lease monitor
        await this.store.remove(job.id);
        return;
      }
      logger.info(`Worker ${slotId} completed job ${job.id} in ${Date.now() - startedAt}ms`);
    } catch (error) {
      // The lease monitor fails the job once its lease runs out
      logger.error(`Worker ${slotId} could not record the outcome of job ${job.id}:`, error);
    } finally {
      clearInterval(leaseTimer);
      this.activeJobs.delete(job.id);
    }
  }

  private async generateWithTimeout(job: Job, sourceImage: Buffer): Promise<GeneratedImage> {
    const timeoutMs = this.options.jobTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const failure = GeneratorFailure.timeout(timeoutMs);
        controller.abort(failure);
        reject(failure);
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.generator.generate({
          job_id: job.id,
          parameters: job.parameters,
          source_image: sourceImage,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  // Resolves false only when the store refused the renewal
  private async renewLease(jobId: string, slotId: string): Promise<boolean> {
    try {
      return await this.registry.renewLease(jobId, slotId);
    } catch (error) {
      logger.warn(`Worker ${slotId} failed to renew lease for job ${jobId}:`, error);
      return true;
    }
  }
}
