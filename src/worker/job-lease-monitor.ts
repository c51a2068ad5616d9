// Job Lease Monitor - fails processing jobs whose worker stopped renewing
// its lease, so a crashed worker cannot leave a job processing forever

import { JobRegistry } from '../core/job-registry.js';
import { logger } from '../core/utils/logger.js';

export class JobLeaseMonitor {
  private checkInterval?: NodeJS.Timeout;
  private checking = false;

  constructor(
    private registry: JobRegistry,
    private checkIntervalMs: number
  ) {}

  start(): void {
    if (this.checkInterval) {
      logger.warn('JobLeaseMonitor is already running');
      return;
    }

    this.checkInterval = setInterval(() => {
      void this.checkLeases();
    }, this.checkIntervalMs);

    logger.info(`JobLeaseMonitor started (check interval: ${this.checkIntervalMs}ms)`);
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = undefined;
    }
    logger.info('JobLeaseMonitor stopped');
  }

  /**
   * Returns the ids of jobs failed in this pass. Errors are logged.
   */
  async checkLeases(): Promise<string[]> {
    if (this.checking) return [];

    this.checking = true;
    try {
      const failed = await this.registry.failExpiredLeases();
      if (failed.length > 0) {
        logger.warn(`JobLeaseMonitor failed ${failed.length} job(s) with expired leases`);
      }
      return failed;
    } catch (error) {
      logger.error('Lease check failed:', error);
      return [];
    } finally {
      this.checking = false;
    }
  }
}
