// ResultSweeper - periodic eviction of expired result artifacts

import { ResultStore } from './result-store.js';
import { logger } from './utils/logger.js';

export class ResultSweeper {
  private sweepInterval?: NodeJS.Timeout;
  private running?: Promise<number>;

  constructor(
    private store: ResultStore,
    private ttlMs: number,
    private intervalMs: number
  ) {}

  /**
   * Sweeps once immediately, then every `intervalMs`.
   */
  start(): void {
    if (this.sweepInterval) {
      logger.warn('ResultSweeper is already running');
      return;
    }

    void this.runOnce();
    this.sweepInterval = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);

    logger.info(
      `ResultSweeper started (interval: ${this.intervalMs}ms, ttl: ${this.ttlMs}ms)`
    );
  }

  async stop(): Promise<void> {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = undefined;
    }
    await this.running;
    logger.info('ResultSweeper stopped');
  }

  /**
   * Runs one sweep unless one is already in progress. Never rejects; returns
   * the number of deleted artifacts, or 0 when skipped or failed.
   */
  async runOnce(): Promise<number> {
    if (this.running) {
      logger.debug('Previous result sweep still running, skipping');
      return 0;
    }

    this.running = this.sweep();
    try {
      return await this.running;
    } finally {
      this.running = undefined;
    }
  }

  private async sweep(): Promise<number> {
    try {
      const deleted = await this.store.sweep(this.ttlMs);
      if (deleted > 0) {
        logger.info(`Result sweep removed ${deleted} expired artifact(s)`);
      } else {
        logger.debug('Result sweep found no expired artifacts');
      }
      return deleted;
    } catch (error) {
      logger.error('Result sweep failed:', error);
      return 0;
    }
  }
}
