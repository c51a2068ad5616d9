// Image Job API Server - HTTP front end for submitting image jobs and
// polling their status and results

import express, { NextFunction, Request, Response } from 'express';
import fileUpload from 'express-fileupload';
import { createServer, Server as HTTPServer } from 'http';
import path from 'path';
import { IntegrityError, NotFoundError } from '../core/errors.js';
import type { GenerationDefaults } from '../core/generation-parameters.js';
import type { QueueServices } from '../core/services.js';
import { logger } from '../core/utils/logger.js';
import type { Timestamp } from '../core/utils/timestamp.js';
import { getJobResult, getJobStatus, getQueue, submitJob } from './routes/jobs.js';
import getProfiles from './routes/profiles.js';

export interface ImageJobAPIConfig {
  port: number;
  corsOrigins: string[];
  maxUploadBytes: number;
  allowedExtensions: string[];
  generationDefaults: GenerationDefaults;
  resultTtlMs: number;
  staticDir: string;
  profilesFile: string;
  now?: () => Timestamp;
}

export class ImageJobAPIServer {
  private app: express.Express;
  private httpServer: HTTPServer;

  constructor(
    private config: ImageJobAPIConfig,
    private services: QueueServices
  ) {
    this.app = express();
    this.httpServer = createServer(this.app);

    this.setupMiddleware();
    this.setupHTTPRoutes();
    this.setupErrorHandling();
  }

  get expressApp(): express.Express {
    return this.app;
  }

  private setupMiddleware(): void {
    // CORS support
    this.app.use((req, res, next) => {
      const allowedOrigins = this.config.corsOrigins;
      const origin = req.headers.origin;

      if (allowedOrigins.includes('*') || (origin && allowedOrigins.includes(origin))) {
        res.setHeader('Access-Control-Allow-Origin', origin || '*');
      }

      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      res.setHeader('Access-Control-Allow-Credentials', 'true');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
        return;
      }

      next();
    });

    // Oversized files are truncated at the limit and rejected with 413 by the route
    this.app.use(fileUpload({ limits: { fileSize: this.config.maxUploadBytes } }));
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.urlencoded({ extended: true }));
  }

  private setupHTTPRoutes(): void {
    const { gate, registry, estimator, store } = this.services;
    const queryDeps = {
      registry,
      estimator,
      store,
      resultTtlMs: this.config.resultTtlMs,
      now: this.config.now,
    };

    this.app.get('/health', async (req: Request, res: Response) => {
      const [healthy, counts] = await Promise.all([
        registry.isHealthy(),
        registry.getCounts().catch(error => {
          logger.error('Failed to read queue counts for health check:', error);
          return null;
        }),
      ]);

      res.status(healthy && counts ? 200 : 503).json({
        status: healthy && counts ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        queue: counts
          ? { queued: counts.queued, processing: counts.processing, capacity: gate.maxQueueSize }
          : null,
      });
    });

    this.app.post(
      '/process-image',
      submitJob({
        gate,
        generationDefaults: this.config.generationDefaults,
        uploadLimits: {
          allowedExtensions: this.config.allowedExtensions,
          maxUploadBytes: this.config.maxUploadBytes,
        },
      })
    );
    this.app.get('/status/:jobId', getJobStatus(queryDeps));
    this.app.get('/result/:jobId', getJobResult(queryDeps));
    this.app.get('/queue', getQueue({ estimator }));
    this.app.get('/api/profiles', getProfiles(this.config.profilesFile));

    this.app.use(express.static(path.resolve(this.config.staticDir)));
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      res
        .status(404)
        .json({ error: 'Not Found', message: `Route ${req.method} ${req.path} not found` });
    });

    // Express recognises error handlers by their four parameters
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof NotFoundError) {
        res.status(404).json({ error: 'Not Found', message: error.message });
        return;
      }

      if (error instanceof IntegrityError) {
        logger.error(`Integrity error for job ${error.jobId}: ${error.message}`);
        res.status(500).json({ error: 'Internal Server Error', message: error.message });
        return;
      }

      logger.error(`Unhandled error on ${req.method} ${req.path}:`, error);
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'An unexpected error occurred.',
      });
    });
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.httpServer.once('error', onError);
      this.httpServer.listen(this.config.port, () => {
        this.httpServer.off('error', onError);
        resolve();
      });
    });
    logger.info(`Image job API server listening on port ${this.port}`);
  }

  async stop(): Promise<void> {
    if (!this.httpServer.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('Image job API server stopped');
  }

  // Bound port; differs from config.port when started on port 0
  get port(): number {
    const address = this.httpServer.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }
}
