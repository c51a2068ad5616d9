// Job routes - submission, status and result retrieval

import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { AdmissionGate } from '../../core/admission-gate.js';
import { IntegrityError, NotFoundError, ValidationError } from '../../core/errors.js';
import {
  GenerationDefaults,
  parseGenerationParameters,
} from '../../core/generation-parameters.js';
import { JobRegistry } from '../../core/job-registry.js';
import { QueuePositionEstimator } from '../../core/queue-position.js';
import { ResultStore } from '../../core/result-store.js';
import {
  Job,
  JobStatus,
  JobStatusResponse,
  JobSubmissionResponse,
} from '../../core/types/job.js';
import { logger } from '../../core/utils/logger.js';
import { TimestampUtil, type Timestamp } from '../../core/utils/timestamp.js';
import { readUploadedImage, UploadLimits } from '../request-validation.js';

// The artifact is written just before finish_time is recorded
const FINISH_CLOCK_TOLERANCE_MS = 1000;

export interface SubmitJobDeps {
  gate: AdmissionGate;
  generationDefaults: GenerationDefaults;
  uploadLimits: UploadLimits;
}

export interface JobQueryDeps {
  registry: JobRegistry;
  estimator: QueuePositionEstimator;
  store: ResultStore;
  resultTtlMs: number;
  now?: () => Timestamp;
}

export function toStatusResponse(job: Job, queuePosition: number | null): JobStatusResponse {
  return {
    job_id: job.id,
    status: job.status,
    queue_position: job.status === JobStatus.QUEUED ? queuePosition : null,
    result_ref: job.result_ref ?? null,
    error: job.error ?? null,
    error_kind: job.error_kind ?? null,
    submit_time: TimestampUtil.toISO(job.submit_time),
    start_time: TimestampUtil.toISOOrNull(job.start_time),
    finish_time: TimestampUtil.toISOOrNull(job.finish_time),
  };
}

export function submitJob(deps: SubmitJobDeps) {
  return async function (req: Request, res: Response, next: NextFunction) {
    const jobId = uuidv4();
    try {
      const sourceImage = await readUploadedImage(req.files?.image, deps.uploadLimits);
      const parameters = parseGenerationParameters(req.body, deps.generationDefaults);

      const result = await deps.gate.submit(jobId, { parameters, source_image: sourceImage });
      if (!result.accepted) {
        res.status(503).json({
          error: 'Service Unavailable',
          message: 'Server is currently busy or unable to queue new jobs. Please try again later.',
        });
        return;
      }

      const body: JobSubmissionResponse = {
        message: 'Request accepted and queued.',
        job_id: jobId,
        status_url: `/status/${jobId}`,
        result_url: `/result/${jobId}`,
      };
      res.status(202).json(body);
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn(`Rejected submission ${jobId}: ${error.message}`);
        res.status(error.statusCode).json({
          error: error.statusCode === 413 ? 'Payload Too Large' : 'Bad Request',
          message: error.message,
        });
        return;
      }
      next(error);
    }
  };
}

export function getJobStatus(deps: JobQueryDeps) {
  return async function (req: Request, res: Response, next: NextFunction) {
    const { jobId } = req.params;
    try {
      const job = await deps.registry.get(jobId);
      if (!job) {
        throw new NotFoundError(jobId);
      }

      const position =
        job.status === JobStatus.QUEUED ? await deps.estimator.position(jobId) : null;
      res.json(toStatusResponse(job, position));
    } catch (error) {
      next(error);
    }
  };
}

export function getJobResult(deps: JobQueryDeps) {
  const now = deps.now ?? TimestampUtil.now;

  return async function (req: Request, res: Response, next: NextFunction) {
    const { jobId } = req.params;
    try {
      const job = await deps.registry.get(jobId);
      if (!job) {
        throw new NotFoundError(jobId);
      }

      if (job.status === JobStatus.FAILED) {
        res.status(500).json({
          error: 'Job Failed',
          message: job.error ?? 'An unknown error occurred.',
          error_kind: job.error_kind ?? null,
        });
        return;
      }

      if (job.status !== JobStatus.COMPLETED) {
        res.status(202).json({
          status: job.status,
          message: `Job is not yet complete. Current status: ${job.status}`,
        });
        return;
      }

      const result = await deps.store.lookup(jobId);
      if (result.state === 'available') {
        res.setHeader('Content-Type', 'image/png');
        res.setHeader('Content-Disposition', `inline; filename="${jobId}.png"`);
        res.send(result.data);
        return;
      }

      const finishedAt = job.finish_time ?? job.submit_time;
      const tolerance = Math.min(FINISH_CLOCK_TOLERANCE_MS, deps.resultTtlMs / 2);
      const expired =
        result.state === 'expired' || now() - finishedAt >= deps.resultTtlMs - tolerance;
      if (expired) {
        res.status(404).json({
          error: 'Not Found',
          message: `Result for job ${jobId} has expired`,
        });
        return;
      }

      throw new IntegrityError(jobId, `Result file for completed job ${jobId} is missing`);
    } catch (error) {
      next(error);
    }
  };
}

export function getQueue(deps: { estimator: QueuePositionEstimator }) {
  return async function (req: Request, res: Response, next: NextFunction) {
    try {
      const snapshot = await deps.estimator.snapshot();
      res.json({
        job_ids: snapshot.job_ids,
        length: snapshot.job_ids.length,
        taken_at: TimestampUtil.toISO(snapshot.taken_at),
      });
    } catch (error) {
      next(error);
    }
  };
}
