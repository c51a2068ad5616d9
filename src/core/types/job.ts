// Job types - job record, generation parameters and lifecycle definitions

import type { Timestamp } from './timestamp.js';

export enum JobStatus {
  QUEUED = 'queued',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export enum FailureKind {
  // The generator raised an error
  GENERATION_ERROR = 'generation_error',

  // The generator ran out of memory or another hard resource
  RESOURCE_EXHAUSTED = 'resource_exhausted',

  // Execution exceeded JOB_TIMEOUT
  TIMEOUT = 'timeout',

  // The owning worker stopped renewing its lease
  WORKER_LOST = 'worker_lost',

  // Storing the artifact or recording the outcome failed
  INTERNAL_ERROR = 'internal_error',
}

export interface GenerationParameters {
  prompt: string;
  width: number;
  height: number;
  num_inference_steps: number;
  guidance_scale: number;
  true_cfg_scale: number;
  seed: number;
  prompt_2?: string;
  negative_prompt?: string;
  negative_prompt_2?: string;
  max_sequence_length: number;
  num_images_per_prompt: number;
}

export interface Job {
  id: string;
  status: JobStatus;
  parameters: GenerationParameters;
  submit_time: Timestamp;
  start_time?: Timestamp;
  finish_time?: Timestamp;
  result_ref?: string;
  error?: string;
  error_kind?: FailureKind;
  worker_id?: string;
}

export interface JobSubmission {
  parameters: GenerationParameters;
  source_image: Buffer;
}

// A job handed to a worker slot, together with the uploaded source image
export interface ClaimedJob {
  job: Job;
  source_image: Buffer;
}

export type JobOutcome =
  | { status: JobStatus.COMPLETED; result_ref: string }
  | { status: JobStatus.FAILED; error: string; error_kind: FailureKind };

export type AdmissionResult =
  | { accepted: true; job: Job }
  | { accepted: false; reason: 'capacity_exceeded' };

export interface QueueCounts {
  queued: number;
  processing: number;
}

export interface QueueSnapshot {
  job_ids: string[];
  taken_at: Timestamp;
}

// Status payload returned by GET /status/:jobId
export interface JobStatusResponse {
  job_id: string;
  status: JobStatus;
  queue_position: number | null;
  result_ref: string | null;
  error: string | null;
  error_kind: FailureKind | null;
  submit_time: string;
  start_time: string | null;
  finish_time: string | null;
}

export interface JobSubmissionResponse {
  message: string;
  job_id: string;
  status_url: string;
  result_url: string;
}

const JOB_STATUS_VALUES = new Set<string>(Object.values(JobStatus));
const FAILURE_KIND_VALUES = new Set<string>(Object.values(FailureKind));

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUS_VALUES.has(value);
}

export function isFailureKind(value: string): value is FailureKind {
  return FAILURE_KIND_VALUES.has(value);
}
