// Application configuration - read from the environment and validated once at start-up

import { z } from 'zod';
import type { GenerationDefaults } from './generation-parameters.js';
import { blankAsUndefined, formatZodError } from './utils/validation.js';

const positiveInt = (fallback: number) =>
  blankAsUndefined(z.coerce.number().int().positive().default(fallback));

const booleanFlag = (fallback: boolean) =>
  blankAsUndefined(
    z
      .enum(['true', 'false', '1', '0'])
      .default(fallback ? 'true' : 'false')
      .transform(value => value === 'true' || value === '1')
  );

const commaList = (fallback: string) =>
  blankAsUndefined(
    z
      .string()
      .default(fallback)
      .transform(value =>
        value
          .split(',')
          .map(item => item.trim())
          .filter(item => item.length > 0)
      )
  );

const EnvSchema = z
  .object({
    PORT: blankAsUndefined(z.coerce.number().int().min(0).max(65535).default(5000)),
    CORS_ORIGINS: commaList('*'),

    JOB_STORE: blankAsUndefined(z.enum(['redis', 'memory']).default('redis')),
    REDIS_URL: blankAsUndefined(z.string().url().default('redis://localhost:6379/0')),
    REDIS_KEY_PREFIX: blankAsUndefined(z.string().default('imagegen:')),

    MAX_CONCURRENT_JOBS: positiveInt(2),
    MAX_QUEUE_SIZE: positiveInt(10),
    JOB_TIMEOUT: positiveInt(600),
    JOB_RESULT_TTL: positiveInt(900),
    JOB_RECORD_TTL: blankAsUndefined(z.coerce.number().int().positive().optional()),
    JOB_LEASE_SECONDS: positiveInt(30),
    RESULT_SWEEP_INTERVAL: positiveInt(60),
    WORKER_POLL_INTERVAL_MS: positiveInt(1000),
    EMBEDDED_WORKERS: booleanFlag(true),
    WORKER_ID: blankAsUndefined(z.string().regex(/^[A-Za-z0-9_-]+$/).optional()),

    RESULTS_FOLDER: blankAsUndefined(z.string().default('generated_images')),
    MAX_UPLOAD_MB: positiveInt(10),
    ALLOWED_EXTENSIONS: commaList('png,jpg,jpeg,webp'),

    DEFAULT_WIDTH: positiveInt(1024),
    DEFAULT_HEIGHT: positiveInt(1024),
    DEFAULT_STEPS: positiveInt(28),
    DEFAULT_GUIDANCE_SCALE: blankAsUndefined(z.coerce.number().min(0).default(2.5)),
    DEFAULT_TRUE_CFG_SCALE: blankAsUndefined(z.coerce.number().min(0).default(1.5)),

    GENERATOR: blankAsUndefined(z.enum(['simulation', 'rest']).default('simulation')),
    GENERATOR_URL: blankAsUndefined(z.string().url().optional()),
    SIMULATION_PROCESSING_MS: blankAsUndefined(z.coerce.number().int().min(0).default(2000)),
    SIMULATION_FAILURE_RATE: blankAsUndefined(z.coerce.number().min(0).max(1).default(0)),

    STATIC_DIR: blankAsUndefined(z.string().default('static')),
    PROFILES_FILE: blankAsUndefined(z.string().default('static/profiles.json')),
  })
  .superRefine((env, ctx) => {
    if (env.GENERATOR === 'rest' && !env.GENERATOR_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GENERATOR_URL'],
        message: 'is required when GENERATOR=rest',
      });
    }
  });

export type GeneratorConfig =
  | { type: 'simulation'; processingMs: number; failureRate: number }
  | { type: 'rest'; url: string; timeoutMs: number };

export interface AppConfig {
  port: number;
  corsOrigins: string[];

  jobStore: 'redis' | 'memory';
  redisUrl: string;
  redisKeyPrefix: string;

  maxConcurrentJobs: number;
  maxQueueSize: number;
  jobTimeoutMs: number;
  jobResultTtlMs: number;
  jobRecordTtlSeconds: number;
  jobLeaseMs: number;
  resultSweepIntervalMs: number;
  workerPollIntervalMs: number;
  embeddedWorkers: boolean;
  workerId?: string;

  resultsFolder: string;
  maxUploadBytes: number;
  allowedExtensions: string[];
  generationDefaults: GenerationDefaults;

  generator: GeneratorConfig;

  staticDir: string;
  profilesFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`FATAL: invalid configuration: ${formatZodError(result.error)}`);
  }
  const values = result.data;

  const generator: GeneratorConfig =
    values.GENERATOR === 'rest' && values.GENERATOR_URL
      ? { type: 'rest', url: values.GENERATOR_URL, timeoutMs: values.JOB_TIMEOUT * 1000 }
      : {
          type: 'simulation',
          processingMs: values.SIMULATION_PROCESSING_MS,
          failureRate: values.SIMULATION_FAILURE_RATE,
        };

  return {
    port: values.PORT,
    corsOrigins: values.CORS_ORIGINS,

    jobStore: values.JOB_STORE,
    redisUrl: values.REDIS_URL,
    redisKeyPrefix: values.REDIS_KEY_PREFIX,

    maxConcurrentJobs: values.MAX_CONCURRENT_JOBS,
    maxQueueSize: values.MAX_QUEUE_SIZE,
    jobTimeoutMs: values.JOB_TIMEOUT * 1000,
    jobResultTtlMs: values.JOB_RESULT_TTL * 1000,
    jobRecordTtlSeconds: values.JOB_RECORD_TTL ?? values.JOB_RESULT_TTL,
    jobLeaseMs: values.JOB_LEASE_SECONDS * 1000,
    resultSweepIntervalMs: values.RESULT_SWEEP_INTERVAL * 1000,
    workerPollIntervalMs: values.WORKER_POLL_INTERVAL_MS,
    embeddedWorkers: values.EMBEDDED_WORKERS,
    workerId: values.WORKER_ID,

    resultsFolder: values.RESULTS_FOLDER,
    maxUploadBytes: values.MAX_UPLOAD_MB * 1024 * 1024,
    allowedExtensions: values.ALLOWED_EXTENSIONS.map(ext => ext.toLowerCase()),
    generationDefaults: {
      width: values.DEFAULT_WIDTH,
      height: values.DEFAULT_HEIGHT,
      num_inference_steps: values.DEFAULT_STEPS,
      guidance_scale: values.DEFAULT_GUIDANCE_SCALE,
      true_cfg_scale: values.DEFAULT_TRUE_CFG_SCALE,
    },

    generator,

    staticDir: values.STATIC_DIR,
    profilesFile: values.PROFILES_FILE,
  };
}
