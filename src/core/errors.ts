// Error taxonomy for validation, execution and lookup failures

import { FailureKind } from './types/job.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    readonly statusCode: 400 | 413 = 400
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised by generator implementations. `resourceExhausted` marks failures
 * caused by running out of GPU memory or a similar hard limit.
 */
export class GeneratorError extends Error {
  constructor(
    message: string,
    readonly resourceExhausted = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GeneratorError';
  }
}

/**
 * Execution failure as recorded on a job. Never retried.
 */
export class GeneratorFailure extends Error {
  constructor(
    message: string,
    readonly kind: FailureKind
  ) {
    super(message);
    this.name = 'GeneratorFailure';
  }

  static timeout(timeoutMs: number): GeneratorFailure {
    return new GeneratorFailure(
      timeoutMs < 1000
        ? `Job timed out after ${timeoutMs} ms`
        : `Job timed out after ${Math.round(timeoutMs / 1000)} seconds`,
      FailureKind.TIMEOUT
    );
  }

  static from(error: unknown): GeneratorFailure {
    if (error instanceof GeneratorFailure) {
      return error;
    }
    if (error instanceof GeneratorError) {
      return new GeneratorFailure(
        error.message,
        error.resourceExhausted ? FailureKind.RESOURCE_EXHAUSTED : FailureKind.GENERATION_ERROR
      );
    }
    if (error instanceof Error) {
      return new GeneratorFailure(error.message, FailureKind.GENERATION_ERROR);
    }
    return new GeneratorFailure(String(error), FailureKind.GENERATION_ERROR);
  }
}

export class NotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'NotFoundError';
  }
}

export class IntegrityError extends Error {
  constructor(
    readonly jobId: string,
    message: string
  ) {
    super(message);
    this.name = 'IntegrityError';
  }
}
