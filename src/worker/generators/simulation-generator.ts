// Simulation generator - development stand-in that waits, then renders the
// source image at the requested size

import sharp from 'sharp';
import { GeneratorError } from '../../core/errors.js';
import type {
  GeneratedImage,
  GenerationRequest,
  ImageGenerator,
} from '../../core/types/generator.js';
import { logger } from '../../core/utils/logger.js';

export interface SimulationGeneratorOptions {
  processingMs: number;
  // Probability in [0, 1] that a job fails
  failureRate: number;
  random?: () => number;
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const aborted = () =>
      new GeneratorError('Generation aborted', false, { cause: signal.reason });

    if (signal.aborted) {
      reject(aborted());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(aborted());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class SimulationGenerator implements ImageGenerator {
  readonly name = 'simulation';
  private readonly random: () => number;

  constructor(private options: SimulationGeneratorOptions) {
    this.random = options.random ?? Math.random;
  }

  async initialize(): Promise<void> {
    logger.info(
      `Simulation generator ready (processing: ${this.options.processingMs}ms, failure rate: ${this.options.failureRate})`
    );
  }

  async cleanup(): Promise<void> {}

  async checkHealth(): Promise<boolean> {
    return true;
  }

  async generate(request: GenerationRequest): Promise<GeneratedImage> {
    const { job_id, parameters, source_image, signal } = request;

    await delay(this.options.processingMs, signal);

    if (this.random() < this.options.failureRate) {
      throw new GeneratorError(`Simulated generation failure for job ${job_id}`);
    }

    try {
      const data = await sharp(source_image)
        .resize(parameters.width, parameters.height, { fit: 'cover' })
        .png()
        .toBuffer();
      return { data, mime_type: 'image/png' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new GeneratorError(`Could not render source image: ${message}`, false, {
        cause: error,
      });
    }
  }
}
