// Generator types - the external image generation capability

import type { GenerationParameters } from './job.js';

export interface GenerationRequest {
  job_id: string;
  parameters: GenerationParameters;
  source_image: Buffer;
  // Aborted when the job exceeds JOB_TIMEOUT
  signal: AbortSignal;
}

export interface GeneratedImage {
  data: Buffer;
  mime_type: 'image/png';
}

export interface ImageGenerator {
  readonly name: string;

  initialize(): Promise<void>;
  cleanup(): Promise<void>;
  checkHealth(): Promise<boolean>;

  generate(request: GenerationRequest): Promise<GeneratedImage>;
}
