// REST generator - forwards a job to an external inference server over HTTP
// and expects PNG bytes back

import axios, { AxiosInstance } from 'axios';
import { GeneratorError } from '../../core/errors.js';
import type {
  GeneratedImage,
  GenerationRequest,
  ImageGenerator,
} from '../../core/types/generator.js';
import { logger } from '../../core/utils/logger.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const INSUFFICIENT_STORAGE = 507;
const OUT_OF_MEMORY_PATTERN = /out of memory/i;

export interface RestGeneratorOptions {
  url: string;
  timeoutMs: number;
  httpClient?: AxiosInstance;
}

function decodeBody(data: unknown): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (typeof data === 'string') return data;
  return '';
}

export class RestGenerator implements ImageGenerator {
  readonly name = 'rest';
  private httpClient: AxiosInstance;

  constructor(private options: RestGeneratorOptions) {
    this.httpClient =
      options.httpClient ??
      axios.create({
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json', 'User-Agent': 'image-job-queue/1.0.0' },
      });
  }

  async initialize(): Promise<void> {
    const healthy = await this.checkHealth();
    if (healthy) {
      logger.info(`REST generator ready at ${this.options.url}`);
    } else {
      logger.warn(`REST generator at ${this.options.url} is not reachable yet`);
    }
  }

  async cleanup(): Promise<void> {}

  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.httpClient.get(new URL('/health', this.options.url).toString(), {
        validateStatus: () => true,
      });
      return response.status < 500;
    } catch {
      return false;
    }
  }

  async generate(request: GenerationRequest): Promise<GeneratedImage> {
    const { job_id, parameters, source_image, signal } = request;

    let data: Buffer;
    try {
      const response = await this.httpClient.post<ArrayBuffer>(
        this.options.url,
        { job_id, parameters, source_image: source_image.toString('base64') },
        { responseType: 'arraybuffer', signal }
      );
      data = Buffer.from(response.data);
    } catch (error) {
      throw this.toGeneratorError(error);
    }

    if (data.length < PNG_SIGNATURE.length || !data.subarray(0, 8).equals(PNG_SIGNATURE)) {
      throw new GeneratorError(`Generator returned a non-PNG payload for job ${job_id}`);
    }
    return { data, mime_type: 'image/png' };
  }

  private toGeneratorError(error: unknown): GeneratorError {
    if (axios.isCancel(error)) {
      return new GeneratorError('Generation request aborted', false, { cause: error });
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        const body = decodeBody(error.response.data).slice(0, 500);
        const exhausted = status === INSUFFICIENT_STORAGE || OUT_OF_MEMORY_PATTERN.test(body);
        const detail = body ? `: ${body}` : '';
        return new GeneratorError(`Generator responded with HTTP ${status}${detail}`, exhausted, {
          cause: error,
        });
      }
      return new GeneratorError(`Generator request failed: ${error.message}`, false, {
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new GeneratorError(message, OUT_OF_MEMORY_PATTERN.test(message), { cause: error });
  }
}
