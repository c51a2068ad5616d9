// Controllable ImageGenerator for worker tests: each call waits until the
// test resolves or rejects it by job id
import { GeneratorError } from '../../src/core/errors.js';
import type {
  GeneratedImage,
  GenerationRequest,
  ImageGenerator,
} from '../../src/core/types/index.js';

interface PendingCall {
  request: GenerationRequest;
  resolve: (image: GeneratedImage) => void;
  reject: (error: unknown) => void;
}

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);

export class FakeGenerator implements ImageGenerator {
  readonly name = 'fake';
  readonly started: string[] = [];
  readonly aborted: string[] = [];
  private pending = new Map<string, PendingCall>();
  private running = 0;
  maxRunning = 0;

  async initialize(): Promise<void> {}

  async cleanup(): Promise<void> {}

  async checkHealth(): Promise<boolean> {
    return true;
  }

  generate(request: GenerationRequest): Promise<GeneratedImage> {
    this.started.push(request.job_id);
    this.running++;
    this.maxRunning = Math.max(this.maxRunning, this.running);

    request.signal.addEventListener('abort', () => {
      this.aborted.push(request.job_id);
      this.pending.get(request.job_id)?.reject(request.signal.reason);
    });

    return new Promise<GeneratedImage>((resolve, reject) => {
      this.pending.set(request.job_id, { request, resolve, reject });
    }).finally(() => {
      this.running--;
      this.pending.delete(request.job_id);
    });
  }

  get inFlight(): string[] {
    return [...this.pending.keys()];
  }

  requestFor(jobId: string): GenerationRequest | undefined {
    return this.pending.get(jobId)?.request;
  }

  succeed(jobId: string, data: Buffer = PNG_BYTES): void {
    this.take(jobId).resolve({ data, mime_type: 'image/png' });
  }

  fail(jobId: string, message: string, resourceExhausted = false): void {
    this.take(jobId).reject(new GeneratorError(message, resourceExhausted));
  }

  private take(jobId: string): PendingCall {
    const call = this.pending.get(jobId);
    if (!call) {
      throw new Error(`No generation in flight for ${jobId}`);
    }
    return call;
  }
}
