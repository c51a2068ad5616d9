// Behaviour shared by every JobRepository backend
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import RedisMock from 'ioredis-mock';
import type { JobRepository } from '../../../src/core/interfaces/job-repository.js';
import { JobRegistry } from '../../../src/core/job-registry.js';
import { MemoryJobRepository } from '../../../src/core/memory-job-repository.js';
import { RedisJobRepository } from '../../../src/core/redis-job-repository.js';
import { FailureKind, JobStatus } from '../../../src/core/types/index.js';
import { createJob, SOURCE_IMAGE } from '../../fixtures/jobs.js';

interface Backend {
  name: string;
  create: () => Promise<JobRepository>;
}

const backends: Backend[] = [
  { name: 'MemoryJobRepository', create: async () => new MemoryJobRepository() },
  {
    name: 'RedisJobRepository',
    create: async () => {
      const redis = new RedisMock();
      await redis.flushall();
      return new RedisJobRepository(redis, { keyPrefix: 'test:', recordTtlSeconds: 60 });
    },
  },
];

describe.each(backends)('$name', ({ create }) => {
  let repository: JobRepository;

  beforeEach(async () => {
    repository = await create();
    await repository.connect();
  });

  afterEach(async () => {
    await repository.disconnect();
  });

  describe('admit', () => {
    it('stores a queued job that reads back unchanged', async () => {
      const job = createJob();

      expect(await repository.admit(job, SOURCE_IMAGE, 10)).toBe(true);

      expect(await repository.getJob(job.id)).toEqual(job);
      expect(await repository.getCounts()).toEqual({ queued: 1, processing: 0 });
    });

    it('refuses and writes nothing when the queue is full', async () => {
      const first = createJob();
      const second = createJob();
      await repository.admit(first, SOURCE_IMAGE, 1);

      expect(await repository.admit(second, SOURCE_IMAGE, 1)).toBe(false);
      expect(await repository.getJob(second.id)).toBeNull();
      expect(await repository.listQueued()).toEqual([first.id]);
    });

    it('counts processing jobs against capacity', async () => {
      await repository.admit(createJob(), SOURCE_IMAGE, 2);
      await repository.admit(createJob(), SOURCE_IMAGE, 2);
      const claimed = await repository.claimNext('slot-1', 1000, 5000);

      expect(await repository.admit(createJob(), SOURCE_IMAGE, 2)).toBe(false);

      await repository.finish(
        claimed?.job.id ?? '',
        { status: JobStatus.COMPLETED, result_ref: 'done.png' },
        2000
      );
      expect(await repository.admit(createJob(), SOURCE_IMAGE, 2)).toBe(true);
    });

    it('rejects a duplicate job id', async () => {
      const job = createJob();
      await repository.admit(job, SOURCE_IMAGE, 10);

      await expect(repository.admit(job, SOURCE_IMAGE, 10)).rejects.toThrow(
        `Job ${job.id} already exists`
      );
    });

    it('never admits more than capacity under concurrent submissions', async () => {
      const results = await Promise.all(
        Array.from({ length: 5 }, () => repository.admit(createJob(), SOURCE_IMAGE, 3))
      );

      expect(results.filter(Boolean)).toHaveLength(3);
      expect(await repository.getCounts()).toEqual({ queued: 3, processing: 0 });
    });
  });

  describe('claimNext', () => {
    it('returns null when nothing is queued', async () => {
      expect(await repository.claimNext('slot-1', 1000, 2000)).toBeNull();
    });

    it('claims jobs in submission order with their source image', async () => {
      const first = createJob();
      const second = createJob();
      await repository.admit(first, Buffer.from('first-image'), 10);
      await repository.admit(second, Buffer.from('second-image'), 10);

      const claimed = await repository.claimNext('slot-1', 1500, 9000);

      expect(claimed?.job).toEqual({
        ...first,
        status: JobStatus.PROCESSING,
        start_time: 1500,
        worker_id: 'slot-1',
      });
      expect(claimed?.source_image.toString()).toBe('first-image');

      const next = await repository.claimNext('slot-2', 1600, 9000);
      expect(next?.job.id).toBe(second.id);
      expect(await repository.getCounts()).toEqual({ queued: 0, processing: 2 });
    });

    it('hands each job to exactly one claimant', async () => {
      const jobs = [createJob(), createJob(), createJob()];
      for (const job of jobs) {
        await repository.admit(job, SOURCE_IMAGE, 10);
      }

      const claims = await Promise.all(
        Array.from({ length: 5 }, (_, i) => repository.claimNext(`slot-${i}`, 1000, 2000))
      );
      const claimedIds = claims.flatMap(claim => (claim ? [claim.job.id] : []));

      expect(claimedIds.sort()).toEqual(jobs.map(job => job.id).sort());
    });
  });

  describe('finish', () => {
    it('records a completed job', async () => {
      const job = createJob();
      await repository.admit(job, SOURCE_IMAGE, 10);
      await repository.claimNext('slot-1', 1000, 5000);

      const finished = await repository.finish(
        job.id,
        { status: JobStatus.COMPLETED, result_ref: `${job.id}.png` },
        3000
      );

      expect(finished).toBe(true);
      expect(await repository.getJob(job.id)).toEqual({
        ...job,
        status: JobStatus.COMPLETED,
        start_time: 1000,
        finish_time: 3000,
        result_ref: `${job.id}.png`,
        worker_id: 'slot-1',
      });
      expect(await repository.getCounts()).toEqual({ queued: 0, processing: 0 });
    });

    it('records a failed job with its error', async () => {
      const job = createJob();
      await repository.admit(job, SOURCE_IMAGE, 10);
      await repository.claimNext('slot-1', 1000, 5000);

      await repository.finish(
        job.id,
        { status: JobStatus.FAILED, error: 'CUDA out of memory', error_kind: FailureKind.RESOURCE_EXHAUSTED },
        2500
      );

      const stored = await repository.getJob(job.id);
      expect(stored?.status).toBe(JobStatus.FAILED);
      expect(stored?.error).toBe('CUDA out of memory');
      expect(stored?.error_kind).toBe(FailureKind.RESOURCE_EXHAUSTED);
      expect(stored?.finish_time).toBe(2500);
      expect(stored?.result_ref).toBeUndefined();
    });

    it('reads back the same error for an empty failure message', async () => {
      const registry = new JobRegistry(repository, { leaseMs: 5000, now: () => 1000 });
      const job = createJob();
      await registry.register(job, SOURCE_IMAGE, 10);
      await registry.claimNext('slot-1');

      await registry.fail(job.id, '', FailureKind.GENERATION_ERROR);

      expect((await repository.getJob(job.id))?.error).toBe('Unknown error');
    });

    it('never changes a terminal job again', async () => {
      const job = createJob();
      await repository.admit(job, SOURCE_IMAGE, 10);
      await repository.claimNext('slot-1', 1000, 5000);
      await repository.finish(job.id, { status: JobStatus.COMPLETED, result_ref: 'a.png' }, 2000);

      const again = await repository.finish(
        job.id,
        { status: JobStatus.FAILED, error: 'late', error_kind: FailureKind.TIMEOUT },
        3000
      );

      expect(again).toBe(false);
      const stored = await repository.getJob(job.id);
      expect(stored?.status).toBe(JobStatus.COMPLETED);
      expect(stored?.finish_time).toBe(2000);
      expect(stored?.error).toBeUndefined();
    });

    it('refuses to finish a job that is still queued', async () => {
      const job = createJob();
      await repository.admit(job, SOURCE_IMAGE, 10);

      const finished = await repository.finish(
        job.id,
        { status: JobStatus.COMPLETED, result_ref: 'a.png' },
        2000
      );

      expect(finished).toBe(false);
      expect((await repository.getJob(job.id))?.status).toBe(JobStatus.QUEUED);
    });
  });

  describe('queue positions', () => {
    it('ranks queued jobs by submission order', async () => {
      const jobs = [createJob(), createJob(), createJob()];
      for (const job of jobs) {
        await repository.admit(job, SOURCE_IMAGE, 10);
      }

      expect(await repository.getQueuePosition(jobs[0].id)).toBe(1);
      expect(await repository.getQueuePosition(jobs[1].id)).toBe(2);
      expect(await repository.getQueuePosition(jobs[2].id)).toBe(3);

      await repository.claimNext('slot-1', 1000, 5000);

      expect(await repository.getQueuePosition(jobs[0].id)).toBeNull();
      expect(await repository.getQueuePosition(jobs[1].id)).toBe(1);
      expect(await repository.getQueuePosition(jobs[2].id)).toBe(2);
    });

    it('returns null for unknown jobs', async () => {
      expect(await repository.getQueuePosition('missing')).toBeNull();
    });

    it('lists queued ids in order, optionally limited', async () => {
      const jobs = [createJob(), createJob(), createJob()];
      for (const job of jobs) {
        await repository.admit(job, SOURCE_IMAGE, 10);
      }

      expect(await repository.listQueued()).toEqual(jobs.map(job => job.id));
      expect(await repository.listQueued(2)).toEqual([jobs[0].id, jobs[1].id]);
    });
  });

  describe('leases', () => {
    it('renews only for the owning worker while processing', async () => {
      const job = createJob();
      await repository.admit(job, SOURCE_IMAGE, 10);
      await repository.claimNext('slot-1', 1000, 2000);

      expect(await repository.renewLease(job.id, 'slot-2', 9000)).toBe(false);
      expect(await repository.renewLease(job.id, 'slot-1', 9000)).toBe(true);

      await repository.finish(job.id, { status: JobStatus.COMPLETED, result_ref: 'a.png' }, 3000);
      expect(await repository.renewLease(job.id, 'slot-1', 12000)).toBe(false);
    });

    it('reports processing jobs whose lease ran out', async () => {
      const job = createJob();
      await repository.admit(job, SOURCE_IMAGE, 10);
      await repository.claimNext('slot-1', 1000, 2000);

      expect(await repository.findExpiredLeases(1999)).toEqual([]);
      expect(await repository.findExpiredLeases(2000)).toEqual([job.id]);

      await repository.renewLease(job.id, 'slot-1', 5000);
      expect(await repository.findExpiredLeases(2000)).toEqual([]);
    });
  });
});

describe('RedisJobRepository storage', () => {
  let redis: InstanceType<typeof RedisMock>;
  let repository: RedisJobRepository;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    repository = new RedisJobRepository(redis, { keyPrefix: 'test:', recordTtlSeconds: 60 });
  });

  it('drops the source image and sets an expiry once a job finishes', async () => {
    const job = createJob();
    await repository.admit(job, SOURCE_IMAGE, 10);
    expect(await redis.hget(`test:job:${job.id}`, 'source_image')).toBe(
      SOURCE_IMAGE.toString('base64')
    );

    await repository.claimNext('slot-1', 1000, 5000);
    await repository.finish(job.id, { status: JobStatus.COMPLETED, result_ref: 'a.png' }, 2000);

    expect(await redis.hget(`test:job:${job.id}`, 'source_image')).toBeNull();
    const ttl = await redis.ttl(`test:job:${job.id}`);
    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(60);
  });

  it('keeps keys under the configured prefix', async () => {
    const job = createJob();
    await repository.admit(job, SOURCE_IMAGE, 10);

    expect(await redis.zrange('test:jobs:pending', 0, -1)).toEqual([job.id]);
    expect(await redis.exists(`test:job:${job.id}`)).toBe(1);
  });
});
