import { describe, expect, it } from 'vitest';
import { JobQueue } from '../src/services/jobQueue.js';
import { NotFoundError } from '../src/errors.js';
import { MemoryJobRepository } from './support/fakes.js';
import type { JobRequest } from '../src/models/types.js';

const ingest: JobRequest = {
  kind: 'ingest',
  payload: { source_url: 'https://files.test/a.pdf', upload_id: 1, pdf_id: 'p1', pdf_name: null },
};

const quiz: JobRequest = {
  kind: 'generate-quiz',
  payload: {
    quiz_type: 'topic',
    pdf_ids: ['p1'],
    topic: 'cells',
    num_questions: 5,
    difficulty: 'medium',
    exam_id: 7,
    quiz_id: 'q1',
  },
};

describe('JobQueue', () => {
  it('enqueues jobs as queued', async () => {
    const queue = new JobQueue(new MemoryJobRepository());
    const job = await queue.enqueue(ingest);
    expect(job.status).toBe('queued');
    expect((await queue.status(job.id)).payload).toEqual(ingest.payload);
  });

  it('reports unknown jobs as not found', async () => {
    const queue = new JobQueue(new MemoryJobRepository());
    const err = await queue.status('nope').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ message: 'Job nope not found', code: 'JOB_NOT_FOUND', status: 404 });
  });

  it('cancels only queued jobs', async () => {
    const repo = new MemoryJobRepository();
    const queue = new JobQueue(repo);
    const first = await queue.enqueue(ingest);
    const second = await queue.enqueue(ingest);
    await repo.claimNext(['ingest'], 'w1'); // oldest first

    expect(await queue.cancel(second.id)).toBe(true);
    expect((await queue.status(second.id)).status).toBe('canceled');

    expect(await queue.cancel(first.id)).toBe(false);
    expect((await queue.status(first.id)).status).toBe('started');

    expect(await queue.cancel('missing')).toBe(false);
  });

  it('leaves finished jobs untouched', async () => {
    const repo = new MemoryJobRepository();
    const queue = new JobQueue(repo);
    const job = await queue.enqueue(quiz);
    await repo.claimNext(['generate-quiz'], 'w1');
    await repo.finish(job.id, { status: 'success' }, null);

    expect(await queue.cancel(job.id)).toBe(false);
    expect((await queue.status(job.id)).status).toBe('finished');
  });

  it('counts jobs per named queue', async () => {
    const repo = new MemoryJobRepository();
    const queue = new JobQueue(repo);
    await queue.enqueue(ingest);
    await queue.enqueue(ingest);
    const q = await queue.enqueue(quiz);
    await queue.cancel(q.id);
    await repo.claimNext(['ingest'], 'w1');

    expect(await queue.info()).toEqual({
      pdf_processing: { name: 'pdf_processing', queued: 1, started: 1, finished: 0, failed: 0, canceled: 0 },
      quiz_processing: { name: 'quiz_processing', queued: 0, started: 0, finished: 0, failed: 0, canceled: 1 },
    });
  });
});
