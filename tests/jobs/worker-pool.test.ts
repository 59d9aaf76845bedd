import { describe, test } from 'node:test';
import assert from 'node:assert';
import { DigestHandler } from '../../src/jobs/handlers/digest.js';
import { MemoryJobQueue } from '../../src/jobs/queue/memory.js';
import type { DigestJobPayload, Job, JobHandler } from '../../src/jobs/types.js';
import { WorkerPool } from '../../src/jobs/worker-pool.js';
import { AppError, DeliveryError, NotFoundError } from '../../src/lib/errors.js';
import { DigestPipeline } from '../../src/workflows/digest-pipeline.js';
import { MockMailGateway, MockSink, MockSummarizer } from '../helpers/mock-clients.js';
import { deferred, makeMessage, waitFor } from '../helpers/test-fixtures.js';

function payload(messageId = 'msg-1'): DigestJobPayload {
  return { messageId, subscriptionId: 'sub-1', changeType: 'created', source: 'push' };
}

class ScriptedHandler implements JobHandler {
  readonly seen: Array<{ id: number; attempts: number }> = [];

  constructor(private readonly impl: (job: Job) => Promise<void>) {}

  async handle(job: Job): Promise<void> {
    this.seen.push({ id: job.id, attempts: job.attempts });
    await this.impl(job);
  }
}

function pool(queue: MemoryJobQueue, handler: JobHandler, shutdownGraceMs = 1000) {
  return new WorkerPool({ queue, handler, workers: 2, shutdownGraceMs, idleDelayMs: 5, retryBaseDelayMs: 0 });
}

describe('WorkerPool', () => {
  test('runs queued jobs to completion', async () => {
    const queue = new MemoryJobQueue({ capacity: 10 });
    const handler = new ScriptedHandler(async () => {});
    const workers = pool(queue, handler);
    queue.enqueue(payload('msg-1'));
    queue.enqueue(payload('msg-2'));

    workers.start();
    await waitFor(() => queue.stats().completed === 2);
    await workers.stop();

    assert.strictEqual(handler.seen.length, 2);
    assert.strictEqual(workers.isRunning, false);
  });

  test('retries recoverable failures up to the attempt limit', async () => {
    const queue = new MemoryJobQueue({ capacity: 10, maxAttempts: 3 });
    const handler = new ScriptedHandler(async () => {
      throw new DeliveryError('sink down');
    });
    const workers = pool(queue, handler);
    queue.enqueue(payload());

    workers.start();
    await waitFor(() => queue.stats().failed === 1);
    await workers.stop();

    assert.deepStrictEqual(
      handler.seen.map((s) => s.attempts),
      [0, 1, 2]
    );
  });

  test('does not retry permanent failures', async () => {
    const queue = new MemoryJobQueue({ capacity: 10 });
    const handler = new ScriptedHandler(async () => {
      throw new NotFoundError('message deleted');
    });
    const workers = pool(queue, handler);
    queue.enqueue(payload());

    workers.start();
    await waitFor(() => queue.stats().failed === 1);
    await workers.stop();

    assert.strictEqual(handler.seen.length, 1);
  });

  test('stop drops queued jobs and waits for the running one', async () => {
    const queue = new MemoryJobQueue({ capacity: 10 });
    const gate = deferred();
    const handler = new ScriptedHandler(() => gate.promise);
    const workers = new WorkerPool({ queue, handler, workers: 1, shutdownGraceMs: 1000, idleDelayMs: 5 });
    queue.enqueue(payload('msg-1'));
    queue.enqueue(payload('msg-2'));

    workers.start();
    await waitFor(() => handler.seen.length === 1);

    const stopping = workers.stop();
    gate.resolve();
    await stopping;

    assert.deepStrictEqual(queue.stats(), {
      pending: 0,
      running: 0,
      completed: 1,
      failed: 0,
      dropped: 1,
      capacity: 10,
    });
  });

  test('stop gives up after the grace period and never retries', async () => {
    const queue = new MemoryJobQueue({ capacity: 10 });
    const gate = deferred();
    const handler = new ScriptedHandler(async () => {
      await gate.promise;
      throw new DeliveryError('sink down');
    });
    const workers = new WorkerPool({ queue, handler, workers: 1, shutdownGraceMs: 20, idleDelayMs: 5 });
    queue.enqueue(payload());

    workers.start();
    await waitFor(() => handler.seen.length === 1);
    await workers.stop();
    assert.strictEqual(queue.stats().running, 1);

    gate.resolve();
    await waitFor(() => queue.stats().failed === 1);
    assert.strictEqual(queue.stats().pending, 0);
    assert.strictEqual(handler.seen.length, 1);
  });
});

describe('DigestHandler', () => {
  function setup() {
    const gateway = new MockMailGateway();
    gateway.addMessage(makeMessage());
    const summarizer = new MockSummarizer();
    const sink = new MockSink();
    const pipeline = new DigestPipeline({ gateway, summarizer, sink, maxInputChars: 4000 });
    const queue = new MemoryJobQueue({ capacity: 10 });
    return { gateway, summarizer, sink, queue, handler: new DigestHandler(pipeline) };
  }

  test('a delivery failure preserves the digest for the retry', async () => {
    const { gateway, summarizer, sink, queue, handler } = setup();
    sink.failures = [new DeliveryError('Telegram unavailable')];
    queue.enqueue(payload());
    const workers = new WorkerPool({ queue, handler, workers: 1, shutdownGraceMs: 1000, idleDelayMs: 5, retryBaseDelayMs: 0 });

    workers.start();
    await waitFor(() => queue.stats().completed === 1);
    await workers.stop();

    const digest = 'New email: Quarterly report\nFrom: Alice <alice@example.com>\n\n• About Quarterly report';
    assert.deepStrictEqual(sink.attempts, [digest, digest]);
    assert.deepStrictEqual(sink.sent, [digest]);
    assert.deepStrictEqual(gateway.fetched, ['msg-1']);
    assert.strictEqual(summarizer.inputs.length, 1);
  });

  test('a fetch failure surfaces its kind', async () => {
    const { handler } = setup();
    const job: Job = {
      id: 1,
      payload: payload('msg-404'),
      status: 'running',
      attempts: 0,
      maxAttempts: 3,
      errorMessage: null,
      createdAt: '2026-03-02T12:00:00.000Z',
      startedAt: null,
      completedAt: null,
    };

    await assert.rejects(handler.handle(job), (error: unknown) => {
      assert.ok(error instanceof AppError);
      assert.strictEqual(error.kind, 'not_found');
      assert.strictEqual(error.recoverable, false);
      assert.strictEqual(error.message, 'Digest for message msg-404 failed: Message msg-404 not found');
      return true;
    });
    assert.strictEqual(job.payload.preservedDigest, undefined);
  });

  test('skipped results complete the job', async () => {
    const { sink, handler } = setup();
    const job: Job = {
      id: 1,
      payload: { ...payload(), changeType: 'deleted' },
      status: 'running',
      attempts: 0,
      maxAttempts: 3,
      errorMessage: null,
      createdAt: '2026-03-02T12:00:00.000Z',
      startedAt: null,
      completedAt: null,
    };

    await handler.handle(job);
    assert.deepStrictEqual(sink.attempts, []);
  });
});
