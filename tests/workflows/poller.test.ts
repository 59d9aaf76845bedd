import { describe, test } from 'node:test';
import assert from 'node:assert';
import { TransientError } from '../../src/lib/errors.js';
import type { DigestContext, DigestResult } from '../../src/shared/types/api.js';
import { Poller } from '../../src/workflows/poller.js';
import { MockMailGateway } from '../helpers/mock-clients.js';
import { deferred, makeMessage } from '../helpers/test-fixtures.js';

class RecordingPipeline {
  readonly calls: Array<{ id: string; context: DigestContext | undefined }> = [];
  gate: Promise<void> | null = null;

  async process(id: string, context?: DigestContext): Promise<DigestResult> {
    this.calls.push({ id, context });
    if (this.gate) await this.gate;
    return { sourceMessageId: id, summaryText: `digest ${id}`, deliveryStatus: 'delivered' };
  }
}

function setup(delivered: string[] = []) {
  const gateway = new MockMailGateway();
  gateway.addMessage(makeMessage({ id: 'msg-1' }));
  gateway.addMessage(makeMessage({ id: 'msg-2' }));
  gateway.addMessage(makeMessage({ id: 'msg-3', isRead: true }));
  const pipeline = new RecordingPipeline();
  const poller = new Poller({
    gateway,
    pipeline,
    log: { hasDelivered: (id) => delivered.includes(id) },
    folder: 'inbox',
    maxMessages: 25,
  });
  return { gateway, pipeline, poller };
}

describe('Poller', () => {
  test('processes unread messages not yet delivered', async () => {
    const { pipeline, poller } = setup(['msg-1']);

    const summary = await poller.poll();

    assert.deepStrictEqual(summary, {
      listed: 2,
      alreadyDelivered: 1,
      results: [{ sourceMessageId: 'msg-2', summaryText: 'digest msg-2', deliveryStatus: 'delivered' }],
    });
    assert.deepStrictEqual(pipeline.calls, [{ id: 'msg-2', context: { source: 'poll', changeType: 'created' } }]);
  });

  test('respects the message cap', async () => {
    const gateway = new MockMailGateway();
    gateway.addMessage(makeMessage({ id: 'msg-1' }));
    gateway.addMessage(makeMessage({ id: 'msg-2' }));
    const pipeline = new RecordingPipeline();
    const poller = new Poller({ gateway, pipeline, log: { hasDelivered: () => false }, folder: 'inbox', maxMessages: 1 });

    const summary = await poller.poll();

    assert.strictEqual(summary?.results.length, 1);
    assert.deepStrictEqual(
      pipeline.calls.map((c) => c.id),
      ['msg-1']
    );
  });

  test('a second poll while one runs is skipped', async () => {
    const { gateway, pipeline, poller } = setup();
    const gate = deferred();
    pipeline.gate = gate.promise;

    const first = poller.poll();
    assert.strictEqual(poller.running, true);
    assert.strictEqual(await poller.poll(), null);

    gate.resolve();
    assert.strictEqual((await first)?.results.length, 2);
    assert.strictEqual(gateway.listCalls, 1);
    assert.strictEqual(poller.running, false);
  });

  test('listing failures propagate and release the poll', async () => {
    const { gateway, poller } = setup();
    gateway.listError = new TransientError('Graph unavailable');

    await assert.rejects(poller.poll(), TransientError);

    gateway.listError = null;
    assert.strictEqual((await poller.poll())?.listed, 2);
  });
});
