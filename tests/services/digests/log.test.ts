import { afterEach, beforeEach, describe, test } from 'node:test';
import assert from 'node:assert';
import type { DatabaseHandle } from '../../../src/db/index.js';
import { SqliteDigestLog } from '../../../src/services/digests/log.js';
import { openTestDatabase } from '../../helpers/test-db.js';
import { TestClock } from '../../helpers/test-fixtures.js';

const DAY = 24 * 60 * 60 * 1000;

describe('SqliteDigestLog', () => {
  let database: DatabaseHandle;
  let clock: TestClock;
  let log: SqliteDigestLog;

  beforeEach(() => {
    database = openTestDatabase();
    clock = new TestClock();
    log = new SqliteDigestLog(database.db, clock.date);
  });

  afterEach(() => {
    database.close();
  });

  test('records results with their context', () => {
    log.record(
      { sourceMessageId: 'msg-1', summaryText: 'New email: hi', deliveryStatus: 'delivered' },
      { source: 'push', subscriptionId: 'sub-1', changeType: 'created' }
    );

    assert.deepStrictEqual(log.recent(10), [
      {
        id: 1,
        messageId: 'msg-1',
        subscriptionId: 'sub-1',
        source: 'push',
        status: 'delivered',
        summaryText: 'New email: hi',
        errorKind: null,
        errorMessage: null,
        createdAt: '2026-03-02T12:00:00.000Z',
      },
    ]);
  });

  test('records failure details', () => {
    log.record(
      {
        sourceMessageId: 'msg-2',
        summaryText: null,
        deliveryStatus: 'failed',
        failure: { kind: 'not_found', message: 'Message msg-2 not found', retryable: false },
      },
      { source: 'poll' }
    );

    const [entry] = log.recent(1);
    assert.strictEqual(entry.subscriptionId, null);
    assert.strictEqual(entry.errorKind, 'not_found');
    assert.strictEqual(entry.errorMessage, 'Message msg-2 not found');
  });

  test('hasDelivered only counts delivered entries', () => {
    log.record({ sourceMessageId: 'msg-1', summaryText: null, deliveryStatus: 'failed' }, { source: 'push' });
    assert.strictEqual(log.hasDelivered('msg-1'), false);

    log.record({ sourceMessageId: 'msg-1', summaryText: 'digest', deliveryStatus: 'delivered' }, { source: 'push' });
    assert.strictEqual(log.hasDelivered('msg-1'), true);
    assert.strictEqual(log.hasDelivered('msg-2'), false);
  });

  test('recent returns newest first, limited', () => {
    for (const id of ['msg-1', 'msg-2', 'msg-3']) {
      log.record({ sourceMessageId: id, summaryText: null, deliveryStatus: 'skipped' }, { source: 'manual' });
      clock.advance(1000);
    }

    assert.deepStrictEqual(
      log.recent(2).map((e) => e.messageId),
      ['msg-3', 'msg-2']
    );
  });

  test('cleanup deletes entries older than the retention period', () => {
    log.record({ sourceMessageId: 'old', summaryText: null, deliveryStatus: 'delivered' }, { source: 'poll' });
    clock.advance(10 * DAY);
    log.record({ sourceMessageId: 'new', summaryText: null, deliveryStatus: 'delivered' }, { source: 'poll' });

    assert.strictEqual(log.cleanup(7), 1);
    assert.deepStrictEqual(
      log.recent(10).map((e) => e.messageId),
      ['new']
    );
  });
});
