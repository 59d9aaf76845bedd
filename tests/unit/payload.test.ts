import { describe, test } from 'node:test';
import assert from 'node:assert';
import {
  batchItems,
  parseLifecycleNotification,
  parseNotification,
  resourceIdFromPath,
} from '../../src/services/intake/payload.js';
import { changeNotification, lifecycleNotification } from '../helpers/test-fixtures.js';

describe('Notification payloads', () => {
  test('parseNotification - resourceData id', () => {
    assert.deepStrictEqual(parseNotification(changeNotification()), {
      subscriptionId: 'sub-1',
      resourceId: 'msg-1',
      changeType: 'created',
      receivedClientState: 'test-secret',
    });
  });

  test('parseNotification - id from the resource path', () => {
    const event = parseNotification(changeNotification({ resourceData: undefined, resource: 'Users/u-1/Messages/AAMk=' }));
    assert.strictEqual(event?.resourceId, 'AAMk=');
  });

  test('resourceIdFromPath - keyed segments', () => {
    assert.strictEqual(resourceIdFromPath("users('u-1')/messages('AAMk1')"), 'AAMk1');
    assert.strictEqual(resourceIdFromPath(''), null);
  });

  test('parseNotification - missing client state reads as empty', () => {
    assert.strictEqual(parseNotification(changeNotification({ clientState: undefined }))?.receivedClientState, '');
  });

  test('parseNotification - malformed items', () => {
    assert.strictEqual(parseNotification(changeNotification({ changeType: 'moved' })), null);
    assert.strictEqual(parseNotification(changeNotification({ subscriptionId: '' })), null);
    assert.strictEqual(parseNotification(changeNotification({ resource: undefined, resourceData: {} })), null);
    assert.strictEqual(parseNotification('not an object'), null);
  });

  test('parseLifecycleNotification', () => {
    assert.deepStrictEqual(parseLifecycleNotification(lifecycleNotification()), {
      subscriptionId: 'sub-1',
      lifecycleEvent: 'missed',
      receivedClientState: 'test-secret',
    });
    assert.strictEqual(parseLifecycleNotification(lifecycleNotification({ lifecycleEvent: 'renamed' })), null);
  });

  test('batchItems', () => {
    assert.deepStrictEqual(batchItems({ value: [1, 2] }), [1, 2]);
    assert.strictEqual(batchItems({ items: [] }), null);
    assert.strictEqual(batchItems(null), null);
  });
});
