import { describe, test } from 'node:test';
import assert from 'node:assert';
import { ProviderRejectedError, TransientError } from '../../src/lib/errors.js';
import { Scheduler, type SchedulerOptions } from '../../src/scheduler/index.js';
import { SubscriptionManager } from '../../src/services/subscriptions/manager.js';
import { MemorySubscriptionStore } from '../../src/services/subscriptions/repository.js';
import { SubscriptionTable } from '../../src/services/subscriptions/table.js';
import type { Subscription } from '../../src/shared/types/api.js';
import { MockSubscriptionProvider } from '../helpers/mock-clients.js';
import { DEFAULT_POLICY, TestClock, makeSubscription } from '../helpers/test-fixtures.js';

const RESOURCE = 'me/mailFolders/inbox/messages';
const HOUR = 60 * 60 * 1000;

function schedulerWith(manager: SchedulerOptions['manager'], pushResource: string | undefined = RESOURCE) {
  const polls: number[] = [];
  const scheduler = new Scheduler({
    manager,
    poller: {
      poll: async () => {
        polls.push(1);
        return null;
      },
    },
    digestLog: { cleanup: () => 0 },
    pushResource,
    pollingEnabled: false,
    sweepIntervalMs: HOUR,
    pollIntervalMs: HOUR,
    retentionDays: 30,
  });
  return { scheduler, polls };
}

describe('Scheduler.sweepNow', () => {
  test('polls on the tick when no subscription can be set up', async () => {
    const { scheduler, polls } = schedulerWith({
      sweep: async () => [],
      ensure: async (): Promise<Subscription> => {
        throw new ProviderRejectedError('Notification URL validation failed');
      },
    });

    await scheduler.sweepNow('interval');
    await scheduler.sweepNow('interval');

    assert.strictEqual(polls.length, 2);
  });

  test('does not poll while push is healthy', async () => {
    const { scheduler, polls } = schedulerWith({
      sweep: async () => [],
      ensure: async () => makeSubscription(),
    });

    await scheduler.sweepNow('interval');

    assert.strictEqual(polls.length, 0);
  });

  test('a failed sweep still checks the push subscription', async () => {
    const ensured: string[] = [];
    const { scheduler, polls } = schedulerWith({
      sweep: async (): Promise<Subscription[]> => {
        throw new TransientError('store unavailable');
      },
      ensure: async (resource) => {
        ensured.push(resource);
        return makeSubscription();
      },
    });

    await scheduler.sweepNow('interval');

    assert.deepStrictEqual(ensured, [RESOURCE]);
    assert.strictEqual(polls.length, 0);
  });

  test('without a push resource only the sweep runs', async () => {
    let ensures = 0;
    const { scheduler, polls } = schedulerWith(
      {
        sweep: async () => [],
        ensure: async () => {
          ensures++;
          return makeSubscription();
        },
      },
      undefined
    );

    await scheduler.sweepNow('interval');

    assert.strictEqual(ensures, 0);
    assert.strictEqual(polls.length, 0);
  });

  test('overlapping sweeps leave one subscription for the resource', async () => {
    const clock = new TestClock();
    const provider = new MockSubscriptionProvider();
    const table = new SubscriptionTable(new MemorySubscriptionStore(), DEFAULT_POLICY, clock.date);
    const manager = new SubscriptionManager({
      provider,
      table,
      policy: DEFAULT_POLICY,
      notificationUrl: 'https://digest.example.com/webhook/notifications',
      changeType: 'created',
      lifetimeMinutes: 4230,
      retryBaseDelayMs: 0,
      now: clock.date,
    });
    const { scheduler } = schedulerWith(manager);

    await Promise.all([scheduler.sweepNow('interval'), scheduler.sweepNow('missed')]);

    assert.strictEqual(table.list().length, 1);
    assert.strictEqual(provider.created.length, 1);
  });
});
