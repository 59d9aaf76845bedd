/**
 * Test fixtures for messages, subscriptions and Graph notification payloads
 */

import type { MessageRecord, Subscription } from '../../src/shared/types/api.js';
import type { RenewalPolicy } from '../../src/services/subscriptions/policy.js';

export const TEST_SECRET = 'test-secret';

export const DEFAULT_POLICY: RenewalPolicy = {
  maxLifetimeMinutes: 4230,
  renewalFraction: 0.2,
  minRenewalWindowMinutes: 10,
};

export function makeMessage(overrides: Partial<MessageRecord> = {}): MessageRecord {
  return {
    id: 'msg-1',
    subject: 'Quarterly report',
    sender: 'Alice <alice@example.com>',
    receivedAt: new Date('2026-03-02T09:00:00Z'),
    bodyText: 'Please review the attached quarterly report before Friday.',
    isRead: false,
    ...overrides,
  };
}

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: 'sub-1',
    resource: 'me/mailFolders/inbox/messages',
    changeType: 'created',
    expiration: new Date('2026-03-04T12:00:00Z'),
    issuedAt: new Date('2026-03-01T12:00:00Z'),
    clientStateSecret: TEST_SECRET,
    status: 'active',
    ...overrides,
  };
}

export function changeNotification(overrides: Record<string, unknown> = {}) {
  return {
    subscriptionId: 'sub-1',
    clientState: TEST_SECRET,
    changeType: 'created',
    resource: 'Users/user-1/Messages/msg-1',
    resourceData: { '@odata.type': '#Microsoft.Graph.Message', id: 'msg-1' },
    tenantId: 'tenant-1',
    ...overrides,
  };
}

export function lifecycleNotification(overrides: Record<string, unknown> = {}) {
  return {
    subscriptionId: 'sub-1',
    clientState: TEST_SECRET,
    lifecycleEvent: 'missed',
    ...overrides,
  };
}

/** Raw Graph message resource */
export function graphMessage(overrides: Record<string, unknown> = {}) {
  return {
    id: 'msg-1',
    subject: 'Quarterly report',
    from: { emailAddress: { name: 'Alice', address: 'alice@example.com' } },
    receivedDateTime: '2026-03-02T09:00:00Z',
    bodyPreview: 'Please review',
    body: { contentType: 'text', content: 'Please review the attached quarterly report.' },
    isRead: false,
    ...overrides,
  };
}

/** Mutable clock for code that takes `now` */
export class TestClock {
  constructor(private current: number = Date.parse('2026-03-02T12:00:00Z')) {}

  now = (): number => this.current;

  date = (): Date => new Date(this.current);

  advance(ms: number) {
    this.current += ms;
  }

  set(iso: string) {
    this.current = Date.parse(iso);
  }
}

/** Resolves once the predicate holds, polling every few milliseconds */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('Condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** A promise plus the function that resolves it */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
