import { describe, test } from 'node:test';
import assert from 'node:assert';
import { AuthError, TransientError } from '../../src/lib/errors.js';
import { backoffDelay, withRetry } from '../../src/lib/retry.js';

describe('withRetry', () => {
  test('backoffDelay - doubles per attempt', () => {
    assert.strictEqual(backoffDelay(0), 1000);
    assert.strictEqual(backoffDelay(1), 2000);
    assert.strictEqual(backoffDelay(2), 4000);
    assert.strictEqual(backoffDelay(3, 10), 80);
  });

  test('retries recoverable errors until success', async () => {
    let attempts = 0;
    const result = await withRetry(
      async () => {
        attempts++;
        if (attempts < 3) throw new TransientError('timeout');
        return 'done';
      },
      { baseDelayMs: 0 }
    );

    assert.strictEqual(result, 'done');
    assert.strictEqual(attempts, 3);
  });

  test('does not retry non-recoverable errors', async () => {
    let attempts = 0;
    await assert.rejects(
      withRetry(
        async () => {
          attempts++;
          throw new AuthError('expired');
        },
        { baseDelayMs: 0 }
      ),
      AuthError
    );
    assert.strictEqual(attempts, 1);
  });

  test('rethrows the last error when retries run out', async () => {
    let attempts = 0;
    await assert.rejects(
      withRetry(
        async () => {
          attempts++;
          throw new TransientError(`failure ${attempts}`);
        },
        { retries: 2, baseDelayMs: 0 }
      ),
      { message: 'failure 3' }
    );
    assert.strictEqual(attempts, 3);
  });

  test('custom retry predicate', async () => {
    let attempts = 0;
    await assert.rejects(
      withRetry(
        async () => {
          attempts++;
          throw new TransientError('nope');
        },
        { baseDelayMs: 0, isRetryable: () => false }
      )
    );
    assert.strictEqual(attempts, 1);
  });
});
