import { describe, test } from 'node:test';
import assert from 'node:assert';
import { backoffDelay, withRetry } from './retry.js';
import { formatLogLine } from './logger.js';

const quiet = { debug() {}, info() {}, warn() {}, error() {} };

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return 'ok';
      },
      { maxAttempts: 3, delayMs: 0, logger: quiet },
    );
    assert.strictEqual(result, 'ok');
    assert.strictEqual(calls, 3);
  });

  test('rethrows the last error once attempts run out', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new Error(`attempt ${calls}`);
        },
        { maxAttempts: 2, delayMs: 0, logger: quiet },
      ),
      /attempt 2/,
    );
    assert.strictEqual(calls, 2);
  });

  test('does not retry errors the policy rejects', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new TypeError('bad reply');
        },
        { maxAttempts: 5, delayMs: 0, retryable: (error) => !(error instanceof TypeError), logger: quiet },
      ),
      TypeError,
    );
    assert.strictEqual(calls, 1);
  });
});

test('backoffDelay grows by the multiplier', () => {
  assert.deepStrictEqual(
    [1, 2, 3].map((attempt) => backoffDelay(attempt, 100, 2)),
    [100, 200, 400],
  );
});

test('formatLogLine appends context only when present', () => {
  assert.strictEqual(formatLogLine('Server', 'ready'), '[Server] ready');
  assert.strictEqual(formatLogLine('Server', 'ready', {}), '[Server] ready');
  assert.strictEqual(formatLogLine('Server', 'ready', { port: 25005 }), '[Server] ready {"port":25005}');
});
