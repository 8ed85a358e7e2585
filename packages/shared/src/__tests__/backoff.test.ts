import assert from 'node:assert/strict';
import { test } from 'node:test';
import { computeExponentialBackoff } from '../retries/backoff';

test('computeExponentialBackoff doubles from the base delay', () => {
  assert.deepEqual(
    [1, 2, 3, 4, 5].map((attempt) => computeExponentialBackoff(attempt)),
    [250, 500, 1000, 2000, 4000]
  );
});

test('computeExponentialBackoff caps at maxMs', () => {
  assert.equal(computeExponentialBackoff(6), 5000);
  assert.equal(computeExponentialBackoff(20, { baseMs: 100, factor: 3, maxMs: 800 }), 800);
  assert.equal(computeExponentialBackoff(2, { baseMs: 100, factor: 3, maxMs: 800 }), 300);
});

test('computeExponentialBackoff treats attempts below one as the first attempt', () => {
  assert.equal(computeExponentialBackoff(0), 250);
  assert.equal(computeExponentialBackoff(-3, { baseMs: 40, factor: 2, maxMs: 1000 }), 40);
  assert.equal(computeExponentialBackoff(Number.NaN), 250);
});
