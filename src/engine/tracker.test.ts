import test from 'node:test';
import assert from 'node:assert/strict';
import { FailureTracker } from './tracker.js';

test('FailureTracker: reaches the threshold on exactly the third failure', () => {
  const tracker = new FailureTracker(3);
  assert.equal(tracker.recordFailure(), false);
  assert.equal(tracker.recordFailure(), false);
  assert.equal(tracker.value, 2);
  assert.equal(tracker.recordFailure(), true);
});

test('FailureTracker: reset starts the count again', () => {
  const tracker = new FailureTracker(3);
  tracker.recordFailure();
  tracker.recordFailure();
  tracker.reset();
  assert.equal(tracker.value, 0);
  assert.equal(tracker.recordFailure(), false);
  assert.equal(tracker.value, 1);
});
