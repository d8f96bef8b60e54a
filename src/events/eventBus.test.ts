import test from 'node:test';
import assert from 'node:assert/strict';
import { EventBus } from './eventBus.js';

test('EventBus: a failing subscriber does not stop the others', () => {
  const failures: string[] = [];
  const bus = new EventBus<string>((error, event) => failures.push(`${event}: ${error instanceof Error ? error.message : ''}`));
  const seen: string[] = [];
  bus.subscribe(() => {
    throw new Error('broken');
  });
  bus.subscribe(e => seen.push(e));

  bus.emit('a');
  bus.emit('b');
  assert.deepEqual(seen, ['a', 'b']);
  assert.equal(bus.failureCount, 2);
  assert.deepEqual(failures, ['a: broken', 'b: broken']);
});

test('EventBus: unsubscribe', () => {
  const bus = new EventBus<number>();
  const seen: number[] = [];
  const off = bus.subscribe(n => seen.push(n));
  bus.emit(1);
  off();
  bus.emit(2);
  assert.deepEqual(seen, [1]);
});
