import test from 'node:test';
import assert from 'node:assert/strict';
import { VoteRecord } from './records.js';

test('VoteRecord: one ballot per eligible voter', () => {
  const record = new VoteRecord(1, 'A', 'X', ['A', 'B', 'C']);
  assert.equal(record.cast('A', 'approve'), true);
  assert.equal(record.cast('A', 'reject'), false);
  assert.equal(record.cast('Z', 'approve'), false);
  assert.equal(record.ballotOf('A'), 'approve');
  assert.deepEqual(record.voters(), ['A']);
});

test('VoteRecord: majority is of eligible voters, not ballots cast', () => {
  const record = new VoteRecord(1, 'A', 'X', ['A', 'B', 'C', 'D']);
  record.cast('A', 'approve');
  record.cast('B', 'approve');
  assert.deepEqual(record.tally(), { approve: 2, reject: 0, eligible: 4, passed: false });
});

function tallyOf(approvals: number, voters: number) {
  const names = Array.from({ length: voters }, (_, i) => `V${i}`);
  const record = new VoteRecord(1, 'V0', 'X', names);
  names.forEach((name, i) => record.cast(name, i < approvals ? 'approve' : 'reject'));
  return record.tally();
}

test('VoteRecord: strict majority at four and five voters', () => {
  assert.deepEqual(tallyOf(2, 4), { approve: 2, reject: 2, eligible: 4, passed: false });
  assert.deepEqual(tallyOf(3, 4), { approve: 3, reject: 1, eligible: 4, passed: true });
  assert.deepEqual(tallyOf(2, 5), { approve: 2, reject: 3, eligible: 5, passed: false });
  assert.deepEqual(tallyOf(3, 5), { approve: 3, reject: 2, eligible: 5, passed: true });
});

test('VoteRecord: tally closes the record', () => {
  const record = new VoteRecord(1, null, 'X', ['A', 'B', 'C']);
  record.cast('A', 'approve');
  record.cast('B', 'approve');
  const tally = record.tally();
  assert.equal(tally.passed, true);
  assert.equal(record.cast('C', 'reject'), false);
  assert.equal(record.tally(), tally);
});

test('VoteRecord: finalize once with flags', () => {
  const record = new VoteRecord(2, 'P', 'C', ['P', 'C']);
  assert.equal(record.isFinal, false);
  record.finalize({ hitlerElected: true });
  assert.equal(record.isFinal, true);
  assert.deepEqual(record.flags, { hitlerElected: true });
  assert.throws(() => record.finalize());
});
