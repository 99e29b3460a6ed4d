/**
 * Tests for batched composite deletion
 *
 * Usage: npx tsx --test src/salesforce/__tests__/bulkDeleter.test.ts
 */

import { describe, test } from 'node:test';
import { strict as assert } from 'node:assert';
import { chunk, deleteCandidates, referenceIdFor, type BatchProgress } from '../bulkDeleter.js';
import { ApiRequestError } from '../../errors.js';
import { candidate, createRecordingLogger, FakeSalesforceApi } from '../../__tests__/fakes.js';

function candidates(count: number) {
  return Array.from({ length: count }, (_, i) => candidate('Flow', i + 1));
}

describe('chunk', () => {
  test('splits into ordered slices', () => {
    assert.deepEqual(chunk([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
    assert.deepEqual(chunk([], 3), []);
  });

  test('refuses a size below one', () => {
    assert.throws(() => chunk([1], 0), RangeError);
    assert.throws(() => chunk([1], 1.5), RangeError);
  });
});

describe('deleteCandidates', () => {
  test('one record per candidate, in ceil(N/25) composite calls', async () => {
    const api = new FakeSalesforceApi();
    const input = candidates(60);

    const records = await deleteCandidates(input, api);

    assert.equal(records.length, 60);
    assert.deepEqual(api.compositeCalls.map(call => call.length), [25, 25, 10]);
    assert.deepEqual(records.map(r => r.candidate.durableId), input.map(c => c.durableId));
    assert.ok(records.every(r => r.outcome.status === 'deleted' && r.httpStatus === 204));
    assert.deepEqual([records[0]?.batch, records[25]?.batch, records[59]?.batch], [1, 2, 3]);
  });

  test('builds one DELETE sub-request per candidate', async () => {
    const api = new FakeSalesforceApi();

    await deleteCandidates([candidate('Alpha', 1, '301AAA'), candidate('Alpha', 2, '301BBB')], api);

    assert.deepEqual(api.compositeCalls[0], [
      { method: 'DELETE', url: '/services/data/v60.0/tooling/sobjects/Flow/301AAA', referenceId: 'batch1_del1' },
      { method: 'DELETE', url: '/services/data/v60.0/tooling/sobjects/Flow/301BBB', referenceId: 'batch1_del2' }
    ]);
  });

  test('honours a smaller batch size and never exceeds 25', async () => {
    const small = new FakeSalesforceApi();
    await deleteCandidates(candidates(5), small, { batchSize: 2 });
    assert.deepEqual(small.compositeCalls.map(call => call.length), [2, 2, 1]);

    const large = new FakeSalesforceApi();
    await deleteCandidates(candidates(30), large, { batchSize: 100 });
    assert.deepEqual(large.compositeCalls.map(call => call.length), [25, 5]);
  });

  test('an empty list makes no calls', async () => {
    const api = new FakeSalesforceApi();
    assert.deepEqual(await deleteCandidates([], api), []);
    assert.equal(api.compositeCalls.length, 0);
  });

  test('matches sub-responses by referenceId, not position', async () => {
    const api = new FakeSalesforceApi({
      composite: subrequests =>
        [...subrequests].reverse().map(sub => ({
          referenceId: sub.referenceId,
          httpStatusCode: sub.referenceId === referenceIdFor(1, 1) ? 400 : 204,
          body: sub.referenceId === referenceIdFor(1, 1)
            ? [{ errorCode: 'DELETE_FAILED', message: 'Flow is referenced by a process' }]
            : null
        }))
    });

    const records = await deleteCandidates(candidates(3), api);

    assert.deepEqual(
      records.map(r => r.outcome),
      [
        { status: 'deleted' },
        { status: 'failed', reason: 'DELETE_FAILED: Flow is referenced by a process' },
        { status: 'deleted' }
      ]
    );
    assert.equal(records[1]?.httpStatus, 400);
  });

  test('a missing sub-response fails only that candidate', async () => {
    const api = new FakeSalesforceApi({
      composite: subrequests =>
        subrequests.slice(1).map(sub => ({ referenceId: sub.referenceId, httpStatusCode: 204, body: null }))
    });

    const records = await deleteCandidates(candidates(2), api);

    assert.deepEqual(records[0]?.outcome, { status: 'failed', reason: 'No result returned for this sub-request' });
    assert.equal(records[0]?.httpStatus, undefined);
    assert.deepEqual(records[1]?.outcome, { status: 'deleted' });
  });

  test('a rejected batch fails its own candidates and the rest continue', async () => {
    const { logger, lines } = createRecordingLogger();
    const progress: BatchProgress[] = [];
    let call = 0;
    const api = new FakeSalesforceApi({
      composite: subrequests => {
        call += 1;
        if (call === 2) {
          throw new ApiRequestError(500, 'UNKNOWN_EXCEPTION: boom', 'UNKNOWN_EXCEPTION');
        }
        return subrequests.map(sub => ({ referenceId: sub.referenceId, httpStatusCode: 204, body: null }));
      }
    });

    const records = await deleteCandidates(candidates(5), api, {
      batchSize: 2,
      logger,
      onBatchComplete: p => progress.push(p)
    });

    assert.deepEqual(
      records.map(r => r.outcome.status),
      ['deleted', 'deleted', 'failed', 'failed', 'deleted']
    );
    assert.deepEqual(records[2]?.outcome, {
      status: 'failed',
      reason: 'batch-error: Batch 2 was rejected: UNKNOWN_EXCEPTION: boom'
    });
    assert.equal(records[2]?.httpStatus, 500);
    assert.equal(records[3]?.batch, 2);
    assert.deepEqual(progress, [
      { batch: 1, totalBatches: 3, deleted: 2, failed: 0, processed: 2, total: 5 },
      { batch: 2, totalBatches: 3, deleted: 0, failed: 2, processed: 4, total: 5 },
      { batch: 3, totalBatches: 3, deleted: 1, failed: 0, processed: 5, total: 5 }
    ]);
    assert.ok(lines.some(line => line.level === 'error' && line.message === '✖ Batch 2 was rejected: UNKNOWN_EXCEPTION: boom'));
  });

  test('a network failure leaves httpStatus unset', async () => {
    const api = new FakeSalesforceApi({
      composite: () => {
        throw new ApiRequestError(0, 'Request to /tooling/composite failed: socket hang up');
      }
    });

    const [record] = await deleteCandidates(candidates(1), api);

    assert.equal(record?.outcome.status, 'failed');
    assert.equal(record?.httpStatus, undefined);
  });
});
