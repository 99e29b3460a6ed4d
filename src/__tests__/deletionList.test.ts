/**
 * Tests for the per-org deletion list files
 *
 * Usage: npx tsx --test src/__tests__/deletionList.test.ts
 */

import { afterEach, beforeEach, describe, test } from 'node:test';
import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createSessionId, deletionListPath, writeDeletionList, writePendingDeletionList } from '../deletionList.js';
import type { RunResult } from '../types.js';
import { candidate } from './fakes.js';

const SESSION = '20240501_134502';

const RESULT: RunResult = {
  tenant: 'https://test.my.salesforce.com',
  authenticated: true,
  status: 'completed',
  deletionRecords: [
    { candidate: candidate('Alpha', 1, '301A1'), outcome: { status: 'deleted' }, httpStatus: 204, batch: 1 },
    {
      candidate: candidate('Alpha', 2, '301A2'),
      outcome: { status: 'failed', reason: 'DELETE_FAILED: in use, by "Process"' },
      httpStatus: 400,
      batch: 1
    }
  ],
  startedAt: 0,
  endedAt: 0
};

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flow-cleanup-lists-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('createSessionId', () => {
  test('formats the local time as yyyymmdd_hhmmss', () => {
    assert.equal(createSessionId(new Date(2024, 4, 1, 13, 45, 2)), SESSION);
  });
});

describe('deletionListPath', () => {
  test('names the file after the org host and session', () => {
    assert.equal(
      deletionListPath('deletion_lists', 'https://acme.my.salesforce.com', SESSION),
      path.join('deletion_lists', 'flows_to_delete_acme.my.salesforce.com_20240501_134502.json')
    );
    assert.equal(
      deletionListPath('out', 'https://acme.my.salesforce.com', SESSION, 'csv'),
      path.join('out', 'flows_to_delete_acme.my.salesforce.com_20240501_134502.csv')
    );
  });
});

describe('writeDeletionList', () => {
  test('writes JSON with one entry per version', async () => {
    const file = path.join(dir, 'nested', 'list.json');

    assert.equal(await writeDeletionList(file, RESULT, SESSION), true);

    assert.deepEqual(JSON.parse(fs.readFileSync(file, 'utf8')), {
      session_id: SESSION,
      timestamp: '1970-01-01T00:00:00.000Z',
      instance_url: 'https://test.my.salesforce.com',
      status: 'completed',
      total_flows: 2,
      flows: [
        {
          id: '301A1',
          name: 'Alpha',
          label: 'Alpha',
          version: 1,
          status: 'Obsolete',
          definition_id: '300Alpha',
          outcome: 'deleted',
          http_status: 204,
          batch: 1
        },
        {
          id: '301A2',
          name: 'Alpha',
          label: 'Alpha',
          version: 2,
          status: 'Obsolete',
          definition_id: '300Alpha',
          outcome: 'failed',
          reason: 'DELETE_FAILED: in use, by "Process"',
          http_status: 400,
          batch: 1
        }
      ]
    });
  });

  test('writes CSV when the extension asks for it', async () => {
    const file = path.join(dir, 'list.csv');

    await writeDeletionList(file, RESULT, SESSION);

    assert.deepEqual(fs.readFileSync(file, 'utf8').trimEnd().split('\n'), [
      'sessionId,instance,flowApiName,label,version,flowStatus,id,definitionId,outcome,reason,httpStatus,batch',
      '20240501_134502,https://test.my.salesforce.com,Alpha,Alpha,1,Obsolete,301A1,300Alpha,deleted,,204,1',
      '20240501_134502,https://test.my.salesforce.com,Alpha,Alpha,2,Obsolete,301A2,300Alpha,failed,"DELETE_FAILED: in use, by ""Process""",400,1'
    ]);
  });

  test('writes nothing for an empty list', async () => {
    const file = path.join(dir, 'empty.json');

    assert.equal(await writeDeletionList(file, { ...RESULT, deletionRecords: [] }, SESSION), false);
    assert.equal(fs.existsSync(file), false);
  });
});

describe('writePendingDeletionList', () => {
  test('records the targeted versions before anything is deleted', async () => {
    const file = path.join(dir, 'pending.json');
    const candidates = [candidate('Alpha', 1, '301A1'), candidate('Alpha', 2, '301A2')];

    assert.equal(
      await writePendingDeletionList(file, 'https://test.my.salesforce.com', candidates, SESSION, new Date(0)),
      true
    );

    assert.deepEqual(JSON.parse(fs.readFileSync(file, 'utf8')), {
      session_id: SESSION,
      timestamp: '1970-01-01T00:00:00.000Z',
      instance_url: 'https://test.my.salesforce.com',
      status: 'pending',
      total_flows: 2,
      flows: [1, 2].map(version => ({
        id: `301A${version}`,
        name: 'Alpha',
        label: 'Alpha',
        version,
        status: 'Obsolete',
        definition_id: '300Alpha',
        outcome: 'pending',
        batch: 0
      }))
    });
  });

  test('is overwritten by the final list for the same org and session', async () => {
    const file = deletionListPath(dir, RESULT.tenant, SESSION, 'csv');

    await writePendingDeletionList(file, RESULT.tenant, [candidate('Alpha', 1, '301A1')], SESSION);
    assert.equal(
      fs.readFileSync(file, 'utf8').trimEnd().split('\n')[1],
      '20240501_134502,https://test.my.salesforce.com,Alpha,Alpha,1,Obsolete,301A1,300Alpha,pending,,,'
    );

    await writeDeletionList(file, RESULT, SESSION);
    assert.equal(fs.readFileSync(file, 'utf8').trimEnd().split('\n').length, 3);
  });
});
