/**
 * Tests for logging and secret masking
 *
 * Usage: npx tsx --test src/__tests__/logger.test.ts
 */

import { describe, test } from 'node:test';
import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger, maskSecret, maskSensitive } from '../logger.js';

const TOKEN = '00Dxx0000001gPL!AQ4AQFakeTokenValue1234';

describe('maskSensitive', () => {
  test('masks tokens, secrets and codes', () => {
    assert.equal(maskSensitive(`Authorization: Bearer ${TOKEN}`), 'Authorization: Bearer ***MASKED***');
    assert.equal(maskSensitive(`{"access_token": "${TOKEN}"}`), '{"access_token": "***MASKED***"}');
    assert.equal(maskSensitive('client_secret=ABCDEFGHIJKLMNOPQRST'), 'client_secret=***MASKED***');
    assert.equal(maskSensitive('client_id: 3MVG9test.consumer.key'), 'client_id: ***MASKED***');
    assert.equal(maskSensitive('code=aPrxExampleAuthorizationCode123'), 'code=***MASKED***');
    assert.equal(maskSensitive('code_verifier=Zm9vYmFyYmF6cXV4cXV1eGNvcmdl'), 'code_verifier=***MASKED***');
  });

  test('leaves short values and plain text alone', () => {
    assert.equal(maskSensitive('client_id=short'), 'client_id=short');
    assert.equal(maskSensitive('Batch 2/3: 25 deleted, 0 failed'), 'Batch 2/3: 25 deleted, 0 failed');
  });
});

describe('maskSecret', () => {
  test('shows a short prefix only', () => {
    assert.equal(maskSecret('3MVG9test.consumer.key'), '3MVG9tes...');
    assert.equal(maskSecret('short'), '***');
    assert.equal(maskSecret(undefined), '');
  });
});

describe('createLogger', () => {
  test('appends timestamped, masked lines to the log file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flow-cleanup-log-'));
    try {
      const logFile = path.join(dir, 'logs', 'session.log');
      const logger = createLogger({ quiet: true, logFile });

      logger.log(`access_token=${TOKEN}`);
      logger.debug('callback server shut down');
      logger.batchResult(1, 2, 25, 0);

      const lines = fs.readFileSync(logFile, 'utf8').trimEnd().split('\n');
      assert.equal(lines.length, 3);
      assert.match(lines[0] ?? '', /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] INFO  access_token=\*\*\*MASKED\*\*\*$/);
      assert.match(lines[1] ?? '', /\] DEBUG callback server shut down$/);
      assert.match(lines[2] ?? '', /\] INFO  ✔ Batch 1\/2: 25 deleted, 0 failed$/);
      assert.equal(logger.logFile, logFile);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
