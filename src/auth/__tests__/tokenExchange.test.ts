/**
 * Tests for the authorization-code token exchange
 *
 * Usage: npx tsx --test src/auth/__tests__/tokenExchange.test.ts
 */

import { describe, test } from 'node:test';
import { strict as assert } from 'node:assert';
import { exchangeCodeForToken, tokenEndpoint } from '../tokenExchange.js';
import { generateAuthSession } from '../pkce.js';
import { AuthenticationError } from '../../errors.js';
import { createFakeFetch, jsonResponse, orgConfig } from '../../__tests__/fakes.js';

const REDIRECT_URI = 'http://localhost:8080/callback';

function formOf(body: RequestInit['body'] | undefined): URLSearchParams {
  assert.equal(typeof body, 'string');
  return new URLSearchParams(typeof body === 'string' ? body : '');
}

describe('exchangeCodeForToken', () => {
  test('posts the verifier, never the challenge', async () => {
    const session = generateAuthSession({ port: 8080 });
    const { fetch, calls } = createFakeFetch([
      jsonResponse({
        access_token: 'test-access-token',
        instance_url: 'https://test.my.salesforce.com/',
        token_type: 'Bearer',
        id: 'https://login.salesforce.com/id/00D/005',
        issued_at: '1700000000000'
      })
    ]);

    const tokens = await exchangeCodeForToken({
      config: orgConfig({ clientSecret: 'test-secret' }),
      session,
      code: 'test-code',
      redirectUri: REDIRECT_URI,
      fetchImpl: fetch
    });

    assert.equal(calls.length, 1);
    assert.equal(calls[0]?.url, 'https://test.my.salesforce.com/services/oauth2/token');
    assert.equal(calls[0]?.init?.method, 'POST');
    const form = formOf(calls[0]?.init?.body);
    assert.equal(form.get('grant_type'), 'authorization_code');
    assert.equal(form.get('code'), 'test-code');
    assert.equal(form.get('client_id'), 'test-client-id');
    assert.equal(form.get('client_secret'), 'test-secret');
    assert.equal(form.get('redirect_uri'), REDIRECT_URI);
    assert.equal(form.get('code_verifier'), session.codeVerifier);
    assert.equal(form.get('code_challenge'), null);
    assert.ok(!calls[0]?.init?.body?.toString().includes(session.codeChallenge));

    assert.deepEqual(tokens, {
      accessToken: 'test-access-token',
      instanceUrl: 'https://test.my.salesforce.com',
      tokenType: 'Bearer',
      identityUrl: 'https://login.salesforce.com/id/00D/005',
      issuedAt: 1700000000000
    });
  });

  test('omits client_secret when none is configured', async () => {
    const { fetch, calls } = createFakeFetch([jsonResponse({ access_token: 'test-access-token' })]);

    const tokens = await exchangeCodeForToken({
      config: orgConfig(),
      session: generateAuthSession({ port: 8080 }),
      code: 'test-code',
      redirectUri: REDIRECT_URI,
      fetchImpl: fetch
    });

    assert.equal(formOf(calls[0]?.init?.body).has('client_secret'), false);
    assert.equal(tokens.instanceUrl, 'https://test.my.salesforce.com');
    assert.equal(tokens.tokenType, 'Bearer');
  });

  test('surfaces the server error with secrets masked', async () => {
    const { fetch } = createFakeFetch([
      jsonResponse({ error: 'invalid_grant', error_description: 'code test-code is invalid for test-secret' }, 400)
    ]);

    await assert.rejects(
      exchangeCodeForToken({
        config: orgConfig({ clientSecret: 'test-secret' }),
        session: generateAuthSession({ port: 8080 }),
        code: 'test-code',
        redirectUri: REDIRECT_URI,
        fetchImpl: fetch
      }),
      (err: unknown) => {
        assert.ok(err instanceof AuthenticationError);
        assert.equal(err.message, 'Token exchange failed (400): invalid_grant: code ***MASKED*** is invalid for ***MASKED***');
        assert.equal(err.errorCode, 'invalid_grant');
        assert.equal(err.httpStatus, 400);
        return true;
      }
    );
  });

  test('falls back to the HTTP status when the error body is not JSON', async () => {
    const { fetch } = createFakeFetch([new Response('upstream unavailable', { status: 502 })]);

    await assert.rejects(
      exchangeCodeForToken({
        config: orgConfig(),
        session: generateAuthSession({ port: 8080 }),
        code: 'test-code',
        redirectUri: REDIRECT_URI,
        fetchImpl: fetch
      }),
      { message: 'Token exchange failed (502): http_502: upstream unavailable' }
    );
  });

  test('fails when the response carries no access token', async () => {
    const { fetch } = createFakeFetch([jsonResponse({ instance_url: 'https://test.my.salesforce.com' })]);

    await assert.rejects(
      exchangeCodeForToken({
        config: orgConfig(),
        session: generateAuthSession({ port: 8080 }),
        code: 'test-code',
        redirectUri: REDIRECT_URI,
        fetchImpl: fetch
      }),
      /did not include an access_token/
    );
  });

  test('wraps network failures', async () => {
    const { fetch } = createFakeFetch([new Error('getaddrinfo ENOTFOUND test.my.salesforce.com')]);

    await assert.rejects(
      exchangeCodeForToken({
        config: orgConfig(),
        session: generateAuthSession({ port: 8080 }),
        code: 'test-code',
        redirectUri: REDIRECT_URI,
        fetchImpl: fetch
      }),
      { name: 'AuthenticationError', message: 'Token request failed: getaddrinfo ENOTFOUND test.my.salesforce.com' }
    );
  });

  test('a session is exchanged at most once', async () => {
    const session = generateAuthSession({ port: 8080 });
    const { fetch, calls } = createFakeFetch([jsonResponse({ access_token: 'test-access-token' })]);
    const params = { config: orgConfig(), session, code: 'test-code', redirectUri: REDIRECT_URI, fetchImpl: fetch };

    await exchangeCodeForToken(params);
    await assert.rejects(exchangeCodeForToken(params), /already used/);
    assert.equal(calls.length, 1);
  });

  test('a failed exchange still consumes the session', async () => {
    const session = generateAuthSession({ port: 8080 });
    const { fetch, calls } = createFakeFetch([
      jsonResponse({ error: 'invalid_grant', error_description: 'expired authorization code' }, 400),
      jsonResponse({ access_token: 'test-access-token' })
    ]);
    const params = { config: orgConfig(), session, code: 'test-code', redirectUri: REDIRECT_URI, fetchImpl: fetch };

    await assert.rejects(exchangeCodeForToken(params), /invalid_grant/);
    await assert.rejects(exchangeCodeForToken(params), /already used/);
    assert.equal(calls.length, 1);
  });
});

describe('tokenEndpoint', () => {
  test('is relative to the instance', () => {
    assert.equal(tokenEndpoint('https://acme.my.salesforce.com'), 'https://acme.my.salesforce.com/services/oauth2/token');
  });
});
