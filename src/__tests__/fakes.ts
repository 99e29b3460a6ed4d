/**
 * In-process stand-ins shared by the test files: a scripted fetch, a fake
 * Salesforce API and a logger that records instead of printing.
 */

import type { FetchLike } from '../auth/tokenExchange.js';
import type { Logger } from '../logger.js';
import type { CompositeSubrequest, CompositeSubresponse, SalesforceApi } from '../salesforce/toolingClient.js';
import type { FlowVersionCandidate, OrgConfig } from '../types.js';
import type { JsonRecord } from '../utils/json.js';

export type FetchCall = { url: string; init: RequestInit | undefined };

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  });
}

/**
 * Answers each call with the next scripted response (or error); the last one repeats.
 */
export function createFakeFetch(script: Array<Response | Error | (() => Response)>): { fetch: FetchLike; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    calls.push({ url, init });
    const next = script[Math.min(calls.length - 1, script.length - 1)];
    if (next === undefined) throw new Error('No scripted response');
    if (next instanceof Error) throw next;
    return typeof next === 'function' ? next() : next.clone();
  };
  return { fetch: fetchImpl, calls };
}

export type LogLine = { level: 'log' | 'warn' | 'error' | 'debug'; message: string };

export function createRecordingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const record = (level: LogLine['level']) => (...args: unknown[]) => {
    lines.push({ level, message: args.map(arg => String(arg)).join(' ') });
  };
  const logger: Logger = {
    log: record('log'),
    warn: record('warn'),
    error: record('error'),
    debug: record('debug'),
    tenantStart: (index, total, instanceUrl) => record('log')(`▶ Processing org ${index}/${total}: ${instanceUrl}`),
    batchResult: (batch, totalBatches, deleted, failed) =>
      record('log')(`Batch ${batch}/${totalBatches}: ${deleted} deleted, ${failed} failed`),
    logFile: undefined
  };
  return { logger, lines };
}

type FakeApiHandlers = {
  query?: (soql: string) => Promise<JsonRecord[]> | JsonRecord[];
  toolingQuery?: (soql: string) => Promise<JsonRecord[]> | JsonRecord[];
  composite?: (subrequests: CompositeSubrequest[]) => Promise<CompositeSubresponse[]> | CompositeSubresponse[];
};

/** Records every call; unscripted calls return no rows / all 204s. */
export class FakeSalesforceApi implements SalesforceApi {
  readonly instanceUrl: string;
  readonly apiVersion = 'v60.0';
  readonly queries: string[] = [];
  readonly toolingQueries: string[] = [];
  readonly compositeCalls: CompositeSubrequest[][] = [];

  constructor(private readonly handlers: FakeApiHandlers = {}, instanceUrl = 'https://test.my.salesforce.com') {
    this.instanceUrl = instanceUrl;
  }

  async query(soql: string): Promise<JsonRecord[]> {
    this.queries.push(soql);
    return this.handlers.query ? this.handlers.query(soql) : [];
  }

  async toolingQuery(soql: string): Promise<JsonRecord[]> {
    this.toolingQueries.push(soql);
    return this.handlers.toolingQuery ? this.handlers.toolingQuery(soql) : [];
  }

  async composite(subrequests: CompositeSubrequest[]): Promise<CompositeSubresponse[]> {
    this.compositeCalls.push(subrequests);
    if (this.handlers.composite) return this.handlers.composite(subrequests);
    return subrequests.map(sub => ({ referenceId: sub.referenceId, httpStatusCode: 204, body: null }));
  }
}

export function flowRecord(fields: {
  id: string;
  name: string;
  definitionId: string;
  version: number;
  status?: string;
  label?: string;
}): JsonRecord {
  return {
    Id: fields.id,
    MasterLabel: fields.label ?? fields.name,
    VersionNumber: fields.version,
    Status: fields.status ?? 'Obsolete',
    DefinitionId: fields.definitionId,
    Definition: { DeveloperName: fields.name, MasterLabel: fields.label ?? fields.name }
  };
}

export function candidate(name: string, version: number, durableId = `301${name}${version}`): FlowVersionCandidate {
  return {
    durableId,
    flowDefinitionApiName: name,
    definitionId: `300${name}`,
    masterLabel: name,
    versionNumber: version,
    status: 'Obsolete',
    isActive: false,
    isLatest: false
  };
}

export function orgConfig(overrides: Partial<OrgConfig> = {}): OrgConfig {
  return {
    instanceUrl: 'https://test.my.salesforce.com',
    clientId: 'test-client-id',
    callbackPort: 0,
    selectionPolicy: { kind: 'all-old-versions' },
    skipProductionCheck: false,
    autoConfirmProduction: false,
    ...overrides
  };
}
