/**
 * Salesforce REST / Tooling API client
 * Bearer auth, query pagination, composite requests and retry on throttling
 */

import { ApiRequestError } from "../errors.js";
import type { FetchLike } from "../auth/tokenExchange.js";
import type { TokenSet } from "../types.js";
import { isRecord, readArray, readBoolean, readNumber, readString, type JsonRecord } from "../utils/json.js";

export const DEFAULT_API_VERSION = "v60.0";

export type CompositeSubrequest = {
  method: "DELETE" | "GET" | "PATCH" | "POST";
  url: string;
  referenceId: string;
};

export type CompositeSubresponse = {
  referenceId: string;
  httpStatusCode: number;
  body: unknown;
};

/** The slice of the Salesforce API the cleanup pipeline needs. */
export interface SalesforceApi {
  readonly instanceUrl: string;
  readonly apiVersion: string;
  query(soql: string): Promise<JsonRecord[]>;
  toolingQuery(soql: string): Promise<JsonRecord[]>;
  composite(subrequests: CompositeSubrequest[]): Promise<CompositeSubresponse[]>;
}

export type ToolingClientOptions = {
  apiVersion?: string;
  fetchImpl?: FetchLike;
  maxRetries?: number;
  baseDelayMs?: number;
};

const RETRYABLE_STATUSES = new Set([429, 503]);

export class ToolingClient implements SalesforceApi {
  readonly instanceUrl: string;
  readonly apiVersion: string;
  private readonly accessToken: string;
  private readonly tokenType: string;
  private readonly fetchImpl: FetchLike;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(tokens: TokenSet, options: ToolingClientOptions = {}) {
    this.instanceUrl = tokens.instanceUrl;
    this.accessToken = tokens.accessToken;
    this.tokenType = tokens.tokenType || "Bearer";
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
  }

  /** Data API query (e.g. Organization). Follows nextRecordsUrl until done. */
  async query(soql: string): Promise<JsonRecord[]> {
    return this.queryAll(`/services/data/${this.apiVersion}/query`, soql);
  }

  /** Tooling API query (e.g. Flow). Follows nextRecordsUrl until done. */
  async toolingQuery(soql: string): Promise<JsonRecord[]> {
    return this.queryAll(`/services/data/${this.apiVersion}/tooling/query`, soql);
  }

  /**
   * Tooling composite request with allOrNone=false: sub-requests succeed or
   * fail independently. Never retried, so a delete is attempted at most once.
   */
  async composite(subrequests: CompositeSubrequest[]): Promise<CompositeSubresponse[]> {
    const data = await this.request(
      `/services/data/${this.apiVersion}/tooling/composite`,
      {
        method: "POST",
        body: JSON.stringify({ allOrNone: false, compositeRequest: subrequests })
      },
      false
    );

    if (!isRecord(data)) {
      throw new ApiRequestError(200, "Composite response was not a JSON object");
    }

    return readArray(data, "compositeResponse").filter(isRecord).map(item => ({
      referenceId: readString(item, "referenceId") ?? "",
      httpStatusCode: readNumber(item, "httpStatusCode") ?? 0,
      body: item.body
    }));
  }

  private async queryAll(path: string, soql: string): Promise<JsonRecord[]> {
    const records: JsonRecord[] = [];
    let next: string | undefined = `${path}?${new URLSearchParams({ q: soql }).toString()}`;

    while (next) {
      const page = await this.request(next, { method: "GET" }, true);
      if (!isRecord(page)) {
        throw new ApiRequestError(200, "Query response was not a JSON object");
      }
      records.push(...readArray(page, "records").filter(isRecord));
      const done = readBoolean(page, "done") ?? true;
      next = done ? undefined : readString(page, "nextRecordsUrl");
    }

    return records;
  }

  private async request(pathOrUrl: string, init: RequestInit, retryable: boolean): Promise<unknown> {
    const url = pathOrUrl.startsWith("http") ? pathOrUrl : `${this.instanceUrl}${pathOrUrl}`;
    let attempt = 0;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          ...init,
          headers: {
            Authorization: `${this.tokenType} ${this.accessToken}`,
            "Content-Type": "application/json",
            Accept: "application/json"
          }
        });
      } catch (err) {
        throw new ApiRequestError(0, `Request to ${pathOrUrl.split("?")[0]} failed: ${err instanceof Error ? err.message : String(err)}`);
      }

      attempt += 1;
      if (retryable && RETRYABLE_STATUSES.has(response.status) && attempt <= this.maxRetries) {
        let delay = this.baseDelayMs * Math.pow(2, attempt - 1);

        // Respect Retry-After header if provided
        const retryAfter = response.headers.get("Retry-After");
        if (retryAfter) {
          const retryAfterSeconds = parseInt(retryAfter, 10);
          if (!isNaN(retryAfterSeconds)) {
            delay = retryAfterSeconds * 1000;
          }
        }

        await new Promise(resolve => setTimeout(resolve, delay));
        continue;
      }

      const text = await response.text();
      const data = parseJson(text);

      if (!response.ok) {
        throw toApiError(response.status, data, text);
      }
      return data;
    }
  }
}

function parseJson(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Salesforce errors arrive as [{ message, errorCode }] */
export function toApiError(status: number, data: unknown, rawText: string): ApiRequestError {
  const entries: unknown[] = Array.isArray(data) ? data : [data];
  const first = entries.find(isRecord);
  if (first) {
    const errorCode = readString(first, "errorCode") ?? readString(first, "error");
    const message = readString(first, "message") ?? readString(first, "error_description") ?? rawText;
    return new ApiRequestError(status, `${errorCode ? `${errorCode}: ` : ""}${message}`, errorCode);
  }
  return new ApiRequestError(status, rawText.trim() !== "" ? rawText.slice(0, 500) : `HTTP ${status}`);
}
