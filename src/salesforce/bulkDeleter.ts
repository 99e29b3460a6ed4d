/**
 * Bulk deletion through the Tooling composite API.
 *
 * Candidates are split into ordered batches of at most COMPOSITE_BATCH_LIMIT
 * sub-requests. Every candidate ends up with exactly one DeletionRecord, in
 * input order, whether its batch partly failed or was rejected outright.
 */

import { ApiRequestError, DeletionBatchError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { DeletionRecord, FlowVersionCandidate } from "../types.js";
import { isRecord, readString } from "../utils/json.js";
import type { CompositeSubrequest, CompositeSubresponse, SalesforceApi } from "./toolingClient.js";

/** Salesforce composite API limit on sub-requests per call */
export const COMPOSITE_BATCH_LIMIT = 25;

export type BatchProgress = {
  batch: number;
  totalBatches: number;
  deleted: number;
  failed: number;
  processed: number;
  total: number;
};

export type DeleteOptions = {
  batchSize?: number;
  logger?: Logger;
  onBatchComplete?: (progress: BatchProgress) => void;
};

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer (got ${size})`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

export function referenceIdFor(batch: number, index: number): string {
  return `batch${batch}_del${index + 1}`;
}

function describeSubresponseError(body: unknown): string {
  const entries: unknown[] = Array.isArray(body) ? body : [body];
  const messages = entries.filter(isRecord).map(entry => {
    const errorCode = readString(entry, "errorCode");
    const message = readString(entry, "message") ?? "Unknown error";
    return errorCode ? `${errorCode}: ${message}` : message;
  });
  return messages.length > 0 ? messages.join("; ") : "Unknown error";
}

function reconcileBatch(
  batch: number,
  candidates: FlowVersionCandidate[],
  responses: CompositeSubresponse[]
): DeletionRecord[] {
  const byReference = new Map(
    responses.map((response): [string, CompositeSubresponse] => [response.referenceId, response])
  );

  return candidates.map((candidate, index): DeletionRecord => {
    const response = byReference.get(referenceIdFor(batch, index));
    if (!response) {
      return {
        candidate,
        outcome: { status: "failed", reason: "No result returned for this sub-request" },
        batch
      };
    }
    const ok = response.httpStatusCode >= 200 && response.httpStatusCode < 300;
    return {
      candidate,
      outcome: ok
        ? { status: "deleted" }
        : { status: "failed", reason: describeSubresponseError(response.body) },
      httpStatus: response.httpStatusCode,
      batch
    };
  });
}

export async function deleteCandidates(
  candidates: readonly FlowVersionCandidate[],
  client: SalesforceApi,
  options: DeleteOptions = {}
): Promise<DeletionRecord[]> {
  const { logger } = options;
  const batchSize = Math.min(options.batchSize ?? COMPOSITE_BATCH_LIMIT, COMPOSITE_BATCH_LIMIT);
  const batches = chunk(candidates, batchSize);
  const records: DeletionRecord[] = [];

  if (batches.length === 0) {
    return records;
  }

  logger?.log(
    `Processing ${candidates.length} deletion(s) in ${batches.length} batch(es) of up to ${batchSize} each`
  );

  for (const [offset, batchCandidates] of batches.entries()) {
    const batch = offset + 1;
    const subrequests: CompositeSubrequest[] = batchCandidates.map((candidate, index): CompositeSubrequest => ({
      method: "DELETE",
      url: `/services/data/${client.apiVersion}/tooling/sobjects/Flow/${encodeURIComponent(candidate.durableId)}`,
      referenceId: referenceIdFor(batch, index)
    }));

    let batchRecords: DeletionRecord[];
    try {
      const responses = await client.composite(subrequests);
      batchRecords = reconcileBatch(batch, batchCandidates, responses);
    } catch (err) {
      const status = err instanceof ApiRequestError && err.status > 0 ? err.status : undefined;
      const batchError = new DeletionBatchError(
        batch,
        `Batch ${batch} was rejected: ${err instanceof Error ? err.message : String(err)}`,
        { httpStatus: status, cause: err }
      );
      logger?.error(`✖ ${batchError.message}`);
      batchRecords = batchCandidates.map((candidate): DeletionRecord => ({
        candidate,
        outcome: { status: "failed", reason: `batch-error: ${batchError.message}` },
        httpStatus: batchError.httpStatus,
        batch
      }));
    }

    records.push(...batchRecords);

    const deleted = batchRecords.filter(record => record.outcome.status === "deleted").length;
    const failed = batchRecords.length - deleted;
    logger?.batchResult(batch, batches.length, deleted, failed);
    for (const record of batchRecords) {
      if (record.outcome.status === "failed") {
        logger?.debug(
          `  ${record.candidate.flowDefinitionApiName} v${record.candidate.versionNumber} (${record.candidate.durableId}): ${record.outcome.reason}`
        );
      }
    }

    options.onBatchComplete?.({
      batch,
      totalBatches: batches.length,
      deleted,
      failed,
      processed: records.length,
      total: candidates.length
    });
  }

  return records;
}
