import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { DeletionOutcome, DeletionRecord, FlowVersionCandidate, RunResult } from "./types.js";

export type DeletionListFormat = "json" | "csv";

const CSV_COLUMNS = [
  "sessionId",
  "instance",
  "flowApiName",
  "label",
  "version",
  "flowStatus",
  "id",
  "definitionId",
  "outcome",
  "reason",
  "httpStatus",
  "batch"
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

/** Session ids are local timestamps, e.g. 20240501_134502. */
export function createSessionId(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export function deletionListPath(
  dir: string,
  instanceUrl: string,
  sessionId: string,
  format: DeletionListFormat = "json"
): string {
  let host: string;
  try {
    host = new URL(instanceUrl).hostname;
  } catch {
    host = instanceUrl;
  }
  const slug = host.replace(/[^A-Za-z0-9.-]+/g, "_");
  return path.join(dir, `flows_to_delete_${slug}_${sessionId}.${format}`);
}

/** One line of a deletion list; "pending" before anything was attempted. */
type ListEntry = {
  candidate: FlowVersionCandidate;
  outcome: DeletionOutcome["status"] | "pending";
  reason?: string;
  httpStatus?: number;
  batch: number;
};

type ListHeader = {
  sessionId: string;
  instance: string;
  status: string;
  timestamp: Date;
};

function fromRecord(record: DeletionRecord): ListEntry {
  return {
    candidate: record.candidate,
    outcome: record.outcome.status,
    reason: record.outcome.status === "deleted" ? undefined : record.outcome.reason,
    httpStatus: record.httpStatus,
    batch: record.batch
  };
}

function toRow(entry: ListEntry, header: ListHeader): Record<CsvColumn, string> {
  const { candidate } = entry;
  return {
    sessionId: header.sessionId,
    instance: header.instance,
    flowApiName: candidate.flowDefinitionApiName,
    label: candidate.masterLabel,
    version: String(candidate.versionNumber),
    flowStatus: candidate.status,
    id: candidate.durableId,
    definitionId: candidate.definitionId,
    outcome: entry.outcome,
    reason: entry.reason ?? "",
    httpStatus: entry.httpStatus != null ? String(entry.httpStatus) : "",
    batch: entry.batch > 0 ? String(entry.batch) : ""
  };
}

async function writeEntries(outPath: string, header: ListHeader, entries: ListEntry[]): Promise<boolean> {
  if (entries.length === 0) return false;

  await fs.promises.mkdir(path.dirname(outPath), { recursive: true });

  if (path.extname(outPath).toLowerCase() === ".csv") {
    const rows = entries.map(entry => toRow(entry, header));
    const csv = stringify(rows, { header: true, columns: [...CSV_COLUMNS] });
    await fs.promises.writeFile(outPath, csv, "utf8");
    return true;
  }

  const payload = {
    session_id: header.sessionId,
    timestamp: header.timestamp.toISOString(),
    instance_url: header.instance,
    status: header.status,
    total_flows: entries.length,
    flows: entries.map(entry => ({
      id: entry.candidate.durableId,
      name: entry.candidate.flowDefinitionApiName,
      label: entry.candidate.masterLabel,
      version: entry.candidate.versionNumber,
      status: entry.candidate.status,
      definition_id: entry.candidate.definitionId,
      outcome: entry.outcome,
      ...(entry.reason !== undefined ? { reason: entry.reason } : {}),
      ...(entry.httpStatus != null ? { http_status: entry.httpStatus } : {}),
      batch: entry.batch
    }))
  };
  await fs.promises.writeFile(outPath, JSON.stringify(payload, null, 2), "utf8");
  return true;
}

/**
 * Records what is about to be deleted, before any confirmation or DELETE
 * call. The final list for the same org and session overwrites it.
 */
export async function writePendingDeletionList(
  outPath: string,
  instanceUrl: string,
  candidates: readonly FlowVersionCandidate[],
  sessionId: string,
  now: Date = new Date()
): Promise<boolean> {
  const entries = candidates.map((candidate): ListEntry => ({ candidate, outcome: "pending", batch: 0 }));
  return writeEntries(outPath, { sessionId, instance: instanceUrl, status: "pending", timestamp: now }, entries);
}

/**
 * Writes the per-org list of Flow versions and what happened to each.
 * Format follows the file extension; nothing is written for an empty list.
 */
export async function writeDeletionList(outPath: string, result: RunResult, sessionId: string): Promise<boolean> {
  return writeEntries(
    outPath,
    { sessionId, instance: result.tenant, status: result.status, timestamp: new Date(result.endedAt) },
    result.deletionRecords.map(fromRecord)
  );
}
