/**
 * Flow version resolver
 *
 * Finds Flow versions that are safe to delete: not the latest version of their
 * definition and not active. "Latest" is the highest VersionNumber across all
 * versions of a definition, active ones included.
 */

import { ResolutionError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { FlowVersionCandidate, SelectionPolicy } from "../types.js";
import { readNumber, readRecord, readString, type JsonRecord } from "../utils/json.js";
import type { SalesforceApi } from "./toolingClient.js";

const FLOW_FIELDS = "Id, MasterLabel, VersionNumber, Status, DefinitionId, Definition.DeveloperName, Definition.MasterLabel";

/** Per-definition count of deletable versions, for the browse picker. */
export type FlowSummary = {
  apiName: string;
  label: string;
  deletableVersions: number;
};

/** Picks flow API names out of the browse list; an empty pick resolves nothing. */
export type FlowPicker = (flows: FlowSummary[]) => Promise<string[]> | string[];

export function escapeSoqlString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export function buildFlowVersionsQuery(names?: string[]): string {
  const where =
    names && names.length > 0
      ? ` WHERE Definition.DeveloperName IN (${names.map(name => `'${escapeSoqlString(name)}'`).join(", ")})`
      : "";
  return `SELECT ${FLOW_FIELDS} FROM Flow${where} ORDER BY Definition.DeveloperName, VersionNumber DESC`;
}

type FlowVersionRow = {
  id: string;
  apiName: string;
  label: string;
  definitionId: string;
  versionNumber: number;
  status: string;
};

function toRow(record: JsonRecord): FlowVersionRow | null {
  const definition = readRecord(record, "Definition");
  const id = readString(record, "Id");
  const definitionId = readString(record, "DefinitionId");
  const versionNumber = readNumber(record, "VersionNumber");
  if (!id || !definitionId || versionNumber === undefined) return null;

  const apiName = (definition && readString(definition, "DeveloperName")) ?? definitionId;
  return {
    id,
    apiName,
    label: (definition && readString(definition, "MasterLabel")) ?? readString(record, "MasterLabel") ?? apiName,
    definitionId,
    versionNumber,
    status: readString(record, "Status") ?? "Unknown"
  };
}

function compareCandidates(a: FlowVersionCandidate, b: FlowVersionCandidate): number {
  if (a.flowDefinitionApiName !== b.flowDefinitionApiName) {
    return a.flowDefinitionApiName < b.flowDefinitionApiName ? -1 : 1;
  }
  if (a.versionNumber !== b.versionNumber) {
    return a.versionNumber - b.versionNumber;
  }
  return a.durableId < b.durableId ? -1 : a.durableId > b.durableId ? 1 : 0;
}

/**
 * Pure selection step: marks latest/active on every version and returns the
 * deletable ones in a stable order (API name, then version ascending).
 */
export function selectDeletableVersions(records: JsonRecord[]): FlowVersionCandidate[] {
  const rows = records.map(toRow).filter((row): row is FlowVersionRow => row !== null);

  const latestByDefinition = new Map<string, number>();
  for (const row of rows) {
    const current = latestByDefinition.get(row.definitionId);
    if (current === undefined || row.versionNumber > current) {
      latestByDefinition.set(row.definitionId, row.versionNumber);
    }
  }

  const candidates: FlowVersionCandidate[] = [];
  for (const row of rows) {
    const isLatest = row.versionNumber === latestByDefinition.get(row.definitionId);
    const isActive = row.status === "Active";
    if (isLatest || isActive) continue;
    candidates.push({
      durableId: row.id,
      flowDefinitionApiName: row.apiName,
      definitionId: row.definitionId,
      masterLabel: row.label,
      versionNumber: row.versionNumber,
      status: row.status,
      isActive,
      isLatest
    });
  }

  return candidates.sort(compareCandidates);
}

async function queryFlowVersions(client: SalesforceApi, names?: string[]): Promise<JsonRecord[]> {
  try {
    return await client.toolingQuery(buildFlowVersionsQuery(names));
  } catch (err) {
    throw new ResolutionError(
      `Flow version query failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

export async function listFlowsWithOldVersions(client: SalesforceApi): Promise<FlowSummary[]> {
  const candidates = selectDeletableVersions(await queryFlowVersions(client));
  const byName = new Map<string, FlowSummary>();
  for (const candidate of candidates) {
    const entry = byName.get(candidate.flowDefinitionApiName);
    if (entry) {
      entry.deletableVersions += 1;
    } else {
      byName.set(candidate.flowDefinitionApiName, {
        apiName: candidate.flowDefinitionApiName,
        label: candidate.masterLabel,
        deletableVersions: 1
      });
    }
  }
  return [...byName.values()].sort((a, b) => a.apiName.toLowerCase().localeCompare(b.apiName.toLowerCase()));
}

export type ResolveOptions = {
  logger?: Logger;
  pickFlows?: FlowPicker;
};

/**
 * Resolves the candidates for a selection policy. Browse without a picker
 * falls back to the names it was seeded with.
 */
export async function resolveCandidates(
  policy: SelectionPolicy,
  client: SalesforceApi,
  options: ResolveOptions = {}
): Promise<FlowVersionCandidate[]> {
  const { logger } = options;

  switch (policy.kind) {
    case "all-old-versions": {
      const candidates = selectDeletableVersions(await queryFlowVersions(client));
      logger?.log(`Found ${candidates.length} old Flow version(s) that can be deleted`);
      return candidates;
    }
    case "named-flows":
      return resolveNamed(policy.names, client, logger);
    case "browse": {
      if (!options.pickFlows) {
        if (policy.names && policy.names.length > 0) {
          return resolveNamed(policy.names, client, logger);
        }
        throw new ResolutionError("Browse selection needs an interactive session or flow_names in the config");
      }
      const flows = await listFlowsWithOldVersions(client);
      if (flows.length === 0) {
        logger?.log("No flows with old versions found");
        return [];
      }
      const picked = await options.pickFlows(flows);
      if (picked.length === 0) {
        logger?.log("No flows selected");
        return [];
      }
      return resolveNamed(picked, client, logger);
    }
  }
}

async function resolveNamed(names: string[], client: SalesforceApi, logger?: Logger): Promise<FlowVersionCandidate[]> {
  const unique = [...new Set(names.map(name => name.trim()).filter(name => name !== ""))];
  if (unique.length === 0) {
    return [];
  }

  const records = await queryFlowVersions(client, unique);
  // DeveloperName matching in SOQL ignores case
  const wanted = new Set(unique.map(name => name.toLowerCase()));
  const candidates = selectDeletableVersions(records).filter(candidate =>
    wanted.has(candidate.flowDefinitionApiName.toLowerCase())
  );

  const seen = new Set(records.map(record => toRow(record)?.apiName.toLowerCase()));
  const unmatched = unique.filter(name => !seen.has(name.toLowerCase()));
  if (unmatched.length > 0) {
    logger?.warn(`No Flow found for: ${unmatched.join(", ")}`);
  }

  logger?.log(`Found ${candidates.length} old version(s) across ${unique.length} named Flow(s)`);
  return candidates;
}
