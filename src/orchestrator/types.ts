/**
 * Cleanup orchestrator - type definitions
 */

import type { Logger } from "../logger.js";
import type { BatchProgress } from "../salesforce/bulkDeleter.js";
import type { FlowPicker } from "../salesforce/flowResolver.js";
import type { ProductionDecision } from "../salesforce/productionGate.js";
import type { SalesforceApi } from "../salesforce/toolingClient.js";
import type { AuthSession, FlowVersionCandidate, OrgConfig, OrgProfile, RunResult, TokenSet } from "../types.js";

/** Last look before anything is deleted; false skips the org. */
export type DeletionConfirmation = (
  candidates: FlowVersionCandidate[],
  context: { config: OrgConfig; profile: OrgProfile | undefined }
) => Promise<boolean> | boolean;

export interface OrchestratorOptions {
  logger: Logger;
  dryRun?: boolean;
  batchSize?: number;
  callbackTimeoutMs?: number;

  // Decision points (interactive prompts, or absent in silent mode)
  confirmProduction?: ProductionDecision;
  confirmDeletion?: DeletionConfirmation;
  pickFlows?: FlowPicker;

  // Hooks
  onCandidatesResolved?: (candidates: FlowVersionCandidate[], config: OrgConfig) => Promise<void> | void;
  onTenantComplete?: (result: RunResult, index: number) => Promise<void> | void;
  onBatchComplete?: (progress: BatchProgress, config: OrgConfig) => void;
}

/** Seams the orchestrator drives; swapped for in-process fakes in tests. */
export interface PipelineDeps {
  generateSession(port: number, timeoutMs: number): AuthSession;
  authenticate(config: OrgConfig, session: AuthSession): Promise<TokenSet>;
  createClient(tokens: TokenSet): SalesforceApi;
}

export interface BatchRunSummary {
  results: RunResult[];
  startedAt: number;
  endedAt: number;
}
