/**
 * Cleanup orchestrator
 *
 * Runs authenticate → production gate → resolve → delete for each org,
 * strictly one org at a time so only one callback listener holds a port.
 * A failing org becomes a RunResult with fatalError; the batch carries on.
 */

import { authenticate } from "../auth/authenticate.js";
import { DEFAULT_CALLBACK_TIMEOUT_MS, generateAuthSession } from "../auth/pkce.js";
import { describeError, ProductionGateDeclinedError } from "../errors.js";
import type { Logger } from "../logger.js";
import { COMPOSITE_BATCH_LIMIT, deleteCandidates } from "../salesforce/bulkDeleter.js";
import { resolveCandidates, type FlowPicker } from "../salesforce/flowResolver.js";
import { applyProductionGate } from "../salesforce/productionGate.js";
import { ToolingClient } from "../salesforce/toolingClient.js";
import type { DeletionRecord, FlowVersionCandidate, OrgConfig, OrgProfile, RunResult, SelectionPolicy } from "../types.js";
import type { BatchRunSummary, OrchestratorOptions, PipelineDeps } from "./types.js";

export function createDefaultDeps(options: {
  logger: Logger;
  apiVersion?: string;
  stateMismatchRetries?: number;
}): PipelineDeps {
  return {
    generateSession: (port, timeoutMs) => generateAuthSession({ port, timeoutMs }),
    authenticate: (config, session) =>
      authenticate(config, session, {
        logger: options.logger,
        stateMismatchRetries: options.stateMismatchRetries
      }),
    createClient: tokens => new ToolingClient(tokens, { apiVersion: options.apiVersion })
  };
}

function skippedRecords(candidates: FlowVersionCandidate[], reason: string): DeletionRecord[] {
  return candidates.map((candidate): DeletionRecord => ({
    candidate,
    outcome: { status: "skipped", reason },
    batch: 0
  }));
}

export class CleanupOrchestrator {
  private browseSelection: string[] | undefined;

  constructor(
    private readonly options: OrchestratorOptions,
    private readonly deps: PipelineDeps = createDefaultDeps({ logger: options.logger })
  ) {
    const batchSize = options.batchSize ?? COMPOSITE_BATCH_LIMIT;
    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > COMPOSITE_BATCH_LIMIT) {
      throw new RangeError(`batchSize must be an integer between 1 and ${COMPOSITE_BATCH_LIMIT}`);
    }
  }

  /**
   * Process every org in order. The returned results keep the input order.
   */
  async run(tenants: readonly OrgConfig[]): Promise<RunResult[]> {
    const results: RunResult[] = [];

    for (const [index, config] of tenants.entries()) {
      this.options.logger.tenantStart(index + 1, tenants.length, config.instanceUrl);
      const result = await this.runTenant(config);
      results.push(result);

      if (this.options.onTenantComplete) {
        try {
          await this.options.onTenantComplete(result, index);
        } catch (err) {
          this.options.logger.error(
            `Could not record results for ${config.instanceUrl}: ${err instanceof Error ? err.message : String(err)}`
          );
        }
      }
    }

    return results;
  }

  async runWithSummary(tenants: readonly OrgConfig[]): Promise<BatchRunSummary> {
    const startedAt = Date.now();
    const results = await this.run(tenants);
    return { results, startedAt, endedAt: Date.now() };
  }

  private async runTenant(config: OrgConfig): Promise<RunResult> {
    const { logger } = this.options;
    const startedAt = Date.now();

    // Generated outside the tenant boundary: losing the entropy source aborts the whole batch
    const session = this.deps.generateSession(
      config.callbackPort,
      this.options.callbackTimeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS
    );

    let authenticated = false;
    let profile: OrgProfile | undefined;
    const finish = (result: Pick<RunResult, "status" | "deletionRecords"> & Partial<RunResult>): RunResult => ({
      tenant: config.instanceUrl,
      authenticated,
      profile,
      startedAt,
      endedAt: Date.now(),
      ...result
    });

    try {
      const tokens = await this.deps.authenticate(config, session);
      authenticated = true;
      const client = this.deps.createClient(tokens);

      profile = (await applyProductionGate(config, client, this.options.confirmProduction, logger)) ?? undefined;

      const { policy, pickFlows } = this.selectionFor(config);
      const candidates = await resolveCandidates(policy, client, { logger, pickFlows });

      if (candidates.length === 0) {
        logger.log("✨ No Flow versions found to delete");
        return finish({ status: "completed", deletionRecords: [] });
      }

      // Runs before any prompt or delete; a failure here fails the org with nothing deleted
      await this.options.onCandidatesResolved?.(candidates, config);

      if (this.options.dryRun) {
        logger.log(`Dry run: ${candidates.length} Flow version(s) would be deleted`);
        return finish({ status: "completed", deletionRecords: skippedRecords(candidates, "dry run") });
      }

      if (this.options.confirmDeletion) {
        const confirmed = await this.options.confirmDeletion(candidates, { config, profile });
        if (!confirmed) {
          logger.warn("Deletion cancelled by user");
          return finish({
            status: "skipped",
            skipReason: "Deletion was not confirmed",
            deletionRecords: skippedRecords(candidates, "not confirmed")
          });
        }
      }

      const onBatchComplete = this.options.onBatchComplete;
      const deletionRecords = await deleteCandidates(candidates, client, {
        batchSize: this.options.batchSize,
        logger,
        onBatchComplete: onBatchComplete ? progress => onBatchComplete(progress, config) : undefined
      });

      return finish({ status: "completed", deletionRecords });
    } catch (err) {
      if (err instanceof ProductionGateDeclinedError) {
        logger.warn(`⏭  ${err.message}`);
        return finish({ status: "skipped", skipReason: err.message, deletionRecords: [] });
      }
      const fatalError = describeError(err);
      logger.error(`✖ ${config.instanceUrl}: ${fatalError.message}`);
      return finish({ status: "failed", fatalError, deletionRecords: [] });
    }
  }

  /**
   * A browse pick made for one org is reused for the orgs after it.
   */
  private selectionFor(config: OrgConfig): { policy: SelectionPolicy; pickFlows?: FlowPicker } {
    const policy = config.selectionPolicy;
    if (policy.kind !== "browse") {
      return { policy };
    }
    if (this.browseSelection) {
      return { policy: { kind: "browse", names: this.browseSelection } };
    }
    const picker = this.options.pickFlows;
    if (!picker) {
      return { policy };
    }
    return {
      policy,
      pickFlows: async flows => {
        const names = await picker(flows);
        if (names.length > 0) {
          this.browseSelection = names;
        }
        return names;
      }
    };
  }
}
