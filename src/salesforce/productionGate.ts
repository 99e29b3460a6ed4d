/**
 * Production safety gate
 *
 * Classifies the org from Organization.IsSandbox (never from the URL, custom
 * domains make that unreliable) and decides whether deletion may go ahead.
 */

import { ProductionGateDeclinedError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { OrgConfig, OrgProfile } from "../types.js";
import { readBoolean, readString } from "../utils/json.js";
import type { SalesforceApi } from "./toolingClient.js";

export const ORGANIZATION_QUERY = "SELECT Id, Name, IsSandbox, OrganizationType FROM Organization LIMIT 1";

/**
 * Resolves the production confirmation. Interactive runs ask a human,
 * batch runs answer from autoConfirmProduction.
 */
export type ProductionDecision = (profile: OrgProfile, config: OrgConfig) => Promise<boolean> | boolean;

export async function classifyOrg(client: SalesforceApi, logger?: Logger): Promise<OrgProfile> {
  try {
    const [org] = await client.query(ORGANIZATION_QUERY);
    if (!org) {
      throw new Error("Organization query returned no rows");
    }
    return {
      // Missing flag counts as production
      isSandbox: readBoolean(org, "IsSandbox") ?? false,
      organizationId: readString(org, "Id") ?? "unknown",
      name: readString(org, "Name") ?? "Unknown",
      organizationType: readString(org, "OrganizationType"),
      classifiedBy: "query"
    };
  } catch (err) {
    logger?.warn(
      `⚠️  Failed to check instance type (${err instanceof Error ? err.message : String(err)}); assuming PRODUCTION`
    );
    return {
      isSandbox: false,
      organizationId: "unknown",
      name: "Unknown",
      classifiedBy: "fallback"
    };
  }
}

/**
 * Returns the org profile, or null when the check is skipped by config.
 * Throws ProductionGateDeclinedError when a production org is not confirmed.
 */
export async function applyProductionGate(
  config: OrgConfig,
  client: SalesforceApi,
  decide: ProductionDecision | undefined,
  logger?: Logger
): Promise<OrgProfile | null> {
  if (config.skipProductionCheck) {
    logger?.log("Production check skipped (skip_production_check)");
    return null;
  }

  const profile = await classifyOrg(client, logger);

  if (profile.isSandbox) {
    logger?.log(`✔ Sandbox instance detected: ${profile.name}`);
    return profile;
  }

  logger?.warn(`🚨 PRODUCTION instance detected: ${profile.name}`);

  if (config.autoConfirmProduction) {
    logger?.log("Auto-confirming production deletion (auto_confirm_production)");
    return profile;
  }

  const allowed = decide ? await decide(profile, config) : false;
  if (!allowed) {
    throw new ProductionGateDeclinedError(
      decide
        ? `Production org ${profile.name} was not confirmed`
        : `Production org ${profile.name} skipped (set auto_confirm_production to allow)`
    );
  }
  return profile;
}
