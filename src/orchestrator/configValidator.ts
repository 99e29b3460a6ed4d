/**
 * Cleanup config validation
 *
 * Turns the JSON config file's `orgs` entries into OrgConfig records.
 * Blocking problems go to `errors`, questionable-but-usable ones to `warnings`.
 */

import type { OrgConfig, SelectionPolicy } from "../types.js";
import { isRecord, type JsonRecord } from "../utils/json.js";

export const DEFAULT_CALLBACK_PORT = 8080;
export const MIN_CALLBACK_PORT = 1024;
export const MAX_CALLBACK_PORT = 65535;

const KNOWN_ORG_KEYS = new Set([
  "instance",
  "client_id",
  "client_secret",
  "cleanup_type",
  "flow_names",
  "skip_production_check",
  "auto_confirm_production",
  "callback_port"
]);

// Config files use the numbered menu choices of the interactive prompt
const CLEANUP_TYPES: Record<string, SelectionPolicy["kind"]> = {
  "1": "all-old-versions",
  "2": "named-flows",
  "3": "browse",
  all: "all-old-versions",
  named: "named-flows",
  browse: "browse"
};

export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

export interface ConfigValidationResult extends ValidationResult {
  orgs: OrgConfig[];
}

/**
 * Accepts "mycompany", "mycompany.my.salesforce.com" or a full URL and
 * returns "https://host" with no path or trailing slash.
 */
export function normalizeInstanceUrl(input: string): string | null {
  let value = input.trim();
  if (value === "") return null;
  if (!/^https?:\/\//i.test(value)) {
    value = `https://${value}`;
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }
  if (!url.hostname.includes(".") && url.hostname !== "localhost") {
    url.hostname = `${url.hostname}.my.salesforce.com`;
  }
  return `${url.protocol}//${url.host}`;
}

/** Maps "1"/"2"/"3" or all/named/browse to a policy kind. */
export function parseCleanupType(value: unknown): SelectionPolicy["kind"] | undefined {
  const key = value === undefined || value === null ? "1" : String(value).trim().toLowerCase();
  return CLEANUP_TYPES[key];
}

export function selectionPolicyFor(kind: SelectionPolicy["kind"], names: string[] = []): SelectionPolicy {
  switch (kind) {
    case "all-old-versions":
      return { kind };
    case "named-flows":
      return { kind, names };
    case "browse":
      return names.length > 0 ? { kind, names } : { kind };
  }
}

const TRUE_WORDS = new Set(["true", "1", "yes", "y"]);
const FALSE_WORDS = new Set(["false", "0", "no", "n"]);

/** Config flags accept JSON booleans, 0/1 and yes/no style strings. */
export function parseConfigFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string" && typeof value !== "number") return undefined;
  const word = String(value).trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return undefined;
}

export function parseCallbackPort(value: unknown): number | null {
  if (value === undefined || value === null || value === "") return DEFAULT_CALLBACK_PORT;
  const port = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
  if (!Number.isInteger(port) || port < MIN_CALLBACK_PORT || port > MAX_CALLBACK_PORT) {
    return null;
  }
  return port;
}

function validateOrg(entry: JsonRecord, label: string, result: ValidationResult): OrgConfig | null {
  const errorsBefore = result.errors.length;

  for (const key of Object.keys(entry)) {
    if (!KNOWN_ORG_KEYS.has(key)) {
      result.warnings.push(`${label}: unknown field "${key}" will be ignored`);
    }
  }

  let instanceUrl: string | null = null;
  if (typeof entry.instance !== "string" || entry.instance.trim() === "") {
    result.errors.push(`${label} missing required field: instance`);
  } else {
    instanceUrl = normalizeInstanceUrl(entry.instance);
    if (!instanceUrl) {
      result.errors.push(`${label}: instance is not a valid URL: ${entry.instance}`);
    }
  }

  const clientId = typeof entry.client_id === "string" ? entry.client_id.trim() : "";
  if (clientId === "") {
    result.errors.push(`${label} missing required field: client_id`);
  }

  let clientSecret: string | undefined;
  if (entry.client_secret !== undefined && entry.client_secret !== null) {
    if (typeof entry.client_secret !== "string") {
      result.errors.push(`${label}: client_secret must be a string`);
    } else if (entry.client_secret.trim() !== "") {
      clientSecret = entry.client_secret.trim();
    }
  }

  const callbackPort = parseCallbackPort(entry.callback_port);
  if (callbackPort === null) {
    result.errors.push(
      `${label}: callback_port must be an integer between ${MIN_CALLBACK_PORT} and ${MAX_CALLBACK_PORT} (got ${String(entry.callback_port)})`
    );
  }

  const kind = parseCleanupType(entry.cleanup_type);
  if (!kind) {
    result.errors.push(
      `${label}: cleanup_type must be "1" (all), "2" (named) or "3" (browse), got ${String(entry.cleanup_type)}`
    );
  }

  let flowNames: string[] = [];
  if (entry.flow_names !== undefined && entry.flow_names !== null) {
    const rawNames: unknown = entry.flow_names;
    if (!Array.isArray(rawNames) || !rawNames.every((name): name is string => typeof name === "string")) {
      result.errors.push(`${label}: flow_names must be an array of Flow API names`);
    } else {
      flowNames = rawNames.map(name => name.trim()).filter(name => name !== "");
    }
  }

  if (kind === "named-flows" && flowNames.length === 0) {
    result.errors.push(`${label}: cleanup_type 2 requires at least one entry in flow_names`);
  }
  if (kind === "all-old-versions" && flowNames.length > 0) {
    result.warnings.push(`${label}: flow_names is ignored for cleanup_type 1 (all old versions)`);
  }

  const flags: Record<"skip_production_check" | "auto_confirm_production", boolean> = {
    skip_production_check: false,
    auto_confirm_production: false
  };
  for (const flag of ["skip_production_check", "auto_confirm_production"] as const) {
    const raw = entry[flag];
    if (raw === undefined || raw === null) continue;
    const parsed = parseConfigFlag(raw);
    if (parsed === undefined) {
      result.errors.push(`${label}: ${flag} must be a boolean (got ${String(raw)})`);
    } else {
      flags[flag] = parsed;
    }
  }
  if (flags.skip_production_check) {
    result.warnings.push(`${label}: production safety check is disabled (skip_production_check)`);
  }

  if (result.errors.length > errorsBefore || !instanceUrl || callbackPort === null || !kind) {
    return null;
  }

  return {
    instanceUrl,
    clientId,
    clientSecret,
    callbackPort,
    selectionPolicy: selectionPolicyFor(kind, flowNames),
    skipProductionCheck: flags.skip_production_check,
    autoConfirmProduction: flags.auto_confirm_production
  };
}

/**
 * Validates a parsed config file ({ "orgs": [...] }).
 */
export function validateCleanupConfig(raw: unknown): ConfigValidationResult {
  const result: ConfigValidationResult = { orgs: [], errors: [], warnings: [] };

  if (!isRecord(raw)) {
    result.errors.push("Configuration must be a JSON object");
    return result;
  }
  const orgs: unknown = raw.orgs;
  if (!Array.isArray(orgs)) {
    result.errors.push("Missing required field: orgs");
    return result;
  }
  if (orgs.length === 0) {
    result.errors.push("orgs must contain at least one org");
    return result;
  }

  orgs.forEach((entry: unknown, index) => {
    const label = `Org ${index + 1}`;
    if (!isRecord(entry)) {
      result.errors.push(`${label} must be an object`);
      return;
    }
    const org = validateOrg(entry, label, result);
    if (org) {
      result.orgs.push(org);
    }
  });

  return result;
}
