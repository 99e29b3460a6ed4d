/**
 * Config file store
 *
 * Reads the `{ "orgs": [...] }` config file and writes org entries back to it.
 */

import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../errors.js";
import type { OrgConfig, SelectionPolicy } from "../types.js";
import { isRecord } from "../utils/json.js";
import { validateCleanupConfig } from "./configValidator.js";

export const CONFIGS_DIR = "configs";

/** On-disk shape of one org entry. */
export type OrgConfigEntry = {
  instance: string;
  client_id: string;
  client_secret?: string;
  cleanup_type: "1" | "2" | "3";
  flow_names: string[];
  skip_production_check: boolean;
  auto_confirm_production: boolean;
  callback_port: number;
};

export type LoadedConfig = {
  path: string;
  orgs: OrgConfig[];
  warnings: string[];
};

/**
 * Relative paths are tried as given, then under the configs directory.
 */
export function resolveConfigPath(configPath: string, configsDir: string = CONFIGS_DIR): string {
  if (path.isAbsolute(configPath) || fs.existsSync(configPath)) {
    return configPath;
  }
  const fallback = path.join(configsDir, configPath);
  return fs.existsSync(fallback) ? fallback : configPath;
}

export async function loadCleanupConfig(configPath: string, configsDir: string = CONFIGS_DIR): Promise<LoadedConfig> {
  const resolved = resolveConfigPath(configPath, configsDir);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError([`Config file not found: ${configPath}`]);
  }

  const text = await fs.promises.readFile(resolved, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError([`Invalid JSON in ${resolved}: ${err instanceof Error ? err.message : String(err)}`]);
  }

  const result = validateCleanupConfig(raw);
  if (result.errors.length > 0) {
    throw new ConfigError(result.errors);
  }
  return { path: resolved, orgs: result.orgs, warnings: result.warnings };
}

function cleanupTypeFor(policy: SelectionPolicy): OrgConfigEntry["cleanup_type"] {
  switch (policy.kind) {
    case "all-old-versions":
      return "1";
    case "named-flows":
      return "2";
    case "browse":
      return "3";
  }
}

export function toConfigEntry(config: OrgConfig): OrgConfigEntry {
  const policy = config.selectionPolicy;
  return {
    instance: config.instanceUrl,
    client_id: config.clientId,
    ...(config.clientSecret ? { client_secret: config.clientSecret } : {}),
    cleanup_type: cleanupTypeFor(policy),
    flow_names: policy.kind === "all-old-versions" ? [] : [...(policy.names ?? [])],
    skip_production_check: config.skipProductionCheck,
    auto_confirm_production: config.autoConfirmProduction,
    callback_port: config.callbackPort
  };
}

/**
 * Writes an org entry. With `append`, the entry is added to the orgs already
 * in the file, replacing one for the same instance.
 */
export async function saveOrgConfig(
  filePath: string,
  config: OrgConfig,
  options: { append?: boolean } = {}
): Promise<number> {
  const entry = toConfigEntry(config);
  let existing: unknown[] = [];

  if (options.append && fs.existsSync(filePath)) {
    const current: unknown = JSON.parse(await fs.promises.readFile(filePath, "utf8"));
    const orgs: unknown = isRecord(current) ? current.orgs : undefined;
    if (!Array.isArray(orgs)) {
      throw new ConfigError([`${filePath} has no "orgs" array to append to`]);
    }
    existing = orgs.filter((org: unknown) => !(isRecord(org) && org.instance === entry.instance));
  }

  const orgs = [...existing, entry];
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, JSON.stringify({ orgs }, null, 2) + "\n", "utf8");
  return orgs.length;
}
