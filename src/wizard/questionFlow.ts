/**
 * Interactive questions and confirmations for the cleanup CLI.
 */

import fs from "node:fs";
import path from "node:path";
import prompts from "prompts";
import chalk from "chalk";
import type { DeletionConfirmation } from "../orchestrator/types.js";
import { CONFIGS_DIR, saveOrgConfig } from "../orchestrator/configStore.js";
import type { FlowPicker, FlowSummary } from "../salesforce/flowResolver.js";
import type { ProductionDecision } from "../salesforce/productionGate.js";
import type { FlowVersionCandidate, OrgConfig, OrgProfile } from "../types.js";
import type { CleanupTypeAnswer, OrgAnswers } from "./types.js";

const PREVIEW_LIMIT = 5;

function answerText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function splitFlowNames(value: string): string[] {
  return value
    .split(",")
    .map(name => name.trim())
    .filter(name => name !== "");
}

/**
 * Asks for whatever the CLI flags and environment did not provide.
 */
export async function askOrgDetails(defaults: Partial<OrgAnswers>): Promise<OrgAnswers> {
  const answers: Partial<OrgAnswers> = { ...defaults };

  if (!answers.instance) {
    const response = await prompts({
      type: "text",
      name: "instance",
      message: "Salesforce instance (e.g. mycompany or https://mycompany.my.salesforce.com):",
      validate: (value: string) => value.trim().length > 0 || "Instance is required"
    });
    answers.instance = answerText(response.instance);
    if (!answers.instance) {
      throw new Error("Salesforce instance is required");
    }
  }

  if (!answers.clientId) {
    const response = await prompts({
      type: "text",
      name: "clientId",
      message: "Connected App consumer key (client ID):",
      validate: (value: string) => value.trim().length > 0 || "Client ID is required"
    });
    answers.clientId = answerText(response.clientId);
    if (!answers.clientId) {
      throw new Error("Client ID is required");
    }
  } else {
    console.log(chalk.gray("Client ID: (from CLI flag or environment)"));
  }

  if (answers.clientSecret === undefined) {
    const response = await prompts({
      type: "password",
      name: "clientSecret",
      message: "Connected App consumer secret (leave blank for PKCE only):"
    });
    answers.clientSecret = answerText(response.clientSecret);
  }

  if (!answers.cleanupType) {
    const cleanup = await askCleanupOptions(answers.flowNames);
    answers.cleanupType = cleanup.cleanupType;
    answers.flowNames = cleanup.flowNames;
  } else if (answers.cleanupType === "named" && (answers.flowNames ?? []).length === 0) {
    answers.flowNames = await askFlowNames();
  }

  return {
    instance: answers.instance,
    clientId: answers.clientId,
    clientSecret: answers.clientSecret,
    callbackPort: answers.callbackPort,
    cleanupType: answers.cleanupType,
    flowNames: answers.flowNames ?? []
  };
}

async function askFlowNames(): Promise<string[]> {
  const response = await prompts({
    type: "text",
    name: "names",
    message: "Flow API names (comma-separated):",
    validate: (value: string) => splitFlowNames(value).length > 0 || "At least one Flow API name is required"
  });
  const names = splitFlowNames(answerText(response.names));
  if (names.length === 0) {
    throw new Error("At least one Flow API name is required");
  }
  return names;
}

export async function askCleanupOptions(
  defaultNames: string[] = []
): Promise<{ cleanupType: CleanupTypeAnswer; flowNames: string[] }> {
  const response = await prompts({
    type: "select",
    name: "cleanupType",
    message: "What would you like to clean up?",
    choices: [
      { title: "All old Flow versions", value: "all", description: "Every inactive version that is not the latest" },
      { title: "Specific Flows", value: "named", description: "Old versions of the Flows you name" },
      { title: "Browse Flows and pick from a list", value: "browse" }
    ]
  });

  const cleanupType: unknown = response.cleanupType;
  if (cleanupType !== "all" && cleanupType !== "named" && cleanupType !== "browse") {
    throw new Error("Cleanup type is required");
  }
  if (cleanupType === "named") {
    return { cleanupType, flowNames: defaultNames.length > 0 ? defaultNames : await askFlowNames() };
  }
  return { cleanupType, flowNames: cleanupType === "browse" ? defaultNames : [] };
}

export const confirmProductionPrompt: ProductionDecision = async (profile: OrgProfile) => {
  console.log(chalk.red(`\n🚨 ${profile.name} is a PRODUCTION org. Deleted Flow versions cannot be restored.`));
  if (profile.classifiedBy === "fallback") {
    console.log(chalk.yellow("   (The org type could not be read, so it is treated as production.)"));
  }
  const response = await prompts({
    type: "text",
    name: "confirm",
    message: "Type 'YES' to continue with this production org:"
  });
  return answerText(response.confirm) === "YES";
};

/** Lines shown before the deletion prompt. */
export function formatDeletionPreview(
  candidates: readonly FlowVersionCandidate[],
  profile: OrgProfile | undefined
): string[] {
  const lines = [`📊 About to delete ${candidates.length} Flow version(s)`];
  if (!profile) {
    lines.push("⚠️  Org type not checked (skip_production_check)");
  } else if (profile.isSandbox) {
    lines.push("🧪 SANDBOX instance");
  } else {
    lines.push("🚨 PRODUCTION instance - this action cannot be undone!");
  }
  lines.push("📝 Summary of what will be deleted:");
  candidates.slice(0, PREVIEW_LIMIT).forEach((candidate, index) => {
    lines.push(`   ${index + 1}. ${candidate.flowDefinitionApiName} v${candidate.versionNumber} (${candidate.status})`);
  });
  if (candidates.length > PREVIEW_LIMIT) {
    lines.push(`   ... and ${candidates.length - PREVIEW_LIMIT} more`);
  }
  return lines;
}

export const confirmDeletionPrompt: DeletionConfirmation = async (candidates, { profile }) => {
  console.log(chalk.yellow("\n⚠️  CONFIRMATION REQUIRED"));
  for (const line of formatDeletionPreview(candidates, profile)) {
    console.log(line);
  }
  const response = await prompts({
    type: "text",
    name: "confirm",
    message: `Type 'DELETE' to delete ${candidates.length} Flow version(s):`
  });
  return answerText(response.confirm) === "DELETE";
};

export function flowChoiceTitle(flow: FlowSummary): string {
  const label = flow.label !== flow.apiName ? ` - ${flow.label}` : "";
  return `${flow.apiName}${label} (${flow.deletableVersions} old version${flow.deletableVersions === 1 ? "" : "s"})`;
}

export const pickFlowsPrompt: FlowPicker = async (flows: FlowSummary[]) => {
  const response = await prompts({
    type: "multiselect",
    name: "flows",
    message: "Select the Flows whose old versions should be deleted:",
    choices: flows.map(flow => ({ title: flowChoiceTitle(flow), value: flow.apiName })),
    hint: "- Space to select. Return to submit"
  });
  const picked: unknown = response.flows;
  return Array.isArray(picked) ? picked.filter((name): name is string => typeof name === "string") : [];
};

/**
 * Offers to save a hand-entered org so later runs can use --config.
 */
export async function offerSaveConfig(config: OrgConfig): Promise<string | null> {
  const save = await prompts({
    type: "confirm",
    name: "save",
    message: "Save this configuration for future runs?",
    initial: false
  });
  if (!save.save) return null;

  const nameAnswer = await prompts({
    type: "text",
    name: "file",
    message: "Config file name:",
    initial: "config.json"
  });
  const fileName = answerText(nameAnswer.file);
  if (!fileName) return null;

  const filePath = path.isAbsolute(fileName) || fileName.includes(path.sep) ? fileName : path.join(CONFIGS_DIR, fileName);
  let append = false;
  if (fs.existsSync(filePath)) {
    const appendAnswer = await prompts({
      type: "confirm",
      name: "append",
      message: `${filePath} exists. Add this org to it? (No overwrites the file)`,
      initial: true
    });
    append = Boolean(appendAnswer.append);
  }

  const count = await saveOrgConfig(filePath, config, { append });
  console.log(chalk.green(`✓ Configuration saved to ${filePath} (${count} org${count === 1 ? "" : "s"})`));
  return filePath;
}
