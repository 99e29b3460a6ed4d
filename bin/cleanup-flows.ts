#!/usr/bin/env node
/**
 * Flow Version Cleanup - CLI Entry Point
 *
 * Deletes old, inactive Flow versions from one or more Salesforce orgs
 * through the Tooling API, authenticating each org with OAuth + PKCE.
 *
 * Exit codes:
 * - 0: Every org completed or was skipped, no deletion failed
 * - 1: An org failed or at least one deletion failed
 * - 2: Fatal error (bad options, invalid config)
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import fs from 'node:fs';
import path from 'node:path';
import prompts from 'prompts';
import { ConfigError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { CleanupOrchestrator, createDefaultDeps } from '../src/orchestrator/cleanupOrchestrator.js';
import { loadCleanupConfig, saveOrgConfig } from '../src/orchestrator/configStore.js';
import {
  parseCallbackPort,
  parseCleanupType,
  selectionPolicyFor,
  validateCleanupConfig,
  DEFAULT_CALLBACK_PORT
} from '../src/orchestrator/configValidator.js';
import type { OrchestratorOptions } from '../src/orchestrator/types.js';
import { DEFAULT_API_VERSION } from '../src/salesforce/toolingClient.js';
import {
  createSessionId,
  deletionListPath,
  writeDeletionList,
  writePendingDeletionList,
  type DeletionListFormat
} from '../src/deletionList.js';
import { exitCodeFor, renderSummaryBox } from '../src/summary.js';
import type { OrgConfig } from '../src/types.js';
import { DeletionProgressUI } from '../src/ui/deletionProgress.js';
import {
  askCleanupOptions,
  askOrgDetails,
  confirmDeletionPrompt,
  confirmProductionPrompt,
  offerSaveConfig,
  pickFlowsPrompt
} from '../src/wizard/questionFlow.js';
import type { CleanupTypeAnswer } from '../src/wizard/types.js';

type CliOptions = {
  config?: string;
  silent?: boolean;
  instance?: string;
  clientId?: string;
  clientSecret?: string;
  port?: number;
  type?: CleanupTypeAnswer;
  flow?: string[];
  dryRun?: boolean;
  yes?: boolean;
  timeout?: number;
  stateRetries?: number;
  batchSize?: number;
  apiVersion?: string;
  logDir: string;
  deletionListDir: string;
  deletionListFormat: DeletionListFormat;
  saveConfig?: string;
  quiet?: boolean;
  verbose?: boolean;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be zero or a positive integer.');
  }
  return parsed;
}

function parsePort(value: string): number {
  const port = parseCallbackPort(value);
  if (port === null) {
    throw new InvalidArgumentError('Must be a port between 1024 and 65535.');
  }
  return port;
}

function parseType(value: string): CleanupTypeAnswer {
  if (value !== 'all' && value !== 'named' && value !== 'browse') {
    throw new InvalidArgumentError('Must be one of: all, named, browse.');
  }
  return value;
}

function parseFormat(value: string): DeletionListFormat {
  if (value !== 'json' && value !== 'csv') {
    throw new InvalidArgumentError('Must be json or csv.');
  }
  return value;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map(name => name.trim()).filter(name => name !== '')];
}

const program = new Command();

program
  .name('cleanup-flows')
  .description('Delete old, inactive Salesforce Flow versions through the Tooling API')
  .version('1.0.0')
  // Org selection
  .option('--config <path>', 'Config file with one or more orgs (looked up under configs/ too)')
  .option('--silent', 'Headless mode: use the config file as-is without prompting (requires --config)')
  .option('--instance <url>', 'Salesforce instance (single-org mode)')
  .option('--client-id <id>', 'Connected App consumer key (default: SF_CLIENT_ID)')
  .option('--client-secret <secret>', 'Connected App consumer secret (default: SF_CLIENT_SECRET)')
  .option('--port <number>', 'OAuth callback port (default: SF_CALLBACK_PORT or 8080)', parsePort)
  // Cleanup behavior
  .option('--type <type>', 'Cleanup type: all, named or browse', parseType)
  .option('--flow <names>', 'Flow API name(s) for --type named, comma-separated or repeated', collect)
  .option('--dry-run', 'Resolve and list deletable versions without deleting')
  .option('-y, --yes', 'Skip the deletion confirmation prompt')
  .option('--timeout <seconds>', 'Seconds to wait for the browser login', parsePositiveInt)
  .option('--state-retries <number>', 'Wrong-state callbacks to ignore before giving up on a login (default 0)', parseNonNegativeInt)
  .option('--batch-size <number>', 'Deletions per composite request (max 25)', parsePositiveInt)
  .option('--api-version <version>', 'Salesforce API version (default: SF_API_VERSION or v60.0)')
  // Output
  .option('--log-dir <path>', 'Directory for session log files', 'logs')
  .option('--deletion-list-dir <path>', 'Directory for per-org deletion lists', 'deletion_lists')
  .option('--deletion-list-format <format>', 'Deletion list format: json or csv', parseFormat, 'json')
  .option('--save-config <path>', 'Save the single-org settings to a config file')
  .option('--quiet', 'Suppress progress output')
  .option('--verbose', 'Print debug output')
  .parse(process.argv);

const opts = program.opts<CliOptions>();

function normalizeApiVersion(value: string | undefined): string {
  const version = value?.trim();
  if (!version) return DEFAULT_API_VERSION;
  return version.startsWith('v') ? version : `v${version}`;
}

function printIssues(errors: readonly string[], warnings: readonly string[]): void {
  for (const error of errors) {
    console.error(chalk.red(`  • ${error}`));
  }
  for (const warning of warnings) {
    console.warn(chalk.yellow(`  • ${warning}`));
  }
}

/**
 * Orgs from the config file, with --type/--flow applied to all of them.
 */
async function tenantsFromConfig(configPath: string): Promise<OrgConfig[]> {
  const loaded = await loadCleanupConfig(configPath);
  if (loaded.warnings.length > 0) {
    console.warn(chalk.yellow(`⚠️  ${loaded.path}:`));
    printIssues([], loaded.warnings);
  }
  if (!opts.quiet) {
    console.log(chalk.gray(`Loaded ${loaded.orgs.length} org(s) from ${loaded.path}`));
  }

  let override: { cleanupType: CleanupTypeAnswer; flowNames: string[] } | undefined;
  if (opts.type) {
    override = { cleanupType: opts.type, flowNames: opts.flow ?? [] };
  } else if (!opts.silent && !opts.yes) {
    override = (await askCleanupOptionsOrKeep()) ?? undefined;
  }
  if (!override) {
    return loaded.orgs;
  }

  const kind = parseCleanupType(override.cleanupType);
  if (!kind) {
    return loaded.orgs;
  }
  if (kind === 'named-flows' && override.flowNames.length === 0) {
    throw new ConfigError(['--type named requires at least one --flow']);
  }
  const selectionPolicy = selectionPolicyFor(kind, override.flowNames);
  return loaded.orgs.map(org => ({ ...org, selectionPolicy }));
}

async function askCleanupOptionsOrKeep(): Promise<{ cleanupType: CleanupTypeAnswer; flowNames: string[] } | null> {
  const response = await prompts({
    type: 'confirm',
    name: 'keep',
    message: 'Use the cleanup type from the config file for every org?',
    initial: true
  });
  if (response.keep !== false) {
    return null;
  }
  return askCleanupOptions(opts.flow ?? []);
}

/**
 * Single org from flags, environment and prompts.
 */
async function tenantFromPrompts(): Promise<OrgConfig> {
  const envPort = process.env.SF_CALLBACK_PORT;
  const callbackPort = opts.port ?? (envPort ? parseCallbackPort(envPort) : DEFAULT_CALLBACK_PORT);
  if (callbackPort === null) {
    throw new ConfigError([`SF_CALLBACK_PORT must be a port between 1024 and 65535 (got ${envPort ?? ''})`]);
  }

  const answers = await askOrgDetails({
    instance: opts.instance,
    clientId: opts.clientId ?? process.env.SF_CLIENT_ID,
    clientSecret: opts.clientSecret ?? process.env.SF_CLIENT_SECRET,
    callbackPort,
    cleanupType: opts.type,
    flowNames: opts.flow ?? []
  });

  const result = validateCleanupConfig({
    orgs: [
      {
        instance: answers.instance,
        client_id: answers.clientId,
        client_secret: answers.clientSecret,
        cleanup_type: answers.cleanupType,
        flow_names: answers.flowNames,
        callback_port: answers.callbackPort ?? callbackPort
      }
    ]
  });
  const [org] = result.orgs;
  if (result.errors.length > 0 || !org) {
    throw new ConfigError(result.errors);
  }
  return org;
}

async function main() {
  if (opts.silent && !opts.config) {
    console.error(chalk.red('Error: --silent requires --config <path>'));
    process.exit(2);
  }

  const sessionId = createSessionId();
  const logFile = path.join(opts.logDir, `flow_cleanup_${sessionId}.log`);

  try {
    const tenants = opts.config ? await tenantsFromConfig(opts.config) : [await tenantFromPrompts()];

    if (!opts.config) {
      const [org] = tenants;
      if (opts.saveConfig && org) {
        const append = fs.existsSync(opts.saveConfig);
        await saveOrgConfig(opts.saveConfig, org, { append });
        console.log(chalk.green(`✓ Configuration saved to ${opts.saveConfig}`));
      } else if (org && !opts.yes) {
        await offerSaveConfig(org);
      }
    }

    const logger = createLogger({ quiet: opts.quiet, logFile, verbose: opts.verbose });
    logger.debug(`Session ${sessionId}: ${tenants.length} org(s)`);

    if (!opts.quiet) {
      console.log(chalk.cyan('\n╔════════════════════════════════════════════════════╗'));
      console.log(chalk.cyan('║           FLOW VERSION CLEANUP                     ║'));
      console.log(chalk.cyan('╚════════════════════════════════════════════════════╝\n'));
      console.log(`Orgs:       ${tenants.length}`);
      console.log(`Mode:       ${opts.silent ? 'silent' : 'interactive'}${opts.dryRun ? ' (dry run)' : ''}`);
      console.log(`Log file:   ${logFile}`);
      console.log('');
    }

    const progressUI = new DeletionProgressUI(opts.quiet);
    const interactive = !opts.silent;

    const options: OrchestratorOptions = {
      logger,
      dryRun: opts.dryRun,
      batchSize: opts.batchSize,
      callbackTimeoutMs: opts.timeout !== undefined ? opts.timeout * 1000 : undefined,
      confirmProduction: interactive ? confirmProductionPrompt : undefined,
      confirmDeletion: interactive && !opts.yes ? confirmDeletionPrompt : undefined,
      pickFlows: interactive ? pickFlowsPrompt : undefined,
      onBatchComplete: (progress, config) => progressUI.update(progress, new URL(config.instanceUrl).hostname),
      onCandidatesResolved: async (candidates, config) => {
        const outPath = deletionListPath(opts.deletionListDir, config.instanceUrl, sessionId, opts.deletionListFormat);
        await writePendingDeletionList(outPath, config.instanceUrl, candidates, sessionId);
        logger.log(`📄 Flows to delete saved to: ${outPath}`);
      },
      onTenantComplete: async result => {
        progressUI.stop();
        const outPath = deletionListPath(opts.deletionListDir, result.tenant, sessionId, opts.deletionListFormat);
        if (await writeDeletionList(outPath, result, sessionId)) {
          logger.log(`📄 Deletion list saved to: ${outPath}`);
        }
      }
    };

    const orchestrator = new CleanupOrchestrator(
      options,
      createDefaultDeps({
        logger,
        apiVersion: normalizeApiVersion(opts.apiVersion ?? process.env.SF_API_VERSION),
        stateMismatchRetries: opts.stateRetries
      })
    );

    const summary = await orchestrator.runWithSummary(tenants);

    console.log('');
    console.log(renderSummaryBox(summary));
    console.log(chalk.gray(`📝 Log file: ${logFile}`));

    process.exit(exitCodeFor(summary.results));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(chalk.red('\n❌ Configuration is invalid:'));
      printIssues(err.issues, []);
      process.exit(2);
    }

    console.error(chalk.red('\n❌ Fatal error:'));
    console.error(err instanceof Error ? err.message : String(err));

    if (err instanceof Error && err.stack && opts.verbose) {
      console.error('\nStack trace:');
      console.error(chalk.gray(err.stack));
    }

    process.exit(2);
  }
}

void main();
