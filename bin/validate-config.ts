#!/usr/bin/env node
/**
 * Cleanup Config Validator - CLI Entry Point
 *
 * Checks a batch config file before a run and prints what each org will do.
 *
 * Exit codes:
 * - 0: Valid (no errors)
 * - 1: Invalid (errors found)
 * - 2: Fatal error (file not found, unreadable JSON)
 */

import { Command } from 'commander';
import fs from 'node:fs';
import chalk from 'chalk';
import { resolveConfigPath } from '../src/orchestrator/configStore.js';
import { validateCleanupConfig } from '../src/orchestrator/configValidator.js';
import { maskSecret } from '../src/logger.js';
import type { OrgConfig } from '../src/types.js';

const program = new Command();

program
  .name('validate-config')
  .description('Validate a Flow cleanup config file')
  .version('1.0.0')
  .requiredOption('--config <path>', 'Config file to validate (looked up under configs/ too)')
  .option('--quiet', 'Only print errors')
  .parse(process.argv);

const opts = program.opts<{ config: string; quiet?: boolean }>();

function describePolicy(org: OrgConfig): string {
  const policy = org.selectionPolicy;
  switch (policy.kind) {
    case 'all-old-versions':
      return 'all old versions';
    case 'named-flows':
      return `named flows: ${policy.names.join(', ')}`;
    case 'browse':
      return policy.names && policy.names.length > 0
        ? `browse (pre-selected: ${policy.names.join(', ')})`
        : 'browse (interactive only)';
  }
}

async function main() {
  const configPath = resolveConfigPath(opts.config);
  if (!fs.existsSync(configPath)) {
    console.error(chalk.red(`Error: Config file not found: ${opts.config}`));
    process.exit(2);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(configPath, 'utf8'));
  } catch (err) {
    console.error(chalk.red(`Error: Could not read ${configPath}`));
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(2);
  }

  const result = validateCleanupConfig(raw);

  if (!opts.quiet) {
    console.log(chalk.bold(`\nConfig: ${configPath}\n`));
    result.orgs.forEach((org, index) => {
      console.log(`${index + 1}. ${chalk.cyan(org.instanceUrl)}`);
      console.log(chalk.gray(`   client id: ${maskSecret(org.clientId)}  port: ${org.callbackPort}`));
      console.log(chalk.gray(`   cleanup: ${describePolicy(org)}`));
      if (org.skipProductionCheck) {
        console.log(chalk.yellow('   production check: disabled'));
      } else if (org.autoConfirmProduction) {
        console.log(chalk.yellow('   production: auto-confirmed'));
      }
    });
    console.log('');
  }

  if (result.errors.length > 0) {
    console.log(chalk.red(`❌ ${result.errors.length} error(s):`));
    for (const error of result.errors) {
      console.log(chalk.red(`  • ${error}`));
    }
  }

  if (result.warnings.length > 0 && !opts.quiet) {
    console.log(chalk.yellow(`⚠️  ${result.warnings.length} warning(s):`));
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`  • ${warning}`));
    }
  }

  if (result.errors.length > 0) {
    process.exit(1);
  }
  if (!opts.quiet) {
    console.log(chalk.green(`✓ Config is valid (${result.orgs.length} org${result.orgs.length === 1 ? '' : 's'})`));
  }
  process.exit(0);
}

void main();
