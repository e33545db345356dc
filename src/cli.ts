#!/usr/bin/env node

/**
 * secret-sync CLI
 * Pull and push secret files against a remote secret manager
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { VERSION, BRAND } from './constants.js';
import { disableColor, setVerbose } from './utils/display.js';
import {
  pullCommand,
  pushCommand,
  quickPullCommand,
  quickPushCommand,
  type GlobalOptions,
  type QuickCommandOptions,
  type SyncCommandOptions,
} from './commands/sync.js';

const program = new Command();

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

program
  .name('secret-sync')
  .description(`${BRAND.prefix} ${BRAND.name} - ${BRAND.tagline}`)
  .version(VERSION)
  .option('-c, --config <path>', 'Path to secret-sync.toml or secret-sync.json (default: nearest in parent directories)')
  .addOption(
    new Option('-f, --format <format>', 'Output format').choices(['human', 'json']).default('human')
  )
  .option('--no-color', 'Disable colored output')
  .option('--profile <name>', 'Override the AWS profile')
  .option('-r, --region <region>', 'Override the AWS region')
  .option('--verbose', 'Print debug output')
  .hook('preAction', () => {
    const opts = program.opts<{ color: boolean; verbose?: boolean }>();
    if (!opts.color) {
      disableColor();
    }
    setVerbose(opts.verbose ?? false);
  });

function globalOptions(): GlobalOptions {
  const opts = program.opts<{ config?: string; format: string; profile?: string; region?: string }>();
  return {
    config: opts.config,
    format: opts.format === 'json' ? 'json' : 'human',
    profile: opts.profile,
    region: opts.region,
  };
}

// ============================================================================
// MANIFEST COMMANDS
// ============================================================================

program
  .command('pull')
  .description('Pull secrets into their local files')
  .option('-k, --file <keys...>', 'Only files with these keys')
  .option('-g, --glob <patterns...>', 'Only files whose key matches a glob')
  .option('-n, --dry-run', 'Show what would change without writing')
  .option('--concurrency <n>', 'Files processed at once', parsePositiveInt)
  .action(async (options: SyncCommandOptions) => {
    await pullCommand(options, globalOptions());
  });

program
  .command('push')
  .description('Push local files to their secrets, creating missing secrets')
  .option('-k, --file <keys...>', 'Only files with these keys')
  .option('-g, --glob <patterns...>', 'Only files whose key matches a glob')
  .option('-n, --dry-run', 'Show what would change without writing')
  .option('--concurrency <n>', 'Files processed at once', parsePositiveInt)
  .action(async (options: SyncCommandOptions) => {
    await pushCommand(options, globalOptions());
  });

// ============================================================================
// QUICK COMMANDS (no config file required)
// ============================================================================

program
  .command('quick-pull')
  .description('Pull one secret into a file without a config file')
  .requiredOption('-p, --path <path>', 'File to write')
  .requiredOption('-s, --secret <name>', 'Secret to read')
  .option('-n, --dry-run', 'Show what would change without writing')
  .action(async (options: QuickCommandOptions) => {
    await quickPullCommand(options, globalOptions());
  });

program
  .command('quick-push')
  .description('Push one file to a secret without a config file')
  .requiredOption('-p, --path <path>', 'File to read')
  .requiredOption('-s, --secret <name>', 'Secret to write')
  .option('-n, --dry-run', 'Show what would change without writing')
  .action(async (options: QuickCommandOptions) => {
    await quickPushCommand(options, globalOptions());
  });

// ============================================================================
// RUN
// ============================================================================

await program.parseAsync();
