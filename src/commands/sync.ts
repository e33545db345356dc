/**
 * Sync Commands
 * pull, push, quick-pull and quick-push
 */

import path from 'path';
import ora from 'ora';
import { discoverManifest, emptyManifest, loadManifest } from '../services/config.js';
import type { ManifestOverrides } from '../services/config.js';
import { codecForPath } from '../services/envfile.js';
import { filterEntries } from '../services/filter.js';
import { createProvider } from '../services/provider.js';
import { runSync } from '../services/sync.js';
import { ConfigNotFoundError, ProviderAuthError, errorMessage } from '../errors.js';
import {
  printBanner,
  printReport,
  printFatal,
  info,
  warning,
  debug,
  type OutputFormat,
} from '../utils/display.js';
import type { FileEntry, Manifest, SecretProvider, SyncDirection } from '../types/index.js';

export interface GlobalOptions {
  config?: string;
  format: OutputFormat;
  profile?: string;
  region?: string;
}

export interface SyncCommandOptions {
  file?: string[];
  glob?: string[];
  dryRun?: boolean;
  concurrency?: number;
}

export interface QuickCommandOptions {
  path: string;
  secret: string;
  dryRun?: boolean;
}

/** Builds the provider for a manifest; replaced in tests */
export type ProviderFactory = (manifest: Manifest) => SecretProvider;

const defaultProviderFactory: ProviderFactory = manifest => createProvider(manifest.provider);

function overridesFrom(global: GlobalOptions): ManifestOverrides {
  return { profile: global.profile, region: global.region };
}

/**
 * Load the manifest given with --config, or the nearest one
 */
async function requireManifest(global: GlobalOptions): Promise<Manifest> {
  const configPath = global.config ?? (await discoverManifest());
  debug(`using config file ${path.resolve(configPath)}`);
  return loadManifest(configPath, overridesFrom(global));
}

/**
 * Quick commands read provider settings from a manifest when one exists,
 * and otherwise run without one
 */
async function optionalManifest(global: GlobalOptions): Promise<Manifest> {
  if (global.config) {
    return loadManifest(global.config, overridesFrom(global));
  }
  try {
    return await loadManifest(await discoverManifest(), overridesFrom(global));
  } catch (err) {
    if (err instanceof ConfigNotFoundError) {
      debug('no config file found, using defaults');
      return emptyManifest(process.cwd(), overridesFrom(global));
    }
    throw err;
  }
}

/**
 * Run the engine over `entries` and report the result. Sets a failing exit
 * code when any entry fails.
 */
async function execute(
  direction: SyncDirection,
  manifest: Manifest,
  entries: FileEntry[],
  rootDir: string,
  options: { dryRun?: boolean; concurrency?: number },
  global: GlobalOptions,
  providerFactory: ProviderFactory
): Promise<void> {
  const human = global.format === 'human';

  if (entries.length === 0) {
    if (human) {
      info('No files declared in the config file.');
    }
    printReport(
      { direction, dryRun: options.dryRun ?? false, outcomes: [], failed: false },
      rootDir,
      global.format
    );
    return;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    warning('Interrupted, finishing entries already in progress...');
    controller.abort();
  };

  const verb = direction === 'pull' ? 'Pulling' : 'Pushing';
  const spinner = ora({ text: `${verb} ${entries.length} file(s)...`, isSilent: !human }).start();
  let done = 0;

  process.once('SIGINT', onInterrupt);
  try {
    const provider = providerFactory(manifest);
    const report = await runSync(direction, provider, entries, {
      dryRun: options.dryRun,
      concurrency: options.concurrency ?? manifest.concurrency,
      signal: controller.signal,
      log: debug,
      onOutcome: () => {
        done++;
        spinner.text = `${verb} ${done}/${entries.length} file(s)...`;
      },
    });

    spinner.stop();
    printReport(report, rootDir, global.format);
    process.exitCode = report.failed ? 1 : 0;
  } catch (err) {
    spinner.fail(`${verb} aborted`);
    const completed = err instanceof ProviderAuthError ? err.outcomes : [];
    printFatal(errorMessage(err), global.format, completed, rootDir);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function syncCommand(
  direction: SyncDirection,
  options: SyncCommandOptions,
  global: GlobalOptions,
  providerFactory: ProviderFactory
): Promise<void> {
  if (global.format === 'human') {
    printBanner();
  }

  let manifest: Manifest;
  let entries: FileEntry[];
  try {
    manifest = await requireManifest(global);
    entries = filterEntries(manifest.entries, { keys: options.file, globs: options.glob });
    if (entries.length === 0 && manifest.entries.length > 0) {
      throw new Error(`no files matching filter within "${manifest.configPath}"`);
    }
  } catch (err) {
    printFatal(errorMessage(err), global.format);
    process.exitCode = 1;
    return;
  }

  await execute(direction, manifest, entries, manifest.rootDir, options, global, providerFactory);
}

async function quickCommand(
  direction: SyncDirection,
  options: QuickCommandOptions,
  global: GlobalOptions,
  providerFactory: ProviderFactory
): Promise<void> {
  if (global.format === 'human') {
    printBanner();
  }

  let manifest: Manifest;
  try {
    manifest = await optionalManifest(global);
  } catch (err) {
    printFatal(errorMessage(err), global.format);
    process.exitCode = 1;
    return;
  }

  const filePath = path.resolve(process.cwd(), options.path);
  const entry: FileEntry = {
    key: path.basename(filePath),
    path: filePath,
    secretName: options.secret,
    codec: codecForPath(filePath),
  };

  await execute(direction, manifest, [entry], process.cwd(), options, global, providerFactory);
}

export function pullCommand(
  options: SyncCommandOptions,
  global: GlobalOptions,
  providerFactory: ProviderFactory = defaultProviderFactory
): Promise<void> {
  return syncCommand('pull', options, global, providerFactory);
}

export function pushCommand(
  options: SyncCommandOptions,
  global: GlobalOptions,
  providerFactory: ProviderFactory = defaultProviderFactory
): Promise<void> {
  return syncCommand('push', options, global, providerFactory);
}

export function quickPullCommand(
  options: QuickCommandOptions,
  global: GlobalOptions,
  providerFactory: ProviderFactory = defaultProviderFactory
): Promise<void> {
  return quickCommand('pull', options, global, providerFactory);
}

export function quickPushCommand(
  options: QuickCommandOptions,
  global: GlobalOptions,
  providerFactory: ProviderFactory = defaultProviderFactory
): Promise<void> {
  return quickCommand('push', options, global, providerFactory);
}
