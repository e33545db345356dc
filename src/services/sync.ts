/**
 * Sync Service
 * Pulls remote secrets into local files and pushes local files to the
 * secret provider, one outcome per entry.
 *
 * Push runs as a small state machine per entry:
 *
 *   checking-existence -> creating -> done
 *   checking-existence -> creating -> conflict -> updating -> done
 *   checking-existence -> comparing -> updating -> done
 *
 * A conflict on create means another writer created the secret after the
 * existence check; the value is then written once as an update. A remote
 * value that cannot be decoded counts as different and is overwritten.
 */

import { setTimeout as sleep } from 'timers/promises';
import { DEFAULT_CONCURRENCY, DEFAULT_RETRIES, DEFAULT_RETRY_DELAY_MS } from '../constants.js';
import {
  CodecError,
  ProviderAuthError,
  ProviderConflictError,
  ProviderNotFoundError,
  ProviderTransportError,
  errorMessage,
} from '../errors.js';
import { secretValuesEqual } from './envfile.js';
import { readLocalFile, writeLocalFileAtomic } from './localfile.js';
import type {
  FileEntry,
  SecretProvider,
  SecretValue,
  SyncDirection,
  SyncOutcome,
  SyncReport,
  SyncSummary,
} from '../types/index.js';

export interface SyncOptions {
  /** Report what would change without writing anything */
  dryRun?: boolean;
  /** Entries processed at once */
  concurrency?: number;
  /** Retries of a provider call after a transport error */
  retries?: number;
  /** Backoff base; attempt n waits retryDelayMs * 2^n */
  retryDelayMs?: number;
  /** Stops new entries from starting once aborted */
  signal?: AbortSignal;
  onOutcome?: (outcome: SyncOutcome) => void;
  log?: (message: string) => void;
}

interface SyncContext {
  provider: SecretProvider;
  dryRun: boolean;
  retries: number;
  retryDelayMs: number;
  log: (message: string) => void;
}

function outcome(entry: FileEntry, status: 'created' | 'updated' | 'unchanged'): SyncOutcome {
  return { entryKey: entry.key, secretName: entry.secretName, path: entry.path, status };
}

function failed(entry: FileEntry, reason: string): SyncOutcome {
  return { entryKey: entry.key, secretName: entry.secretName, path: entry.path, status: 'failed', reason };
}

function skipped(entry: FileEntry, reason: string): SyncOutcome {
  return { entryKey: entry.key, secretName: entry.secretName, path: entry.path, status: 'skipped', reason };
}

/**
 * Run a provider call, retrying transport failures with exponential backoff
 */
async function withRetry<T>(ctx: SyncContext, label: string, call: () => Promise<T>): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof ProviderTransportError) || attempt >= ctx.retries) {
        throw err;
      }
      const delay = ctx.retryDelayMs * 2 ** attempt;
      ctx.log(`${label} failed (${err.message}), retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
}

async function pullEntry(entry: FileEntry, ctx: SyncContext): Promise<SyncOutcome> {
  let remote: SecretValue;
  try {
    remote = await withRetry(ctx, `fetch ${entry.secretName}`, () =>
      ctx.provider.fetch(entry.secretName)
    );
  } catch (err) {
    if (err instanceof ProviderNotFoundError) {
      return failed(entry, `remote secret absent: "${entry.secretName}" does not exist`);
    }
    throw err;
  }

  const content = entry.codec.encode(remote);
  const current = await readLocalFile(entry.path);

  if (current === content) {
    return outcome(entry, 'unchanged');
  }

  if (ctx.dryRun) {
    ctx.log(`dry run: would write ${entry.path}`);
  } else {
    await writeLocalFileAtomic(entry.path, content);
  }

  return outcome(entry, current === null ? 'created' : 'updated');
}

async function pushEntry(entry: FileEntry, ctx: SyncContext): Promise<SyncOutcome> {
  const text = await readLocalFile(entry.path);
  if (text === null) {
    return failed(entry, `local file "${entry.path}" does not exist`);
  }
  const local = entry.codec.decode(text);

  const exists = await withRetry(ctx, `check ${entry.secretName}`, () =>
    ctx.provider.exists(entry.secretName)
  );

  if (!exists) {
    if (ctx.dryRun) {
      ctx.log(`dry run: would create ${entry.secretName}`);
      return outcome(entry, 'created');
    }

    try {
      await withRetry(ctx, `create ${entry.secretName}`, () =>
        ctx.provider.create(entry.secretName, local, entry.metadata)
      );
      return outcome(entry, 'created');
    } catch (err) {
      if (!(err instanceof ProviderConflictError)) {
        throw err;
      }
    }

    ctx.log(`${entry.secretName} was created concurrently, writing as an update`);
    try {
      await withRetry(ctx, `update ${entry.secretName}`, () =>
        ctx.provider.update(entry.secretName, local)
      );
      return outcome(entry, 'updated');
    } catch (err) {
      if (err instanceof ProviderAuthError) {
        throw err;
      }
      return failed(entry, `create race unresolved: ${errorMessage(err)}`);
    }
  }

  let remote: SecretValue | null = null;
  try {
    remote = await withRetry(ctx, `fetch ${entry.secretName}`, () =>
      ctx.provider.fetch(entry.secretName)
    );
  } catch (err) {
    if (!(err instanceof CodecError)) {
      throw err;
    }
    ctx.log(`${err.message}, overwriting`);
  }
  if (remote !== null && secretValuesEqual(local, remote)) {
    return outcome(entry, 'unchanged');
  }

  if (ctx.dryRun) {
    ctx.log(`dry run: would update ${entry.secretName}`);
  } else {
    await withRetry(ctx, `update ${entry.secretName}`, () =>
      ctx.provider.update(entry.secretName, local)
    );
  }
  return outcome(entry, 'updated');
}

/**
 * Process one entry. Every failure becomes a failed outcome except an
 * authentication failure, which ends the run.
 */
async function processEntry(
  direction: SyncDirection,
  entry: FileEntry,
  ctx: SyncContext
): Promise<SyncOutcome> {
  try {
    return direction === 'pull' ? await pullEntry(entry, ctx) : await pushEntry(entry, ctx);
  } catch (err) {
    if (err instanceof ProviderAuthError) {
      throw err;
    }
    return failed(entry, errorMessage(err));
  }
}

/**
 * Sync every entry in one direction. Entries are independent: a failure is
 * recorded and the remaining entries still run.
 */
export async function runSync(
  direction: SyncDirection,
  provider: SecretProvider,
  entries: readonly FileEntry[],
  options: SyncOptions = {}
): Promise<SyncReport> {
  const ctx: SyncContext = {
    provider,
    dryRun: options.dryRun ?? false,
    retries: options.retries ?? DEFAULT_RETRIES,
    retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    log: options.log ?? (() => undefined),
  };
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const outcomes = new Array<SyncOutcome | undefined>(entries.length).fill(undefined);

  const state: { next: number; fatal: ProviderAuthError | null } = { next: 0, fatal: null };

  const worker = async (): Promise<void> => {
    while (state.next < entries.length && state.fatal === null && !options.signal?.aborted) {
      const index = state.next++;
      try {
        const result = await processEntry(direction, entries[index], ctx);
        outcomes[index] = result;
        options.onOutcome?.(result);
      } catch (err) {
        if (err instanceof ProviderAuthError) {
          state.fatal = err;
          return;
        }
        throw err;
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, entries.length) }, worker));

  if (state.fatal !== null) {
    throw new ProviderAuthError(state.fatal.message, {
      cause: state.fatal,
      outcomes: outcomes.filter((result): result is SyncOutcome => result !== undefined),
    });
  }

  const results = outcomes.map((result, index) => {
    if (result) {
      return result;
    }
    const cancelled = skipped(entries[index], 'cancelled');
    options.onOutcome?.(cancelled);
    return cancelled;
  });

  return {
    direction,
    dryRun: ctx.dryRun,
    outcomes: results,
    failed: results.some(result => result.status === 'failed'),
  };
}

export function pullEntries(
  provider: SecretProvider,
  entries: readonly FileEntry[],
  options?: SyncOptions
): Promise<SyncReport> {
  return runSync('pull', provider, entries, options);
}

export function pushEntries(
  provider: SecretProvider,
  entries: readonly FileEntry[],
  options?: SyncOptions
): Promise<SyncReport> {
  return runSync('push', provider, entries, options);
}

/**
 * Count outcomes per status
 */
export function summarize(report: SyncReport): SyncSummary {
  const summary: SyncSummary = { created: 0, updated: 0, unchanged: 0, skipped: 0, failed: 0 };
  for (const result of report.outcomes) {
    summary[result.status]++;
  }
  return summary;
}
