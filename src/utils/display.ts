/**
 * Display Utilities
 * Console styling and formatting for CLI output. Diagnostics go to stderr
 * so that JSON written to stdout stays parseable.
 */

import path from 'path';
import chalk from 'chalk';
import { BRAND } from '../constants.js';
import { summarize } from '../services/sync.js';
import type { SyncOutcome, SyncReport, SyncStatus } from '../types/index.js';

export type OutputFormat = 'human' | 'json';

/**
 * Brand colors
 */
export const colors = {
  primary: chalk.hex('#7C3AED'),    // Purple
  muted: chalk.gray,
  error: chalk.hex('#EF4444'),
  success: chalk.hex('#10B981'),
  warning: chalk.hex('#F59E0B'),
  info: chalk.hex('#3B82F6'),
};

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function disableColor(): void {
  chalk.level = 0;
}

/**
 * Print the banner
 */
export function printBanner(): void {
  console.error();
  console.error(colors.primary.bold(`  ${BRAND.prefix} ${BRAND.name}`));
  console.error(colors.muted(`    ${BRAND.tagline}`));
  console.error();
}

/**
 * Print a success message
 */
export function success(message: string): void {
  console.error(colors.success(`${BRAND.prefix} ${message}`));
}

/**
 * Print an error message
 */
export function error(message: string): void {
  console.error(colors.error(`✖ ${message}`));
}

/**
 * Print a warning message
 */
export function warning(message: string): void {
  console.error(colors.warning(`⚠ ${message}`));
}

/**
 * Print an info message
 */
export function info(message: string): void {
  console.error(colors.info(`ℹ ${message}`));
}

/**
 * Print a debug message when --verbose is on
 */
export function debug(message: string): void {
  if (verbose) {
    console.error(colors.muted(`· ${message}`));
  }
}

const STATUS_ORDER: SyncStatus[] = ['created', 'updated', 'unchanged', 'skipped', 'failed'];

const STATUS_STYLE: Record<SyncStatus, { symbol: string; color: (text: string) => string }> = {
  created: { symbol: '+', color: colors.success },
  updated: { symbol: '~', color: colors.info },
  unchanged: { symbol: '=', color: colors.muted },
  skipped: { symbol: '-', color: colors.warning },
  failed: { symbol: '✖', color: colors.error },
};

/**
 * One line describing an outcome; failure reasons are shown verbatim
 */
export function formatOutcome(outcome: SyncOutcome, rootDir: string): string {
  const style = STATUS_STYLE[outcome.status];
  const label = style.color(`${style.symbol} ${outcome.status.padEnd(9)}`);
  const file = path.relative(rootDir, outcome.path) || outcome.path;
  let line = `${label} ${outcome.entryKey} ${colors.muted(`${file} ↔ ${outcome.secretName}`)}`;

  if (outcome.status === 'failed' || outcome.status === 'skipped') {
    line += `\n    ${style.color(outcome.reason)}`;
  }
  return line;
}

/**
 * Summary line, e.g. "pushed 3 file(s): 1 created, 2 unchanged"
 */
export function formatSummary(report: SyncReport): string {
  const summary = summarize(report);
  const verb = report.direction === 'pull' ? 'pulled' : 'pushed';
  const counts = STATUS_ORDER
    .filter(status => summary[status] > 0)
    .map(status => `${summary[status]} ${status}`);

  const prefix = report.dryRun ? `dry run: would have ${verb}` : verb;
  const detail = counts.length > 0 ? `: ${counts.join(', ')}` : '';
  return `${prefix} ${report.outcomes.length} file(s)${detail}`;
}

/**
 * Machine readable form of a report
 */
export function reportToJson(report: SyncReport): Record<string, unknown> {
  return {
    success: !report.failed,
    direction: report.direction,
    dryRun: report.dryRun,
    outcomes: report.outcomes,
    summary: summarize(report),
  };
}

/**
 * Print a report in the requested format
 */
export function printReport(report: SyncReport, rootDir: string, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(reportToJson(report), null, 2));
    return;
  }

  for (const outcome of report.outcomes) {
    console.log(formatOutcome(outcome, rootDir));
  }
  console.log();

  if (report.failed) {
    error(formatSummary(report));
  } else {
    success(formatSummary(report));
  }
}

/**
 * Print a fatal error in the requested format, after the outcomes of any
 * entries that finished before the run stopped
 */
export function printFatal(
  message: string,
  format: OutputFormat,
  completed: readonly SyncOutcome[] = [],
  rootDir = process.cwd()
): void {
  if (format === 'json') {
    const body = completed.length > 0
      ? { success: false, error: message, outcomes: completed }
      : { success: false, error: message };
    console.log(JSON.stringify(body));
    return;
  }

  for (const outcome of completed) {
    console.log(formatOutcome(outcome, rootDir));
  }
  if (completed.length > 0) {
    console.log();
  }
  error(message);
}
