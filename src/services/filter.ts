/**
 * Entry Filter
 * Narrows a run to the entries named on the command line
 */

import { minimatch } from 'minimatch';
import type { EntryFilter, FileEntry } from '../types/index.js';

/**
 * Keep entries whose key is listed or matches a glob; no filter keeps all
 */
export function filterEntries(entries: readonly FileEntry[], filter: EntryFilter = {}): FileEntry[] {
  const keys = filter.keys ?? [];
  const globs = filter.globs ?? [];

  if (keys.length === 0 && globs.length === 0) {
    return [...entries];
  }

  return entries.filter(
    entry => keys.includes(entry.key) || globs.some(glob => minimatch(entry.key, glob))
  );
}
