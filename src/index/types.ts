/**
 * Types for the script index.
 *
 * The index is a read-optimized cache of script metadata. It is derived
 * from the script files and is NOT the source of truth.
 */

import { z } from 'zod';
import type { IndexEntry } from '../types/ScriptRecord.js';

/**
 * Schema of one snapshot line.
 */
export const IndexEntrySchema = z.object({
  name: z.string().min(1),
  category: z.string(),
  tags: z.array(z.string()),
  dependencies: z.array(z.string()),
  description: z.string(),
  version: z.string(),
  path: z.string().min(1),
});

/**
 * How the last load went.
 *
 * - `loaded`: snapshot read successfully
 * - `missing`: no snapshot on disk
 * - `corrupt`: snapshot unreadable; the index is empty until rebuilt
 */
export type IndexStatus = 'loaded' | 'missing' | 'corrupt';

export interface IndexLoadResult {
  status: IndexStatus;
  /** Number of entries loaded */
  entries: number;
  /** What was wrong with a corrupt snapshot */
  diagnostic?: string;
}

/**
 * Names affected by a refresh, each list sorted.
 */
export interface RefreshReport {
  added: string[];
  removed: string[];
  updated: string[];
  unchanged: string[];
}

/**
 * A single-script change to the index.
 */
export interface IndexChange {
  /** Entry to insert or replace (matched by name) */
  upsert?: IndexEntry;
  /** Name of the entry to drop */
  remove?: string;
}

/**
 * Receipt for a committed change; pass to `revert` to undo it.
 */
export interface IndexCommit {
  change: IndexChange;
  /** Prior entry for every affected name key (undefined: was absent) */
  previous: Map<string, IndexEntry | undefined>;
  /** Generation the commit produced */
  generation: number;
}
