/**
 * Types for the Storage Manager.
 */

import type { RepoAdapter } from '../repo/types.js';
import type { RepositoryLock } from '../repo/RepositoryLock.js';
import type { IndexStore } from '../index/IndexStore.js';
import type { MetadataInput, ScriptRecord } from '../types/ScriptRecord.js';
import type { MalformedMetadataError } from '../types/errors.js';

/**
 * Everything that makes up one open repository. Passed explicitly; there
 * is no process-wide instance.
 */
export interface RepositoryContext {
  repo: RepoAdapter;
  index: IndexStore;
  lock: RepositoryLock;
}

/**
 * Steps of a move (category change or rename).
 *
 * Requested → Locked → FileMoved → IndexUpdated → Released, or
 * Requested → Locked → FileMoved → RollbackMove → Released when the index
 * commit fails. A failure before FileMoved goes straight to Released.
 */
export type RelocationPhase = 'Requested' | 'Locked' | 'FileMoved' | 'IndexUpdated' | 'RollbackMove' | 'Released';

export interface RelocationEvent {
  operation: 'relocate' | 'rename';
  name: string;
  phase: RelocationPhase;
  /** Path before the move */
  from: string;
  /** Path after the move (known once Locked) */
  to?: string;
}

/**
 * Configuration for StorageManager.
 */
export interface StorageManagerConfig {
  /** Script file extension, including the dot (default: '.pq') */
  extension?: string;
  /** Notified of every relocation phase */
  onRelocationPhase?: (event: RelocationEvent) => void;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface DeleteOptions extends OperationOptions {
  /** Delete even when other scripts depend on this one */
  force?: boolean;
}

/**
 * Input for creating a script.
 */
export interface CreateScriptInput {
  metadata: MetadataInput;
  body: string;
}

/**
 * Result of scanning the repository.
 */
export interface ScanResult {
  records: ScriptRecord[];
  /** Files skipped because their header could not be read */
  malformed: MalformedMetadataError[];
}
