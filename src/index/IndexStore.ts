/**
 * IndexStore - Persisted index of script metadata for search and lookup.
 *
 * The snapshot is JSONL at the repository root (`index.jsonl`), one entry
 * per line, sorted by name, with no timestamps: rebuilding an unchanged
 * repository produces the same bytes.
 *
 * The store does no locking of its own. Callers (StorageManager,
 * ScriptManager) hold the repository lock around every call.
 */

import type { RepoAdapter } from '../repo/types.js';
import {
  compareNames,
  entriesEqual,
  nameKey,
  toIndexEntry,
  type IndexEntry,
  type ScriptRecord,
} from '../types/ScriptRecord.js';
import { DuplicateNameError } from '../types/errors.js';
import {
  IndexEntrySchema,
  type IndexChange,
  type IndexCommit,
  type IndexLoadResult,
  type IndexStatus,
  type RefreshReport,
} from './types.js';

export const DEFAULT_INDEX_PATH = 'index.jsonl';

/**
 * Configuration for IndexStore.
 */
export interface IndexStoreConfig {
  /** Snapshot path relative to the repository root (default: 'index.jsonl') */
  indexPath?: string;
}

/**
 * Serialize entries as a sorted JSONL snapshot with a fixed key order.
 */
export function serializeIndex(entries: Iterable<IndexEntry>): string {
  const sorted = [...entries].sort((a, b) => compareNames(a.name, b.name));
  if (sorted.length === 0) return '';
  const lines = sorted.map((e) =>
    JSON.stringify({
      name: e.name,
      category: e.category,
      tags: e.tags,
      dependencies: e.dependencies,
      description: e.description,
      version: e.version,
      path: e.path,
    })
  );
  return lines.join('\n') + '\n';
}

/**
 * Key the records by name, failing on the first duplicate.
 *
 * @throws DuplicateNameError listing every path that declares the name
 */
function keyByName(records: readonly ScriptRecord[]): Map<string, IndexEntry> {
  const byKey = new Map<string, IndexEntry>();
  const paths = new Map<string, string[]>();

  for (const record of records) {
    const key = nameKey(record.metadata.name);
    const seen = paths.get(key) ?? [];
    seen.push(record.path);
    paths.set(key, seen);
    byKey.set(key, toIndexEntry(record));
  }

  for (const [key, seen] of paths) {
    if (seen.length > 1) {
      const name = byKey.get(key)?.name ?? key;
      throw new DuplicateNameError(name, [...seen].sort());
    }
  }

  return byKey;
}

/**
 * IndexStore - Build, refresh and query the script index.
 */
export class IndexStore {
  private readonly repo: RepoAdapter;
  readonly indexPath: string;

  // In-memory index, keyed by nameKey
  private entries: Map<string, IndexEntry> = new Map();
  private currentStatus: IndexStatus = 'missing';
  private currentGeneration = 0;

  constructor(repo: RepoAdapter, config: IndexStoreConfig = {}) {
    this.repo = repo;
    this.indexPath = config.indexPath ?? DEFAULT_INDEX_PATH;
  }

  /** Status of the last load, or `loaded` after a successful write. */
  get status(): IndexStatus {
    return this.currentStatus;
  }

  /** Bumped whenever the in-memory index changes. */
  get generation(): number {
    return this.currentGeneration;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Load the snapshot from disk into memory. Never throws: a missing or
   * unreadable snapshot leaves the index empty and is reported in the
   * result.
   */
  async load(): Promise<IndexLoadResult> {
    let content: string;
    try {
      const file = await this.repo.getFile(this.indexPath);
      if (!file) {
        this.replace(new Map(), 'missing');
        return { status: 'missing', entries: 0 };
      }
      content = file.content;
    } catch (error) {
      return this.markCorrupt(error instanceof Error ? error.message : String(error));
    }

    const loaded = new Map<string, IndexEntry>();
    const lines = content.split('\n');

    for (const [i, raw] of lines.entries()) {
      const line = raw.trim();
      if (!line) continue;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        return this.markCorrupt(`line ${i + 1}: not valid JSON`);
      }

      const parsed = IndexEntrySchema.safeParse(json);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return this.markCorrupt(`line ${i + 1}: ${where}${issue?.message ?? 'invalid entry'}`);
      }

      const key = nameKey(parsed.data.name);
      if (loaded.has(key)) {
        return this.markCorrupt(`line ${i + 1}: duplicate name "${parsed.data.name}"`);
      }
      loaded.set(key, parsed.data);
    }

    this.replace(loaded, 'loaded');
    return { status: 'loaded', entries: loaded.size };
  }

  private markCorrupt(diagnostic: string): IndexLoadResult {
    console.warn(`[IndexStore] Index ${this.indexPath} is corrupt (${diagnostic}); rebuild required`);
    this.replace(new Map(), 'corrupt');
    return { status: 'corrupt', entries: 0, diagnostic };
  }

  private replace(entries: Map<string, IndexEntry>, status: IndexStatus): void {
    this.entries = entries;
    this.currentStatus = status;
    this.currentGeneration++;
  }

  /**
   * Persist the given entries atomically.
   */
  private async save(entries: Map<string, IndexEntry>): Promise<void> {
    await this.repo.writeFile({ path: this.indexPath, content: serializeIndex(entries.values()) });
  }

  /**
   * Replace the entire index with entries for `records`.
   *
   * @throws DuplicateNameError before anything is written or changed
   * @returns Number of entries
   */
  async build(records: readonly ScriptRecord[]): Promise<number> {
    const next = keyByName(records);
    await this.save(next);
    this.replace(next, 'loaded');
    console.log(`[IndexStore] Index built: ${next.size} scripts`);
    return next.size;
  }

  /**
   * Bring the index in line with `records`, reporting what changed.
   * Changed entries are replaced whole.
   *
   * @throws DuplicateNameError before anything is written or changed
   */
  async refresh(records: readonly ScriptRecord[]): Promise<RefreshReport> {
    const next = keyByName(records);
    const report: RefreshReport = { added: [], removed: [], updated: [], unchanged: [] };

    for (const [key, entry] of next) {
      const previous = this.entries.get(key);
      if (!previous) {
        report.added.push(entry.name);
      } else if (entriesEqual(previous, entry)) {
        report.unchanged.push(entry.name);
      } else {
        report.updated.push(entry.name);
      }
    }
    for (const [key, entry] of this.entries) {
      if (!next.has(key)) {
        report.removed.push(entry.name);
      }
    }

    await this.save(next);
    this.replace(next, 'loaded');

    report.added.sort(compareNames);
    report.removed.sort(compareNames);
    report.updated.sort(compareNames);
    report.unchanged.sort(compareNames);

    console.log(
      `[IndexStore] Index refreshed: ${report.added.length} added, ${report.removed.length} removed, ` +
        `${report.updated.length} updated, ${report.unchanged.length} unchanged`
    );
    return report;
  }

  /**
   * Apply a single-script change and persist it. On a failed write the
   * in-memory index is left as it was and the error is thrown.
   */
  async commit(change: IndexChange): Promise<IndexCommit> {
    const next = new Map(this.entries);
    const previous = new Map<string, IndexEntry | undefined>();

    if (change.remove !== undefined) {
      const key = nameKey(change.remove);
      previous.set(key, next.get(key));
      next.delete(key);
    }
    if (change.upsert !== undefined) {
      const key = nameKey(change.upsert.name);
      if (!previous.has(key)) previous.set(key, next.get(key));
      next.set(key, change.upsert);
    }

    await this.save(next);
    this.replace(next, 'loaded');
    return { change, previous, generation: this.currentGeneration };
  }

  /**
   * Undo a commit by restoring the prior entries and persisting them.
   */
  async revert(commit: IndexCommit): Promise<void> {
    const next = new Map(this.entries);
    if (commit.change.upsert !== undefined) {
      next.delete(nameKey(commit.change.upsert.name));
    }
    for (const [key, entry] of commit.previous) {
      if (entry === undefined) {
        next.delete(key);
      } else {
        next.set(key, entry);
      }
    }

    await this.save(next);
    this.replace(next, 'loaded');
  }

  /**
   * Get an entry by name (case-insensitive).
   */
  get(name: string): IndexEntry | undefined {
    return this.entries.get(nameKey(name));
  }

  has(name: string): boolean {
    return this.entries.has(nameKey(name));
  }

  /**
   * All entries, sorted by name.
   */
  list(): IndexEntry[] {
    return [...this.entries.values()].sort((a, b) => compareNames(a.name, b.name));
  }

  /**
   * Case-insensitive substring search over name, tags and description.
   * An empty query returns every entry.
   */
  search(query: string): IndexEntry[] {
    const q = query.toLowerCase();
    if (q.length === 0) return this.list();

    return this.list().filter(
      (e) =>
        e.name.toLowerCase().includes(q) ||
        e.description.toLowerCase().includes(q) ||
        e.tags.some((tag) => tag.toLowerCase().includes(q))
    );
  }

  /**
   * Distinct categories, sorted.
   */
  listCategories(): string[] {
    const categories = new Set<string>();
    for (const entry of this.entries.values()) {
      categories.add(entry.category);
    }
    return [...categories].sort(compareNames);
  }
}
