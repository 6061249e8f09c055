/**
 * StorageManager - Owns every change to script files.
 *
 * Each mutation runs under the repository write lock and commits the
 * matching index change before the lock is released, so the index and the
 * folder layout never disagree for another caller. When the index commit
 * fails, the file change is undone and the failure is re-thrown.
 */

import type { RepoAdapter } from '../repo/types.js';
import type { RepositoryLock } from '../repo/RepositoryLock.js';
import type { IndexStore } from '../index/IndexStore.js';
import { DEFAULT_EXTENSION, generateScriptPath, scriptPattern } from '../repo/PathConvention.js';
import { DependencyGraph } from '../resolver/DependencyResolver.js';
import { normalizeMetadata, parseScriptFile, serializeScript } from './MetadataCodec.js';
import {
  nameKey,
  toIndexEntry,
  type IndexEntry,
  type MetadataEdits,
  type ScriptMetadata,
  type ScriptRecord,
} from '../types/ScriptRecord.js';
import {
  AlreadyExistsError,
  FileSystemError,
  MalformedMetadataError,
  NameReferencedError,
  NotFoundError,
  throwIfCancelled,
} from '../types/errors.js';
import type {
  CreateScriptInput,
  DeleteOptions,
  OperationOptions,
  RelocationEvent,
  RelocationPhase,
  RepositoryContext,
  ScanResult,
  StorageManagerConfig,
} from './types.js';

/**
 * StorageManager - scan, create, update, relocate, rename and delete
 * scripts.
 */
export class StorageManager {
  private readonly repo: RepoAdapter;
  private readonly index: IndexStore;
  private readonly lock: RepositoryLock;
  private readonly extension: string;
  private readonly onRelocationPhase: ((event: RelocationEvent) => void) | undefined;

  constructor(context: RepositoryContext, config: StorageManagerConfig = {}) {
    this.repo = context.repo;
    this.index = context.index;
    this.lock = context.lock;
    this.extension = config.extension ?? DEFAULT_EXTENSION;
    this.onRelocationPhase = config.onRelocationPhase;
  }

  /**
   * Canonical path for metadata.
   */
  pathFor(metadata: Pick<ScriptMetadata, 'name' | 'category'>): string {
    return generateScriptPath({ name: metadata.name, category: metadata.category, extension: this.extension });
  }

  /**
   * Read and parse every script file. Malformed files are reported and
   * skipped. Does not lock: callers building the index hold the write lock.
   *
   * @throws OperationCancelledError between files when the signal fires
   */
  async scan(options: OperationOptions = {}): Promise<ScanResult> {
    const files = await this.repo.listFiles({
      directory: '',
      pattern: scriptPattern(this.extension),
      recursive: true,
    });

    const records: ScriptRecord[] = [];
    const malformed: MalformedMetadataError[] = [];

    for (const path of files) {
      throwIfCancelled(options.signal, 'scan');

      // Hidden files and folders hold temp files and lock state
      if (path.split('/').some((segment) => segment.startsWith('.'))) continue;

      const file = await this.repo.getFile(path);
      if (!file) continue;

      const result = parseScriptFile(file.content, path);
      if (result.ok) {
        records.push(result.record);
      } else {
        console.warn(`[StorageManager] Skipping ${result.error.message}`);
        malformed.push(result.error);
      }
    }

    return { records, malformed };
  }

  /**
   * Read the full record for an index entry. Does not lock.
   *
   * @throws FileSystemError when the file is gone
   * @throws MalformedMetadataError when the header no longer parses
   */
  async read(entry: IndexEntry): Promise<ScriptRecord> {
    const file = await this.repo.getFile(entry.path);
    if (!file) {
      throw new FileSystemError('read', entry.path, new Error('file is missing; refresh the index'));
    }
    const result = parseScriptFile(file.content, entry.path);
    if (!result.ok) {
      throw result.error;
    }
    return result.record;
  }

  private requireEntry(name: string): IndexEntry {
    const entry = this.index.get(name);
    if (!entry) {
      throw new NotFoundError(name);
    }
    return entry;
  }

  private dependentsOf(name: string): string[] {
    return DependencyGraph.build(this.index.list())
      .dependents(name)
      .filter((dependent) => nameKey(dependent) !== nameKey(name));
  }

  /**
   * Create a new script at its canonical path.
   *
   * @throws AlreadyExistsError when the name is taken or the file exists
   */
  async create(input: CreateScriptInput, options: OperationOptions = {}): Promise<ScriptRecord> {
    const metadata = normalizeMetadata(input.metadata);
    const path = this.pathFor(metadata);

    return this.lock.withWrite(
      async () => {
        const existing = this.index.get(metadata.name);
        if (existing) {
          throw new AlreadyExistsError(existing.path, `Script name already in use: ${existing.name}`);
        }

        throwIfCancelled(options.signal, 'create');
        await this.repo.writeFile({ path, content: serializeScript(metadata, input.body), exclusive: true });

        const record: ScriptRecord = { metadata, body: input.body, path };
        try {
          await this.index.commit({ upsert: toIndexEntry(record) });
        } catch (err) {
          await this.undo(`remove ${path}`, () => this.repo.deleteFile(path));
          throw err;
        }

        console.log(`[StorageManager] Created ${path}`);
        return record;
      },
      { signal: options.signal, operation: 'create' }
    );
  }

  /**
   * Replace a script's body, keeping its header. The index holds no
   * bodies, so it is not touched.
   */
  async updateBody(name: string, body: string, options: OperationOptions = {}): Promise<ScriptRecord> {
    return this.lock.withWrite(
      async () => {
        const entry = this.requireEntry(name);
        const current = await this.read(entry);
        await this.repo.writeFile({ path: entry.path, content: serializeScript(current.metadata, body) });
        return { ...current, body };
      },
      { signal: options.signal, operation: 'updateBody' }
    );
  }

  /**
   * Apply metadata edits. A changed name goes through the rename rules, a
   * changed category moves the file; anything else is rewritten in place.
   */
  async updateMetadata(name: string, edits: MetadataEdits, options: OperationOptions = {}): Promise<IndexEntry> {
    return this.runMove(
      edits.name !== undefined && nameKey(edits.name) !== nameKey(name) ? 'rename' : 'relocate',
      name,
      (current) => normalizeMetadata({ ...current, ...edits }),
      options
    );
  }

  /**
   * Apply metadata edits and replace the body in one write, moving the file
   * when the category or name changes. Readers see either the old script or
   * the new one.
   */
  async replaceScript(
    name: string,
    edits: MetadataEdits,
    body: string,
    options: OperationOptions = {}
  ): Promise<IndexEntry> {
    return this.runMove(
      edits.name !== undefined && nameKey(edits.name) !== nameKey(name) ? 'rename' : 'relocate',
      name,
      (current) => normalizeMetadata({ ...current, ...edits }),
      options,
      body
    );
  }

  /**
   * Move a script to the folder of `newCategory`. The header is rewritten
   * with the new category; the body is unchanged.
   */
  async relocateOnCategoryChange(
    name: string,
    newCategory: string,
    options: OperationOptions = {}
  ): Promise<IndexEntry> {
    return this.runMove('relocate', name, (current) => normalizeMetadata({ ...current, category: newCategory }), options);
  }

  /**
   * Rename a script, moving its file.
   *
   * @throws NameReferencedError when other scripts depend on the name
   * @throws AlreadyExistsError when the new name is taken
   */
  async rename(name: string, newName: string, options: OperationOptions = {}): Promise<IndexEntry> {
    return this.runMove('rename', name, (current) => normalizeMetadata({ ...current, name: newName }), options);
  }

  /**
   * Shared protocol for metadata changes that may move the file. `newBody`
   * replaces the body in the same write.
   */
  private async runMove(
    operation: RelocationEvent['operation'],
    name: string,
    change: (current: ScriptMetadata) => ScriptMetadata,
    options: OperationOptions,
    newBody?: string
  ): Promise<IndexEntry> {
    const fromPath = this.index.get(name)?.path ?? '';
    let toPath: string | undefined;
    const notify = (phase: RelocationPhase): void => {
      this.onRelocationPhase?.({
        operation,
        name,
        phase,
        from: fromPath,
        ...(toPath !== undefined ? { to: toPath } : {}),
      });
    };

    notify('Requested');
    try {
      return await this.lock.withWrite(
        async () => {
          const entry = this.requireEntry(name);
          const current = await this.read(entry);
          const next = change(current.metadata);
          const renamed = nameKey(next.name) !== nameKey(entry.name);

          if (renamed) {
            const dependents = this.dependentsOf(entry.name);
            if (dependents.length > 0) {
              throw new NameReferencedError(entry.name, dependents);
            }
            const taken = this.index.get(next.name);
            if (taken) {
              throw new AlreadyExistsError(taken.path, `Script name already in use: ${taken.name}`);
            }
          }

          const target = this.pathFor(next);
          toPath = target;
          notify('Locked');
          throwIfCancelled(options.signal, operation);

          const body = newBody ?? current.body;
          const original = serializeScript(current.metadata, current.body);
          const updated = serializeScript(next, body);
          const nextEntry = toIndexEntry({ metadata: next, body, path: target });
          const removeName = renamed ? entry.name : undefined;

          if (target === entry.path) {
            await this.rewriteInPlace(entry.path, original, updated, nextEntry, removeName);
            return nextEntry;
          }

          await this.moveAndRewrite(entry.path, target, updated);
          notify('FileMoved');

          try {
            await this.index.commit({ upsert: nextEntry, ...(removeName !== undefined ? { remove: removeName } : {}) });
          } catch (err) {
            notify('RollbackMove');
            await this.undo(`restore ${entry.path}`, async () => {
              await this.repo.writeFile({ path: target, content: original });
              await this.repo.moveFile({ from: target, to: entry.path });
            });
            throw err;
          }

          notify('IndexUpdated');
          console.log(`[StorageManager] Moved ${entry.path} -> ${target}`);
          return nextEntry;
        },
        { signal: options.signal, operation }
      );
    } finally {
      notify('Released');
    }
  }

  /**
   * Move a file and write its new content. A failed write moves the file
   * back before the error is re-thrown.
   */
  private async moveAndRewrite(from: string, to: string, content: string): Promise<void> {
    const occupied = this.index.list().find(
      (other) => other.path.toLowerCase() === to.toLowerCase() && other.path.toLowerCase() !== from.toLowerCase()
    );
    if (occupied) {
      throw new AlreadyExistsError(to);
    }

    await this.repo.moveFile({ from, to });
    try {
      await this.repo.writeFile({ path: to, content });
    } catch (err) {
      await this.undo(`move ${to} back`, () => this.repo.moveFile({ from: to, to: from }));
      throw err;
    }
  }

  private async rewriteInPlace(
    path: string,
    original: string,
    updated: string,
    nextEntry: IndexEntry,
    removeName: string | undefined
  ): Promise<void> {
    await this.repo.writeFile({ path, content: updated });
    try {
      await this.index.commit({ upsert: nextEntry, ...(removeName !== undefined ? { remove: removeName } : {}) });
    } catch (err) {
      await this.undo(`restore ${path}`, () => this.repo.writeFile({ path, content: original }));
      throw err;
    }
  }

  /**
   * Delete a script file and its index entry together. A file already
   * removed from disk only loses its index entry.
   *
   * @throws NameReferencedError when other scripts depend on it (unless forced)
   */
  async delete(name: string, options: DeleteOptions = {}): Promise<IndexEntry> {
    return this.lock.withWrite(
      async () => {
        const entry = this.requireEntry(name);
        if (!options.force) {
          const dependents = this.dependentsOf(entry.name);
          if (dependents.length > 0) {
            throw new NameReferencedError(entry.name, dependents);
          }
        }

        const file = await this.repo.getFile(entry.path);
        if (file) {
          await this.repo.deleteFile(entry.path);
        } else {
          console.warn(`[StorageManager] ${entry.path} is already gone; removing its index entry`);
        }

        try {
          await this.index.commit({ remove: entry.name });
        } catch (err) {
          if (file) {
            await this.undo(`restore ${entry.path}`, () =>
              this.repo.writeFile({ path: entry.path, content: file.content })
            );
          }
          throw err;
        }

        console.log(`[StorageManager] Deleted ${entry.path}`);
        return entry;
      },
      { signal: options.signal, operation: 'delete' }
    );
  }

  /**
   * Run a compensating step. Its own failure is logged; the caller re-throws
   * the error that made the compensation necessary.
   */
  private async undo(description: string, step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (undoErr) {
      console.error(`[StorageManager] Rollback step failed (${description}):`, undoErr);
    }
  }
}
