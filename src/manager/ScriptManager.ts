/**
 * ScriptManager - Facade over the index, the resolver and file storage.
 *
 * Reads run under the shared repository lock; mutations go through
 * StorageManager, which takes the write lock for each change. The
 * dependency graph is derived from the index and rebuilt only when the
 * index generation moves.
 */

import { IndexStore } from '../index/IndexStore.js';
import type { IndexLoadResult, RefreshReport } from '../index/types.js';
import { LocalRepoAdapter } from '../repo/LocalRepoAdapter.js';
import { RepositoryLock, type RepositoryLockOptions } from '../repo/RepositoryLock.js';
import type { RepoAdapter } from '../repo/types.js';
import {
  DependencyGraph,
  type DependencyTreeNode,
  type UnresolvedReport,
} from '../resolver/DependencyResolver.js';
import {
  analyzeScript,
  DEFAULT_DATA_SOURCE_FUNCTIONS,
  suggestDependencies,
  type ScriptAnalysis,
} from '../resolver/ScriptAnalyzer.js';
import { StorageManager } from '../store/StorageManager.js';
import type {
  CreateScriptInput,
  DeleteOptions,
  OperationOptions,
  RelocationEvent,
  RepositoryContext,
} from '../store/types.js';
import {
  NotFoundError,
  OperationCancelledError,
  ScriptRepositoryError,
  throwIfCancelled,
} from '../types/errors.js';
import type { IndexEntry, MetadataEdits, ScriptRecord } from '../types/ScriptRecord.js';
import type { DocumentAdapter, DocumentScript, DocumentWriteResult } from './DocumentAdapter.js';

export const EXTRACTED_TAG = 'extracted';
export const DEFAULT_EXTRACT_CATEGORY = 'Extracted';

export interface ScriptManagerOptions {
  /** Script file extension, including the dot (default: '.pq') */
  extension?: string;
  /** Functions reported as data sources by `analyze` */
  dataSourceFunctions?: readonly string[];
  onRelocationPhase?: (event: RelocationEvent) => void;
}

/**
 * Settings for a manager over a local directory.
 */
export interface LocalScriptManagerConfig extends ScriptManagerOptions {
  root: string;
  /** Snapshot path relative to the root (default: 'index.jsonl') */
  indexPath?: string;
  lock?: Partial<RepositoryLockOptions>;
}

export interface MalformedFileReport {
  path: string;
  reason: string;
}

export interface BuildReport {
  scripts: number;
  malformed: MalformedFileReport[];
}

export interface RefreshIndexReport extends RefreshReport {
  malformed: MalformedFileReport[];
}

export interface ResolveOrderOptions extends OperationOptions {
  partial?: boolean;
}

/**
 * Ordered scripts handed to the automation adapter.
 */
export interface ResolvedScripts {
  scripts: Array<{ name: string; body: string }>;
  unresolved: UnresolvedReport[];
}

export interface ScriptWithDependencies {
  script: ScriptRecord;
  /** Dependency-first order, ending with the script itself */
  order: string[];
  unresolved: UnresolvedReport[];
}

export interface ExtractOptions extends OperationOptions {
  /** Category for new scripts (default: 'Extracted') */
  category?: string;
  /** Replace scripts that already exist */
  overwrite?: boolean;
}

export type ExtractStatus = 'created' | 'updated' | 'skipped' | 'failed';

export interface ExtractOutcome {
  name: string;
  status: ExtractStatus;
  path?: string;
  error?: string;
}

export class ScriptManager {
  readonly repo: RepoAdapter;
  readonly index: IndexStore;
  readonly lock: RepositoryLock;
  readonly storage: StorageManager;
  private readonly dataSourceFunctions: readonly string[];

  private graphCache: { generation: number; graph: DependencyGraph } | undefined;

  constructor(context: RepositoryContext, options: ScriptManagerOptions = {}) {
    this.repo = context.repo;
    this.index = context.index;
    this.lock = context.lock;
    this.storage = new StorageManager(context, {
      ...(options.extension !== undefined ? { extension: options.extension } : {}),
      ...(options.onRelocationPhase !== undefined ? { onRelocationPhase: options.onRelocationPhase } : {}),
    });
    this.dataSourceFunctions = options.dataSourceFunctions ?? DEFAULT_DATA_SOURCE_FUNCTIONS;
  }

  // ==========================================================================
  // Index
  // ==========================================================================

  /**
   * Load the index snapshot, building it when there is none. A corrupt
   * snapshot is reported and left for an explicit rebuild; so is a build
   * that fails (duplicate names), with the index left empty.
   */
  async open(options: OperationOptions = {}): Promise<IndexLoadResult> {
    await this.repo.initialize?.();
    const result = await this.lock.withWrite(() => this.index.load(), { signal: options.signal, operation: 'open' });
    if (result.status !== 'missing') {
      return result;
    }

    try {
      const report = await this.buildIndex(options);
      return { status: 'loaded', entries: report.scripts };
    } catch (err) {
      if (err instanceof OperationCancelledError || !(err instanceof ScriptRepositoryError)) {
        throw err;
      }
      console.warn(`[ScriptManager] Initial index build failed: ${err.message}`);
      return { status: 'missing', entries: 0, diagnostic: err.message };
    }
  }

  /**
   * Scan every file and replace the index.
   */
  async buildIndex(options: OperationOptions = {}): Promise<BuildReport> {
    return this.lock.withWrite(
      async () => {
        const { records, malformed } = await this.storage.scan(options);
        const scripts = await this.index.build(records);
        return { scripts, malformed: malformed.map(toMalformedReport) };
      },
      { signal: options.signal, operation: 'buildIndex' }
    );
  }

  /**
   * Scan every file and report what changed in the index.
   */
  async refreshIndex(options: OperationOptions = {}): Promise<RefreshIndexReport> {
    return this.lock.withWrite(
      async () => {
        const { records, malformed } = await this.storage.scan(options);
        const report = await this.index.refresh(records);
        return { ...report, malformed: malformed.map(toMalformedReport) };
      },
      { signal: options.signal, operation: 'refreshIndex' }
    );
  }

  private graph(): DependencyGraph {
    const generation = this.index.generation;
    if (!this.graphCache || this.graphCache.generation !== generation) {
      this.graphCache = { generation, graph: DependencyGraph.build(this.index.list()) };
    }
    return this.graphCache.graph;
  }

  private requireEntry(name: string): IndexEntry {
    const entry = this.index.get(name);
    if (!entry) {
      throw new NotFoundError(name);
    }
    return entry;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async search(query: string, options: OperationOptions = {}): Promise<IndexEntry[]> {
    return this.lock.withRead(() => this.index.search(query), { signal: options.signal, operation: 'search' });
  }

  async get(name: string, options: OperationOptions = {}): Promise<IndexEntry | undefined> {
    return this.lock.withRead(() => this.index.get(name), { signal: options.signal, operation: 'get' });
  }

  async listCategories(options: OperationOptions = {}): Promise<string[]> {
    return this.lock.withRead(() => this.index.listCategories(), {
      signal: options.signal,
      operation: 'listCategories',
    });
  }

  /**
   * Full record read from disk.
   *
   * @throws NotFoundError when the name is not indexed
   */
  async getScript(name: string, options: OperationOptions = {}): Promise<ScriptRecord> {
    return this.lock.withRead(() => this.storage.read(this.requireEntry(name)), {
      signal: options.signal,
      operation: 'getScript',
    });
  }

  /**
   * A script together with the order its dependencies must be inserted in.
   */
  async getWithDependencies(name: string, options: ResolveOrderOptions = {}): Promise<ScriptWithDependencies> {
    return this.lock.withRead(
      async () => {
        const entry = this.requireEntry(name);
        const script = await this.storage.read(entry);
        const { order, unresolved } = this.graph().resolveOrder([entry.name], resolveOptions(options));
        return { script, order, unresolved };
      },
      { signal: options.signal, operation: 'getWithDependencies' }
    );
  }

  /**
   * Resolve the closure of `names` into insertion order and read each
   * body.
   *
   * @throws CycleDetectedError when the closure contains a cycle
   * @throws UnresolvedDependencyError for a missing name, unless partial
   */
  async resolveOrder(names: readonly string[], options: ResolveOrderOptions = {}): Promise<ResolvedScripts> {
    const { records, unresolved } = await this.lock.withRead(() => this.readOrdered(names, options), {
      signal: options.signal,
      operation: 'resolveOrder',
    });
    return {
      scripts: records.map((record) => ({ name: record.metadata.name, body: record.body })),
      unresolved,
    };
  }

  private async readOrdered(
    names: readonly string[],
    options: ResolveOrderOptions
  ): Promise<{ records: ScriptRecord[]; unresolved: UnresolvedReport[] }> {
    const { order, unresolved } = this.graph().resolveOrder(names, resolveOptions(options));
    const records: ScriptRecord[] = [];
    for (const name of order) {
      throwIfCancelled(options.signal, 'resolveOrder');
      records.push(await this.storage.read(this.requireEntry(name)));
    }
    return { records, unresolved };
  }

  /**
   * Known script names the body refers to, other than itself.
   */
  async suggestDependencies(name: string, options: OperationOptions = {}): Promise<string[]> {
    return this.lock.withRead(
      async () => {
        const script = await this.storage.read(this.requireEntry(name));
        const known = this.index.list().map((entry) => entry.name);
        return suggestDependencies(script.body, known, script.metadata.name);
      },
      { signal: options.signal, operation: 'suggestDependencies' }
    );
  }

  async analyze(name: string, options: OperationOptions = {}): Promise<ScriptAnalysis> {
    return this.lock.withRead(
      async () => {
        const script = await this.storage.read(this.requireEntry(name));
        const known = this.index.list().map((entry) => entry.name);
        return analyzeScript(script.body, known, {
          selfName: script.metadata.name,
          dataSourceFunctions: this.dataSourceFunctions,
        });
      },
      { signal: options.signal, operation: 'analyze' }
    );
  }

  async dependencyTree(name: string, options: OperationOptions = {}): Promise<DependencyTreeNode> {
    return this.lock.withRead(() => this.graph().dependencyTree(this.requireEntry(name).name), {
      signal: options.signal,
      operation: 'dependencyTree',
    });
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  async createScript(input: CreateScriptInput, options: OperationOptions = {}): Promise<ScriptRecord> {
    return this.storage.create(input, options);
  }

  async updateBody(name: string, body: string, options: OperationOptions = {}): Promise<ScriptRecord> {
    return this.storage.updateBody(name, body, options);
  }

  async updateMetadata(name: string, edits: MetadataEdits, options: OperationOptions = {}): Promise<IndexEntry> {
    return this.storage.updateMetadata(name, edits, options);
  }

  async relocate(name: string, newCategory: string, options: OperationOptions = {}): Promise<IndexEntry> {
    return this.storage.relocateOnCategoryChange(name, newCategory, options);
  }

  async rename(name: string, newName: string, options: OperationOptions = {}): Promise<IndexEntry> {
    return this.storage.rename(name, newName, options);
  }

  async deleteScript(name: string, options: DeleteOptions = {}): Promise<IndexEntry> {
    return this.storage.delete(name, options);
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  /**
   * Save every query of a document as a script tagged `extracted`. A
   * failed query is reported and the rest carry on.
   *
   * @throws OperationCancelledError between queries when the signal fires
   */
  async extractFromDocument(
    adapter: DocumentAdapter,
    documentRef: string,
    options: ExtractOptions = {}
  ): Promise<ExtractOutcome[]> {
    const category = options.category ?? DEFAULT_EXTRACT_CATEGORY;
    console.log(`[ScriptManager] Extracting ${documentRef} into ${category}`);

    const found = await adapter.readScripts(documentRef);
    if (found.length === 0) {
      console.log(`[ScriptManager] No queries found in ${documentRef}`);
      return [];
    }

    const outcomes: ExtractOutcome[] = [];
    for (const query of found) {
      throwIfCancelled(options.signal, 'extractFromDocument');
      try {
        outcomes.push(await this.extractOne(query, category, options));
      } catch (err) {
        if (err instanceof OperationCancelledError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[ScriptManager] Failed to save ${query.name}: ${message}`);
        outcomes.push({ name: query.name, status: 'failed', error: message });
      }
    }

    const saved = outcomes.filter((o) => o.status === 'created' || o.status === 'updated').length;
    console.log(`[ScriptManager] Extraction complete: ${saved} of ${found.length} saved`);
    return outcomes;
  }

  private async extractOne(query: DocumentScript, category: string, options: ExtractOptions): Promise<ExtractOutcome> {
    const signal = options.signal !== undefined ? { signal: options.signal } : {};
    const existing = this.index.get(query.name);

    if (!existing) {
      const record = await this.storage.create(
        {
          metadata: { name: query.name, category, description: query.description, tags: [EXTRACTED_TAG] },
          body: query.body,
        },
        signal
      );
      return { name: record.metadata.name, status: 'created', path: record.path };
    }

    if (!options.overwrite) {
      return { name: existing.name, status: 'skipped', path: existing.path, error: 'already exists' };
    }

    const entry = await this.storage.replaceScript(
      existing.name,
      { category, description: query.description, tags: [...existing.tags, EXTRACTED_TAG] },
      query.body,
      signal
    );
    return { name: entry.name, status: 'updated', path: entry.path };
  }

  /**
   * Resolve `names` with their dependencies and write them into a document
   * in insertion order.
   *
   * @returns The adapter's per-name results
   */
  async insertIntoDocument(
    adapter: DocumentAdapter,
    documentRef: string,
    names: readonly string[],
    options: OperationOptions = {}
  ): Promise<DocumentWriteResult[]> {
    console.log(`[ScriptManager] Inserting ${names.join(', ')} into ${documentRef}`);

    const { records } = await this.lock.withRead(() => this.readOrdered(names, options), {
      signal: options.signal,
      operation: 'insertIntoDocument',
    });
    console.log(`[ScriptManager] Insertion order: ${records.map((r) => r.metadata.name).join(', ')}`);

    const results = await adapter.writeScripts(
      documentRef,
      records.map((r) => ({ name: r.metadata.name, body: r.body, description: r.metadata.description }))
    );

    for (const result of results) {
      if (result.ok) {
        console.log(`[ScriptManager] Inserted ${result.name}`);
      } else {
        console.error(`[ScriptManager] Failed to insert ${result.name}: ${result.error ?? 'unknown error'}`);
      }
    }
    return results;
  }
}

function toMalformedReport(error: { path: string | undefined; reason: string }): MalformedFileReport {
  return { path: error.path ?? '', reason: error.reason };
}

function resolveOptions(options: ResolveOrderOptions): { partial?: boolean } {
  return options.partial !== undefined ? { partial: options.partial } : {};
}

/**
 * Create a manager over a local directory.
 */
export function createScriptManager(config: LocalScriptManagerConfig): ScriptManager {
  const repo = new LocalRepoAdapter({ basePath: config.root });
  const index = new IndexStore(repo, config.indexPath !== undefined ? { indexPath: config.indexPath } : {});
  const lock = new RepositoryLock(repo.root, config.lock ?? {});
  return new ScriptManager({ repo, index, lock }, config);
}
