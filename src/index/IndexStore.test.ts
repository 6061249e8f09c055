/**
 * Tests for IndexStore module.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { IndexStore, serializeIndex } from './IndexStore.js';
import { LocalRepoAdapter } from '../repo/LocalRepoAdapter.js';
import type { WriteFileOptions } from '../repo/types.js';
import { DuplicateNameError, FileSystemError } from '../types/errors.js';
import { toIndexEntry, type ScriptRecord } from '../types/ScriptRecord.js';

function record(
  name: string,
  category: string,
  dependencies: string[] = [],
  extra: { tags?: string[]; description?: string; path?: string } = {}
): ScriptRecord {
  return {
    metadata: {
      name,
      category,
      tags: extra.tags ?? [],
      dependencies,
      description: extra.description ?? '',
      version: '1.0',
    },
    body: `// ${name}`,
    path: extra.path ?? `${category}/${name}.pq`,
  };
}

/**
 * Local adapter whose index writes can be made to fail.
 */
class FlakyRepo extends LocalRepoAdapter {
  failIndexWrites = false;

  override async writeFile(options: WriteFileOptions): Promise<void> {
    if (this.failIndexWrites && options.path === 'index.jsonl') {
      throw new FileSystemError('write', options.path, new Error('disk full'));
    }
    return super.writeFile(options);
  }
}

describe('IndexStore', () => {
  let testDir: string;
  let repo: FlakyRepo;
  let store: IndexStore;

  const snapshot = (): Promise<string> => readFile(join(testDir, 'index.jsonl'), 'utf-8');

  beforeEach(async () => {
    testDir = join(tmpdir(), `index-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    repo = new FlakyRepo({ basePath: testDir });
    store = new IndexStore(repo);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('reports a missing snapshot', async () => {
      expect(await store.load()).toEqual({ status: 'missing', entries: 0 });
      expect(store.status).toBe('missing');
      expect(store.list()).toEqual([]);
    });

    it('reads a snapshot written by build', async () => {
      await store.build([record('Beta', 'Staging'), record('alpha', 'Utils', ['Beta'])]);

      const fresh = new IndexStore(repo);
      expect(await fresh.load()).toEqual({ status: 'loaded', entries: 2 });
      expect(fresh.get('ALPHA')?.dependencies).toEqual(['Beta']);
    });

    it('reports invalid JSON as corrupt without throwing', async () => {
      await writeFile(join(testDir, 'index.jsonl'), 'not json\n');

      expect(await store.load()).toEqual({ status: 'corrupt', entries: 0, diagnostic: 'line 1: not valid JSON' });
      expect(store.status).toBe('corrupt');
    });

    it('reports entries failing the schema as corrupt', async () => {
      const good = serializeIndex([toIndexEntry(record('A', 'Staging'))]);
      await writeFile(join(testDir, 'index.jsonl'), `${good}{"name":"B"}\n`);

      const result = await store.load();

      expect(result).toEqual({ status: 'corrupt', entries: 0, diagnostic: 'line 2: category: Required' });
      expect(store.get('A')).toBeUndefined();
    });

    it('reports duplicate names as corrupt', async () => {
      const line = serializeIndex([toIndexEntry(record('A', 'Staging'))]);
      await writeFile(join(testDir, 'index.jsonl'), line + line.replace('"A"', '"a"'));

      const result = await store.load();

      expect(result.status).toBe('corrupt');
      expect(result.diagnostic).toBe('line 2: duplicate name "a"');
    });
  });

  describe('build', () => {
    it('writes a sorted snapshot without timestamps', async () => {
      const count = await store.build([record('Beta', 'Staging'), record('alpha', 'Utils', ['Beta'])]);

      expect(count).toBe(2);
      expect(await snapshot()).toBe(
        '{"name":"alpha","category":"Utils","tags":[],"dependencies":["Beta"],"description":"","version":"1.0","path":"Utils/alpha.pq"}\n' +
          '{"name":"Beta","category":"Staging","tags":[],"dependencies":[],"description":"","version":"1.0","path":"Staging/Beta.pq"}\n'
      );
    });

    it('writes an empty snapshot for an empty repository', async () => {
      await store.build([]);
      expect(await snapshot()).toBe('');
      expect(store.status).toBe('loaded');
    });

    it('rejects duplicate names and keeps the previous index', async () => {
      await store.build([record('A', 'Staging')]);
      const before = await snapshot();
      const generation = store.generation;

      const attempt = store.build([
        record('Report', 'Staging'),
        record('report', 'Production', [], { path: 'Production/report.pq' }),
      ]);

      await expect(attempt).rejects.toThrow(DuplicateNameError);
      await attempt.catch((err: unknown) => {
        expect(err instanceof DuplicateNameError ? err.paths : []).toEqual(['Production/report.pq', 'Staging/Report.pq']);
      });
      expect(store.list().map((e) => e.name)).toEqual(['A']);
      expect(store.generation).toBe(generation);
      expect(await snapshot()).toBe(before);
    });
  });

  describe('refresh', () => {
    it('reports added, removed, updated and unchanged names', async () => {
      await store.build([record('A', 'Staging'), record('B', 'Staging'), record('C', 'Staging')]);

      const report = await store.refresh([
        record('A', 'Staging'),
        record('B', 'Staging', [], { description: 'changed' }),
        record('D', 'Staging'),
      ]);

      expect(report).toEqual({ added: ['D'], removed: ['C'], updated: ['B'], unchanged: ['A'] });
      expect(store.get('B')?.description).toBe('changed');
      expect(store.get('C')).toBeUndefined();
    });

    it('is idempotent', async () => {
      const records = [record('Q1', 'Staging', ['fn_A']), record('fn_A', 'Functions')];

      await store.refresh(records);
      const first = await snapshot();
      const report = await store.refresh(records);

      expect(await snapshot()).toBe(first);
      expect(report).toEqual({ added: [], removed: [], updated: [], unchanged: ['fn_A', 'Q1'] });
    });

    it('rejects duplicate names without writing', async () => {
      await store.build([record('A', 'Staging')]);
      const before = await snapshot();

      await expect(
        store.refresh([record('A', 'Staging'), record('a', 'Other', [], { path: 'Other/a.pq' })])
      ).rejects.toThrow(DuplicateNameError);

      expect(await snapshot()).toBe(before);
      expect(store.get('A')?.path).toBe('Staging/A.pq');
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await store.build([
        record('Sales', 'Staging', [], { tags: ['Monthly'], description: 'Raw sales rows' }),
        record('fn_Clean', 'Functions', [], { description: 'Trim text columns' }),
        record('Costs', 'Staging', [], { tags: ['finance'] }),
      ]);
    });

    it('searches names, tags and descriptions case-insensitively', async () => {
      expect(store.search('SALES').map((e) => e.name)).toEqual(['Sales']);
      expect(store.search('monthly').map((e) => e.name)).toEqual(['Sales']);
      expect(store.search('text').map((e) => e.name)).toEqual(['fn_Clean']);
      expect(store.search('s').map((e) => e.name)).toEqual(['Costs', 'fn_Clean', 'Sales']);
    });

    it('returns everything for an empty query', async () => {
      expect(store.search('').map((e) => e.name)).toEqual(['Costs', 'fn_Clean', 'Sales']);
    });

    it('matches surrounding spaces as given', async () => {
      expect(store.search('Monthly ')).toEqual([]);
      expect(store.search('  ')).toEqual([]);
      expect(store.search('sales ').map((e) => e.name)).toEqual(['Sales']);
    });

    it('does not search categories', async () => {
      expect(store.search('functions')).toEqual([]);
    });

    it('returns undefined for an unknown name', async () => {
      expect(store.get('Nope')).toBeUndefined();
      expect(store.has('sales')).toBe(true);
    });

    it('lists distinct categories', async () => {
      expect(store.listCategories()).toEqual(['Functions', 'Staging']);
    });
  });

  describe('commit', () => {
    it('applies an upsert and a removal and bumps the generation', async () => {
      await store.build([record('A', 'Staging'), record('B', 'Staging')]);
      const generation = store.generation;

      await store.commit({ upsert: toIndexEntry(record('C', 'Production')), remove: 'b' });

      expect(store.list().map((e) => e.name)).toEqual(['A', 'C']);
      expect(store.generation).toBe(generation + 1);

      const reloaded = new IndexStore(repo);
      await reloaded.load();
      expect(reloaded.list().map((e) => e.name)).toEqual(['A', 'C']);
    });

    it('reverts a commit', async () => {
      await store.build([record('A', 'Staging')]);
      const before = await snapshot();

      const commit = await store.commit({ upsert: toIndexEntry(record('A', 'Production')) });
      expect(store.get('A')?.category).toBe('Production');

      await store.revert(commit);

      expect(store.get('A')?.category).toBe('Staging');
      expect(await snapshot()).toBe(before);
    });

    it('leaves memory untouched when the write fails', async () => {
      await store.build([record('A', 'Staging')]);
      const generation = store.generation;
      repo.failIndexWrites = true;

      await expect(store.commit({ remove: 'A' })).rejects.toThrow(FileSystemError);

      expect(store.get('A')).toBeDefined();
      expect(store.generation).toBe(generation);
    });
  });
});
