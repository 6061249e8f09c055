/**
 * Tests for StorageManager.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { StorageManager } from './StorageManager.js';
import { parseScript } from './MetadataCodec.js';
import type { RelocationPhase } from './types.js';
import { IndexStore } from '../index/IndexStore.js';
import { LocalRepoAdapter } from '../repo/LocalRepoAdapter.js';
import { RepositoryLock } from '../repo/RepositoryLock.js';
import type { WriteFileOptions } from '../repo/types.js';
import {
  AlreadyExistsError,
  FileSystemError,
  NameReferencedError,
  NotFoundError,
  OperationCancelledError,
} from '../types/errors.js';

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

const BODY = 'let\n    Source = Excel.CurrentWorkbook(){[Name="Sales"]}[Content]\nin\n    Source';

describe('StorageManager', () => {
  let testDir: string;
  let repo: FlakyRepo;
  let index: IndexStore;
  let lock: RepositoryLock;
  let phases: RelocationPhase[];
  let storage: StorageManager;

  const read = (path: string): Promise<string> => readFile(join(testDir, path), 'utf-8');
  const exists = (path: string): boolean => existsSync(join(testDir, path));

  beforeEach(async () => {
    testDir = join(tmpdir(), `storage-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    repo = new FlakyRepo({ basePath: testDir });
    index = new IndexStore(repo);
    lock = new RepositoryLock(testDir);
    phases = [];
    storage = new StorageManager(
      { repo, index, lock },
      { onRelocationPhase: (event) => phases.push(event.phase) }
    );
    await index.build([]);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('create', () => {
    it('writes the file at its canonical path and indexes it', async () => {
      const record = await storage.create({ metadata: { name: 'Foo', category: 'Staging' }, body: BODY });

      expect(record.path).toBe('Staging/Foo.pq');
      const parsed = parseScript(await read('Staging/Foo.pq'));
      expect(parsed.ok && parsed.body).toBe(BODY);
      expect(parsed.ok && parsed.metadata.category).toBe('Staging');
      expect(index.get('foo')?.path).toBe('Staging/Foo.pq');
    });

    it('rejects a name already in use regardless of case', async () => {
      await storage.create({ metadata: { name: 'Foo', category: 'Staging' }, body: BODY });

      await expect(
        storage.create({ metadata: { name: 'FOO', category: 'Production' }, body: '' })
      ).rejects.toThrow(AlreadyExistsError);
      expect(exists('Production/FOO.pq')).toBe(false);
    });

    it('refuses to overwrite an unindexed file', async () => {
      await mkdir(join(testDir, 'Staging'), { recursive: true });
      await writeFile(join(testDir, 'Staging/Foo.pq'), 'hand written');

      await expect(storage.create({ metadata: { name: 'Foo', category: 'Staging' }, body: BODY })).rejects.toThrow(
        AlreadyExistsError
      );
      expect(await read('Staging/Foo.pq')).toBe('hand written');
      expect(index.has('Foo')).toBe(false);
    });

    it('removes the new file when the index write fails', async () => {
      repo.failIndexWrites = true;

      await expect(storage.create({ metadata: { name: 'Foo', category: 'Staging' }, body: BODY })).rejects.toThrow(
        FileSystemError
      );
      expect(exists('Staging/Foo.pq')).toBe(false);
      expect(index.has('Foo')).toBe(false);
    });
  });

  describe('relocateOnCategoryChange', () => {
    beforeEach(async () => {
      await storage.create({ metadata: { name: 'Foo', category: 'Staging', tags: ['sales'] }, body: BODY });
    });

    it('moves the file and updates the index', async () => {
      const entry = await storage.relocateOnCategoryChange('Foo', 'Production');

      expect(entry.path).toBe('Production/Foo.pq');
      expect(exists('Staging/Foo.pq')).toBe(false);

      const parsed = parseScript(await read('Production/Foo.pq'));
      expect(parsed.ok && parsed.body).toBe(BODY);
      expect(parsed.ok && parsed.metadata.category).toBe('Production');
      expect(parsed.ok && parsed.metadata.tags).toEqual(['sales']);

      expect(index.get('Foo')?.category).toBe('Production');
      expect(index.get('Foo')?.path).toBe('Production/Foo.pq');
    });

    it('reports each phase in order', async () => {
      await storage.relocateOnCategoryChange('Foo', 'Production');

      expect(phases).toEqual(['Requested', 'Locked', 'FileMoved', 'IndexUpdated', 'Released']);
    });

    it('rolls the move back when the index write fails', async () => {
      const before = await read('Staging/Foo.pq');
      repo.failIndexWrites = true;

      await expect(storage.relocateOnCategoryChange('Foo', 'Production')).rejects.toThrow(FileSystemError);

      expect(phases).toEqual(['Requested', 'Locked', 'FileMoved', 'RollbackMove', 'Released']);
      expect(await read('Staging/Foo.pq')).toBe(before);
      expect(exists('Production/Foo.pq')).toBe(false);
      expect(index.get('Foo')?.path).toBe('Staging/Foo.pq');
    });

    it('refuses a target path owned by another script', async () => {
      await mkdir(join(testDir, 'Production'), { recursive: true });
      await writeFile(join(testDir, 'Production/Foo.pq'), 'someone else');

      await expect(storage.relocateOnCategoryChange('Foo', 'Production')).rejects.toThrow(AlreadyExistsError);

      expect(phases).toEqual(['Requested', 'Locked', 'Released']);
      expect(await read('Production/Foo.pq')).toBe('someone else');
      expect(exists('Staging/Foo.pq')).toBe(true);
    });

    it('throws NotFoundError for an unknown script', async () => {
      await expect(storage.relocateOnCategoryChange('Nope', 'Production')).rejects.toThrow(NotFoundError);
      expect(phases).toEqual(['Requested', 'Released']);
    });

    it('never lets a reader see a half-finished move', async () => {
      const observed: boolean[] = [];
      const reader = (): Promise<void> =>
        lock.withRead(async () => {
          const entry = index.get('Foo');
          observed.push(entry !== undefined && exists(entry.path) && !(entry.path === 'Staging/Foo.pq' && exists('Production/Foo.pq')));
        });

      await Promise.all([reader(), storage.relocateOnCategoryChange('Foo', 'Production'), reader(), reader()]);

      expect(observed).toEqual([true, true, true]);
    });
  });

  describe('rename', () => {
    beforeEach(async () => {
      await storage.create({ metadata: { name: 'fn_A', category: 'Functions' }, body: '(x) => x' });
      await storage.create({ metadata: { name: 'Q1', category: 'Staging', dependencies: ['fn_A'] }, body: 'fn_A(1)' });
    });

    it('moves the file and replaces the index entry', async () => {
      const entry = await storage.rename('Q1', 'Q1 Sales');

      expect(entry.path).toBe('Staging/Q1 Sales.pq');
      expect(exists('Staging/Q1.pq')).toBe(false);
      expect(index.has('Q1')).toBe(false);
      expect(index.get('q1 sales')?.dependencies).toEqual(['fn_A']);
    });

    it('refuses to rename a script others depend on', async () => {
      const attempt = storage.rename('fn_A', 'fn_B');

      await expect(attempt).rejects.toThrow(NameReferencedError);
      await attempt.catch((err: unknown) => {
        expect(err instanceof NameReferencedError ? err.dependents : []).toEqual(['Q1']);
      });
      expect(exists('Functions/fn_A.pq')).toBe(true);
      expect(index.has('fn_A')).toBe(true);
    });

    it('refuses a name already in use', async () => {
      await expect(storage.rename('Q1', 'FN_A')).rejects.toThrow(AlreadyExistsError);
    });

    it('allows a case-only rename', async () => {
      const entry = await storage.rename('Q1', 'q1');

      expect(entry.path).toBe('Staging/q1.pq');
      expect(index.get('Q1')?.name).toBe('q1');
      expect(index.size).toBe(2);
    });
  });

  describe('updateMetadata', () => {
    beforeEach(async () => {
      await storage.create({ metadata: { name: 'Foo', category: 'Staging' }, body: BODY });
    });

    it('rewrites the header in place when the path is unchanged', async () => {
      const entry = await storage.updateMetadata('Foo', { description: 'Monthly sales', tags: ['finance'] });

      expect(entry.path).toBe('Staging/Foo.pq');
      expect(index.get('Foo')?.description).toBe('Monthly sales');
      const parsed = parseScript(await read('Staging/Foo.pq'));
      expect(parsed.ok && parsed.metadata.tags).toEqual(['finance']);
      expect(parsed.ok && parsed.body).toBe(BODY);
      expect(phases).toEqual(['Requested', 'Locked', 'Released']);
    });

    it('restores the header when the index write fails', async () => {
      const before = await read('Staging/Foo.pq');
      repo.failIndexWrites = true;

      await expect(storage.updateMetadata('Foo', { description: 'changed' })).rejects.toThrow(FileSystemError);

      expect(await read('Staging/Foo.pq')).toBe(before);
      expect(index.get('Foo')?.description).toBe('');
    });

    it('moves the file when the category changes', async () => {
      const entry = await storage.updateMetadata('Foo', { category: 'Production', version: '2.0' });

      expect(entry.path).toBe('Production/Foo.pq');
      expect(index.get('Foo')?.version).toBe('2.0');
    });
  });

  describe('replaceScript', () => {
    beforeEach(async () => {
      await storage.create({ metadata: { name: 'Foo', category: 'Staging' }, body: BODY });
    });

    it('moves the file and writes the new header and body together', async () => {
      const entry = await storage.replaceScript('Foo', { category: 'Imported', description: 'From a workbook' }, 'let x = 2 in x');

      expect(entry.path).toBe('Imported/Foo.pq');
      expect(exists('Staging/Foo.pq')).toBe(false);
      const parsed = parseScript(await read('Imported/Foo.pq'));
      expect(parsed.ok && parsed.metadata.description).toBe('From a workbook');
      expect(parsed.ok && parsed.body).toBe('let x = 2 in x');
      expect(phases).toEqual(['Requested', 'Locked', 'FileMoved', 'IndexUpdated', 'Released']);
    });

    it('leaves the old header and body in place when the index write fails', async () => {
      const before = await read('Staging/Foo.pq');
      repo.failIndexWrites = true;

      await expect(
        storage.replaceScript('Foo', { category: 'Imported' }, 'let x = 2 in x')
      ).rejects.toThrow(FileSystemError);

      expect(await read('Staging/Foo.pq')).toBe(before);
      expect(exists('Imported/Foo.pq')).toBe(false);
      expect(index.get('Foo')?.path).toBe('Staging/Foo.pq');
    });
  });

  describe('updateBody', () => {
    it('replaces the body and keeps the header', async () => {
      await storage.create({ metadata: { name: 'Foo', category: 'Staging', tags: ['a'] }, body: BODY });

      await storage.updateBody('Foo', 'let x = 1 in x');

      const parsed = parseScript(await read('Staging/Foo.pq'));
      expect(parsed.ok && parsed.body).toBe('let x = 1 in x');
      expect(parsed.ok && parsed.metadata.tags).toEqual(['a']);
    });
  });

  describe('delete', () => {
    beforeEach(async () => {
      await storage.create({ metadata: { name: 'fn_A', category: 'Functions' }, body: '(x) => x' });
      await storage.create({ metadata: { name: 'Q1', category: 'Staging', dependencies: ['fn_A'] }, body: 'fn_A(1)' });
    });

    it('removes the file and the index entry', async () => {
      await storage.delete('Q1');

      expect(exists('Staging/Q1.pq')).toBe(false);
      expect(index.has('Q1')).toBe(false);
    });

    it('refuses to delete a script others depend on', async () => {
      await expect(storage.delete('fn_A')).rejects.toThrow(NameReferencedError);
      expect(exists('Functions/fn_A.pq')).toBe(true);
    });

    it('deletes a referenced script when forced', async () => {
      await storage.delete('fn_A', { force: true });

      expect(index.has('fn_A')).toBe(false);
      expect(index.get('Q1')?.dependencies).toEqual(['fn_A']);
    });

    it('removes the index entry of a file already deleted on disk', async () => {
      await rm(join(testDir, 'Staging/Q1.pq'));

      const entry = await storage.delete('Q1');

      expect(entry.path).toBe('Staging/Q1.pq');
      expect(index.has('Q1')).toBe(false);
    });

    it('restores the file when the index write fails', async () => {
      const before = await read('Staging/Q1.pq');
      repo.failIndexWrites = true;

      await expect(storage.delete('Q1')).rejects.toThrow(FileSystemError);

      expect(await read('Staging/Q1.pq')).toBe(before);
      expect(index.has('Q1')).toBe(true);
    });
  });

  describe('scan', () => {
    beforeEach(async () => {
      await storage.create({ metadata: { name: 'Foo', category: 'Staging' }, body: BODY });
      await writeFile(join(testDir, 'Staging/Broken.pq'), 'no header here');
      await writeFile(join(testDir, 'Staging/.Foo.pq.1234.tmp'), '---\nname: Ghost\n---\n');
      await writeFile(join(testDir, 'Staging/notes.txt'), 'not a script');
    });

    it('returns parsed records and reports malformed files', async () => {
      const result = await storage.scan();

      expect(result.records.map((r) => r.path)).toEqual(['Staging/Foo.pq']);
      expect(result.malformed).toHaveLength(1);
      expect(result.malformed[0]?.path).toBe('Staging/Broken.pq');
      expect(result.malformed[0]?.reason).toBe('missing metadata header (expected a leading "---" line)');
    });

    it('stops when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(storage.scan({ signal: controller.signal })).rejects.toThrow(OperationCancelledError);
    });
  });
});
