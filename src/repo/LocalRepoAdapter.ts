/**
 * LocalRepoAdapter - Local filesystem implementation of RepoAdapter.
 *
 * Writes go to a temp file in the target directory followed by a rename,
 * so readers see either the old or the new content, never a partial file.
 */

import { readFile, writeFile, mkdir, unlink, readdir, stat, rename, link } from 'node:fs/promises';
import { join, dirname, resolve, relative, isAbsolute, basename } from 'node:path';
import { randomUUID } from 'node:crypto';
import { AlreadyExistsError, FileSystemError, isErrnoException } from '../types/errors.js';
import type { RepoAdapter, RepoFile, ListFilesOptions, WriteFileOptions, MoveFileOptions, LocalRepoConfig } from './types.js';

/**
 * Suffix of in-flight temp files.
 */
export const TEMP_SUFFIX = '.tmp';

/**
 * Check if a filename matches a glob pattern.
 * Supports simple patterns: *.pq, *.jsonl, prefix*, exact names.
 */
function matchesPattern(filename: string, pattern: string): boolean {
  if (!pattern) return true;

  if (pattern.startsWith('*.')) {
    const ext = pattern.slice(1); // .pq
    return filename.toLowerCase().endsWith(ext.toLowerCase());
  }

  if (pattern.endsWith('*')) {
    const prefix = pattern.slice(0, -1);
    return filename.startsWith(prefix);
  }

  return filename === pattern;
}

/**
 * Local filesystem implementation of RepoAdapter.
 */
export class LocalRepoAdapter implements RepoAdapter {
  readonly root: string;

  constructor(config: LocalRepoConfig) {
    this.root = resolve(config.basePath);
  }

  /**
   * Initialize the adapter by ensuring the base directory exists.
   */
  async initialize(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
    } catch (err) {
      throw new FileSystemError('create directory', this.root, err);
    }
  }

  /**
   * Resolve a path relative to the base directory, refusing paths that
   * leave it.
   */
  private resolvePath(path: string): string {
    const fullPath = resolve(this.root, path);
    const rel = relative(this.root, fullPath);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new FileSystemError('resolve', path, new Error('path is outside the repository root'));
    }
    return fullPath;
  }

  /**
   * Get a file from the local filesystem.
   */
  async getFile(path: string): Promise<RepoFile | null> {
    const fullPath = this.resolvePath(path);

    try {
      const content = await readFile(fullPath, 'utf-8');
      const stats = await stat(fullPath);

      return {
        path,
        content,
        size: stats.size,
      };
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return null;
      }
      throw new FileSystemError('read', path, err);
    }
  }

  /**
   * Check if a file exists.
   */
  async fileExists(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path);

    try {
      await stat(fullPath);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return false;
      }
      throw new FileSystemError('stat', path, err);
    }
  }

  /**
   * List files in a directory.
   */
  async listFiles(options: ListFilesOptions): Promise<string[]> {
    const { directory, pattern, recursive = false } = options;
    const fullDir = this.resolvePath(directory);
    const results: string[] = [];

    try {
      await this.listFilesRecursive(fullDir, directory, pattern, recursive, results);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return [];
      }
      throw new FileSystemError('list', directory || '.', err);
    }

    return results.sort();
  }

  /**
   * Recursive helper for listing files.
   */
  private async listFilesRecursive(
    absDir: string,
    relDir: string,
    pattern: string | undefined,
    recursive: boolean,
    results: string[]
  ): Promise<void> {
    const entries = await readdir(absDir, { withFileTypes: true });

    for (const entry of entries) {
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (recursive) {
          await this.listFilesRecursive(join(absDir, entry.name), relPath, pattern, recursive, results);
        }
      } else if (entry.isFile()) {
        if (!pattern || matchesPattern(entry.name, pattern)) {
          results.push(relPath);
        }
      }
    }
  }

  /**
   * Write a file through a temp file in the same directory.
   */
  async writeFile(options: WriteFileOptions): Promise<void> {
    const { path, content, exclusive = false } = options;
    const fullPath = this.resolvePath(path);
    const tempPath = join(dirname(fullPath), `.${basename(fullPath)}.${randomUUID()}${TEMP_SUFFIX}`);

    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(tempPath, content, 'utf-8');
      if (exclusive) {
        // link() fails with EEXIST instead of replacing the target
        await link(tempPath, fullPath);
        await unlink(tempPath);
      } else {
        await rename(tempPath, fullPath);
      }
    } catch (err) {
      await unlink(tempPath).catch((cleanupErr: unknown) => {
        if (!(isErrnoException(cleanupErr) && cleanupErr.code === 'ENOENT')) {
          console.warn(`[LocalRepoAdapter] Could not remove temp file ${tempPath}:`, cleanupErr);
        }
      });
      if (isErrnoException(err) && err.code === 'EEXIST') {
        throw new AlreadyExistsError(path);
      }
      throw new FileSystemError('write', path, err);
    }
  }

  /**
   * Move a file. The target must not exist.
   */
  async moveFile(options: MoveFileOptions): Promise<void> {
    const { from, to } = options;
    const fromPath = this.resolvePath(from);
    const toPath = this.resolvePath(to);

    if (fromPath !== toPath && (await this.fileExists(to))) {
      // Case-only renames resolve to the same file on case-insensitive filesystems
      const same = from.toLowerCase() === to.toLowerCase();
      if (!same) {
        throw new AlreadyExistsError(to);
      }
    }

    try {
      await mkdir(dirname(toPath), { recursive: true });
      await rename(fromPath, toPath);
    } catch (err) {
      throw new FileSystemError('move', `${from} -> ${to}`, err);
    }
  }

  /**
   * Delete a file.
   */
  async deleteFile(path: string): Promise<void> {
    const fullPath = this.resolvePath(path);

    try {
      await unlink(fullPath);
    } catch (err) {
      throw new FileSystemError('delete', path, err);
    }
  }
}

/**
 * Create a new LocalRepoAdapter instance.
 */
export function createLocalRepoAdapter(config: LocalRepoConfig): LocalRepoAdapter {
  return new LocalRepoAdapter(config);
}
