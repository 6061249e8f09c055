/**
 * JsonBundleAdapter - DocumentAdapter over a JSON query bundle on disk.
 *
 * Bundle format:
 *
 * ```json
 * { "queries": [{ "name": "Q1", "formula": "let ... in ...", "description": "" }] }
 * ```
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { FileSystemError, isErrnoException, MalformedMetadataError } from '../types/errors.js';
import { nameKey } from '../types/ScriptRecord.js';
import type { DocumentAdapter, DocumentScript, DocumentWriteResult } from './DocumentAdapter.js';

const BundleQuerySchema = z.object({
  name: z.string(),
  formula: z.string(),
  description: z.string().optional().default(''),
});

const BundleSchema = z.object({
  queries: z.array(BundleQuerySchema),
});

type BundleQuery = z.infer<typeof BundleQuerySchema>;

export class JsonBundleAdapter implements DocumentAdapter {
  /**
   * Read the bundle's queries. A missing bundle has none.
   *
   * @throws MalformedMetadataError when the bundle is not a valid bundle
   */
  async readScripts(documentRef: string): Promise<DocumentScript[]> {
    const queries = await this.load(documentRef);
    return queries.map((q) => ({ name: q.name, body: q.formula, description: q.description }));
  }

  async writeScripts(documentRef: string, scripts: readonly DocumentScript[]): Promise<DocumentWriteResult[]> {
    const queries = await this.load(documentRef);
    const results: DocumentWriteResult[] = [];

    for (const script of scripts) {
      const name = script.name.trim();
      if (!name) {
        results.push({ name: script.name, ok: false, error: 'name is required' });
        continue;
      }

      const query: BundleQuery = { name, formula: script.body, description: script.description };
      const at = queries.findIndex((q) => nameKey(q.name) === nameKey(name));
      if (at >= 0) {
        queries.splice(at, 1);
      }
      queries.push(query);
      results.push({ name, ok: true });
    }

    await this.save(documentRef, queries);
    return results;
  }

  private async load(documentRef: string): Promise<BundleQuery[]> {
    let raw: string;
    try {
      raw = await readFile(documentRef, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return [];
      }
      throw new FileSystemError('read', documentRef, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new MalformedMetadataError('bundle is not valid JSON', documentRef);
    }

    const parsed = BundleSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MalformedMetadataError(
        `bundle ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'is invalid'}`,
        documentRef
      );
    }
    return parsed.data.queries;
  }

  private async save(documentRef: string, queries: readonly BundleQuery[]): Promise<void> {
    const tempPath = join(dirname(documentRef), `.${basename(documentRef)}.${randomUUID()}.tmp`);
    try {
      await mkdir(dirname(documentRef), { recursive: true });
      await writeFile(tempPath, JSON.stringify({ queries }, null, 2) + '\n', 'utf-8');
      await rename(tempPath, documentRef);
    } catch (err) {
      await unlink(tempPath).catch((cleanupErr: unknown) => {
        if (!(isErrnoException(cleanupErr) && cleanupErr.code === 'ENOENT')) {
          console.warn(`[JsonBundleAdapter] Could not remove temp file ${tempPath}:`, cleanupErr);
        }
      });
      throw new FileSystemError('write', documentRef, err);
    }
  }
}
