/**
 * MetadataCodec - Convert between script file text and ScriptMetadata + body.
 *
 * File layout:
 *
 *   ---
 *   name: Q1
 *   category: Staging
 *   tags: []
 *   dependencies:
 *     - fn_A
 *   description: ""
 *   version: "1.0"
 *   ---
 *
 *   let Source = fn_A() in Source
 *
 * The header is read with the YAML failsafe schema so every scalar stays
 * text: `version: 1.0` is the string "1.0", never the number 1.
 */

import yaml from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_CATEGORY,
  DEFAULT_VERSION,
  type MetadataInput,
  type ScriptMetadata,
  type ScriptRecord,
} from '../types/ScriptRecord.js';
import { MalformedMetadataError } from '../types/errors.js';

/**
 * Result of parsing a script file.
 */
export type ParseResult =
  | { ok: true; metadata: ScriptMetadata; body: string }
  | { ok: false; error: MalformedMetadataError };

/**
 * Result of parsing a script file with its path attached.
 */
export type ParseFileResult =
  | { ok: true; record: ScriptRecord }
  | { ok: false; error: MalformedMetadataError };

const OPENING_DELIMITER = /^\uFEFF?(?:[ \t]*\r?\n)*---[ \t]*\r?\n/;
const CLOSING_DELIMITER = /^---[ \t]*\r?$/m;

const scalar = (field: string) =>
  z.string({
    invalid_type_error: `${field} must be a scalar value`,
  });

const list = (field: string) =>
  z.array(z.string({ invalid_type_error: `${field} entries must be scalar values` }), {
    invalid_type_error: `${field} must be a list`,
  });

/**
 * Structural schema for a failsafe-parsed header. Unknown keys are dropped;
 * empty values count as absent.
 */
const HeaderSchema = z.object({
  name: z.string({
    required_error: 'name is required',
    invalid_type_error: 'name must be a scalar value',
  }),
  category: scalar('category').nullish(),
  tags: list('tags').nullish(),
  dependencies: list('dependencies').nullish(),
  description: scalar('description').nullish(),
  version: scalar('version').nullish(),
});

/**
 * Collapse line breaks and trim. Header scalars are single-line.
 */
function cleanText(value: string): string {
  return value.replace(/\r/g, ' ').replace(/\n/g, ' ').trim();
}

/**
 * Trim entries, drop empty ones and drop repeats (first occurrence wins).
 */
function cleanList(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of values) {
    const value = cleanText(raw);
    if (value.length === 0 || seen.has(value)) continue;
    seen.add(value);
    result.push(value);
  }
  return result;
}

/**
 * Apply defaults and cleanup to metadata from any source (file header,
 * GUI form, API request).
 *
 * @throws MalformedMetadataError when the name is empty after cleanup
 */
export function normalizeMetadata(input: MetadataInput): ScriptMetadata {
  const name = cleanText(input.name);
  if (name.length === 0) {
    throw new MalformedMetadataError('name must not be empty');
  }

  const category = cleanText(input.category ?? '');

  return {
    name,
    category: category.length > 0 ? category : DEFAULT_CATEGORY,
    tags: cleanList(input.tags ?? []),
    dependencies: cleanList(input.dependencies ?? []),
    description: cleanText(input.description ?? ''),
    version: cleanText(input.version ?? '') || DEFAULT_VERSION,
  };
}

/**
 * Split raw text into header source and body.
 */
function splitHeader(rawText: string): { header: string; body: string } | { error: string } {
  const opening = OPENING_DELIMITER.exec(rawText);
  if (!opening) {
    return { error: 'missing metadata header (expected a leading "---" line)' };
  }

  const rest = rawText.slice(opening[0].length);
  const closing = CLOSING_DELIMITER.exec(rest);
  if (!closing) {
    return { error: 'unterminated metadata header (missing closing "---" line)' };
  }

  const header = rest.slice(0, closing.index);
  let body = rest.slice(closing.index + closing[0].length);

  // End of the closing line, then the one blank separator line.
  if (body.startsWith('\n')) body = body.slice(1);
  if (body.startsWith('\r\n')) body = body.slice(2);
  else if (body.startsWith('\n')) body = body.slice(1);

  return { header, body };
}

/**
 * Parse script file text into metadata and body.
 */
export function parseScript(rawText: string): ParseResult {
  const split = splitHeader(rawText);
  if ('error' in split) {
    return { ok: false, error: new MalformedMetadataError(split.error) };
  }

  const doc = yaml.parseDocument(split.header, { schema: 'failsafe' });
  if (doc.errors.length > 0) {
    const messages = doc.errors.map((e) => e.message).join('; ');
    return { ok: false, error: new MalformedMetadataError(`invalid YAML: ${messages}`) };
  }

  const data: unknown = doc.toJS();
  if (data === null || data === undefined || typeof data !== 'object' || Array.isArray(data)) {
    return { ok: false, error: new MalformedMetadataError('header must be a YAML mapping') };
  }

  const parsed = HeaderSchema.safeParse(data);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => issue.message).join('; ');
    return { ok: false, error: new MalformedMetadataError(messages) };
  }

  const header = parsed.data;
  try {
    const metadata = normalizeMetadata({
      name: header.name,
      ...(header.category != null ? { category: header.category } : {}),
      ...(header.tags != null ? { tags: header.tags } : {}),
      ...(header.dependencies != null ? { dependencies: header.dependencies } : {}),
      ...(header.description != null ? { description: header.description } : {}),
      ...(header.version != null ? { version: header.version } : {}),
    });
    return { ok: true, metadata, body: split.body };
  } catch (err) {
    if (err instanceof MalformedMetadataError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Parse a script file and attach its repository-relative path.
 */
export function parseScriptFile(rawText: string, path: string): ParseFileResult {
  const result = parseScript(rawText);
  if (!result.ok) {
    return { ok: false, error: result.error.withPath(path) };
  }
  return { ok: true, record: { metadata: result.metadata, body: result.body, path } };
}

/**
 * Serialize metadata and body back into script file text.
 *
 * Left inverse of parseScript for normalized metadata.
 */
export function serializeScript(metadata: ScriptMetadata, body: string): string {
  const ordered = {
    name: metadata.name,
    category: metadata.category,
    tags: metadata.tags,
    dependencies: metadata.dependencies,
    description: metadata.description,
    version: metadata.version,
  };

  // lineWidth 0 keeps long descriptions on one line
  const header = yaml.stringify(ordered, { lineWidth: 0 });
  return `---\n${header}---\n\n${body}`;
}

