/**
 * ScriptRecord - In-memory representation of one managed script file.
 *
 * A script file is a YAML header block followed by the script body.
 * The header is described by ScriptMetadata; the index keeps only the
 * metadata projection (IndexEntry), never the body.
 */

/**
 * Default category for scripts that do not declare one.
 */
export const DEFAULT_CATEGORY = 'Uncategorized';

/**
 * Default version token for scripts that do not declare one.
 */
export const DEFAULT_VERSION = '1.0';

/**
 * Structured metadata stored in a script's header block.
 */
export interface ScriptMetadata {
  /** Unique script name (compared case-insensitively) */
  name: string;
  /** Category; determines the storage folder */
  category: string;
  /** Ordered tags */
  tags: string[];
  /** Names of scripts that must be present before this one */
  dependencies: string[];
  /** Free-text description */
  description: string;
  /** Opaque version token, kept as text */
  version: string;
}

/**
 * A parsed script file.
 */
export interface ScriptRecord {
  metadata: ScriptMetadata;
  /** Raw script text, excluding the header block */
  body: string;
  /** Repository-relative path with `/` separators */
  path: string;
}

/**
 * Metadata-only projection of a ScriptRecord, as persisted in the index.
 */
export interface IndexEntry {
  name: string;
  category: string;
  tags: string[];
  dependencies: string[];
  description: string;
  version: string;
  /** Repository-relative path with `/` separators */
  path: string;
}

/**
 * Partial metadata as collected from a GUI form or an API request.
 */
export type MetadataInput = Partial<ScriptMetadata> & { name: string };

/**
 * Editable metadata fields. `name` and `category` changes move the file.
 */
export type MetadataEdits = Partial<ScriptMetadata>;

/**
 * Key used for name lookups. Names are unique regardless of case.
 */
export function nameKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Case-insensitive name ordering with a case-sensitive tiebreak.
 */
export function compareNames(a: string, b: string): number {
  const ka = a.toLowerCase();
  const kb = b.toLowerCase();
  if (ka !== kb) return ka < kb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Project a record onto its index entry.
 */
export function toIndexEntry(record: ScriptRecord): IndexEntry {
  const { metadata } = record;
  return {
    name: metadata.name,
    category: metadata.category,
    tags: [...metadata.tags],
    dependencies: [...metadata.dependencies],
    description: metadata.description,
    version: metadata.version,
    path: record.path,
  };
}

/**
 * Structural equality of two index entries (field by field, lists in order).
 */
export function entriesEqual(a: IndexEntry, b: IndexEntry): boolean {
  return (
    a.name === b.name &&
    a.category === b.category &&
    a.description === b.description &&
    a.version === b.version &&
    a.path === b.path &&
    listsEqual(a.tags, b.tags) &&
    listsEqual(a.dependencies, b.dependencies)
  );
}

function listsEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
