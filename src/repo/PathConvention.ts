/**
 * PathConvention - File path conventions for scripts.
 *
 * Convention:
 * - One folder per category directly under the repository root
 * - Filename: `{name}{extension}`
 * - Example: `Staging/Monthly Sales.pq`
 */

import { DEFAULT_CATEGORY } from '../types/ScriptRecord.js';
import { InvalidNameError } from '../types/errors.js';

/**
 * Default script file extension.
 */
export const DEFAULT_EXTENSION = '.pq';

/**
 * Options for generating a path.
 */
export interface PathGenerationOptions {
  name: string;
  category: string;
  /** File extension (default: '.pq') */
  extension?: string;
}

/**
 * Reduce text to characters that are safe in a folder or file name on every
 * platform: letters, digits, spaces, underscores and dashes.
 *
 * @returns Sanitized segment, possibly empty
 */
export function sanitizeSegment(text: string): string {
  return text
    .replace(/[^\p{L}\p{N} _-]/gu, '') // Remove unsafe chars
    .replace(/\s+/g, ' ')               // Collapse whitespace
    .trim();
}

/**
 * Generate the canonical file path for a script.
 *
 * @returns Generated path (e.g., "Staging/Monthly Sales.pq")
 * @throws InvalidNameError when the name or category sanitizes to nothing
 */
export function generateScriptPath(options: PathGenerationOptions): string {
  const { name, category, extension = DEFAULT_EXTENSION } = options;

  const safeName = sanitizeSegment(name);
  if (safeName.length === 0) {
    throw new InvalidNameError('name', name);
  }

  const safeCategory = category.trim().length === 0 ? DEFAULT_CATEGORY : sanitizeSegment(category);
  if (safeCategory.length === 0) {
    throw new InvalidNameError('category', category);
  }

  return `${safeCategory}/${safeName}${extension}`;
}

/**
 * Glob pattern for listing script files.
 */
export function scriptPattern(extension: string = DEFAULT_EXTENSION): string {
  return `*${extension}`;
}
