/**
 * Types for Repository Adapter.
 *
 * The Repository Adapter provides text in/out over the script repository.
 * It has NO domain semantics - just file operations on repository-relative
 * paths with `/` separators.
 */

/**
 * File content from the repository.
 */
export interface RepoFile {
  /** File path relative to repo root */
  path: string;
  /** File content as string */
  content: string;
  /** File size in bytes */
  size: number;
}

/**
 * Options for listing files.
 */
export interface ListFilesOptions {
  /** Directory to list (relative to repo root, '' for the root) */
  directory: string;
  /** File pattern to match (glob-like, e.g., "*.pq") */
  pattern?: string;
  /** Whether to list recursively */
  recursive?: boolean;
}

/**
 * Options for writing a file.
 */
export interface WriteFileOptions {
  /** File path relative to repo root */
  path: string;
  /** File content */
  content: string;
  /** Fail with AlreadyExistsError instead of replacing an existing file */
  exclusive?: boolean;
}

/**
 * Options for moving a file.
 */
export interface MoveFileOptions {
  /** Current path relative to repo root */
  from: string;
  /** Target path relative to repo root; must not exist */
  to: string;
}

/**
 * Repository Adapter interface.
 *
 * Failures are thrown: AlreadyExistsError for an occupied target, FileSystemError
 * for everything the OS reports. Every write is atomic (temp file + rename), so
 * a failed write leaves the previous content in place.
 */
export interface RepoAdapter {
  /** Absolute root directory of the repository */
  readonly root: string;

  /**
   * Get a file from the repository.
   *
   * @returns RepoFile or null if not found
   */
  getFile(path: string): Promise<RepoFile | null>;

  fileExists(path: string): Promise<boolean>;

  /**
   * List files in a directory.
   *
   * @returns Repository-relative paths, sorted
   */
  listFiles(options: ListFilesOptions): Promise<string[]>;

  /**
   * Write a file atomically, creating parent directories as needed.
   */
  writeFile(options: WriteFileOptions): Promise<void>;

  /**
   * Move a file, creating the target directory as needed.
   */
  moveFile(options: MoveFileOptions): Promise<void>;

  /**
   * Delete a file. Deleting a missing file is a FileSystemError.
   */
  deleteFile(path: string): Promise<void>;

  /**
   * Initialize the adapter (ensures the root directory exists).
   */
  initialize?(): Promise<void>;
}

/**
 * Configuration for Local Repository Adapter.
 */
export interface LocalRepoConfig {
  /** Base directory for the repository */
  basePath: string;
}
