/**
 * Typed failures raised by the repository core.
 *
 * Every error carries a stable `code` (used by the HTTP and MCP layers),
 * an HTTP-style `statusCode`, and structured `details`.
 */

export type ScriptErrorCode =
  | 'MALFORMED_METADATA'
  | 'DUPLICATE_NAME'
  | 'CYCLE_DETECTED'
  | 'UNRESOLVED_DEPENDENCY'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'NAME_REFERENCED'
  | 'INVALID_NAME'
  | 'FILESYSTEM_ERROR'
  | 'LOCK_TIMEOUT'
  | 'OPERATION_CANCELLED';

export class ScriptRepositoryError extends Error {
  readonly code: ScriptErrorCode;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(
    code: ScriptErrorCode,
    message: string,
    statusCode: number,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'ScriptRepositoryError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class MalformedMetadataError extends ScriptRepositoryError {
  readonly reason: string;
  readonly path: string | undefined;

  constructor(reason: string, path?: string) {
    super(
      'MALFORMED_METADATA',
      path !== undefined ? `Malformed metadata in ${path}: ${reason}` : `Malformed metadata: ${reason}`,
      422,
      path !== undefined ? { reason, path } : { reason },
    );
    this.name = 'MalformedMetadataError';
    this.reason = reason;
    this.path = path;
  }

  /** Same failure, attributed to a file. */
  withPath(path: string): MalformedMetadataError {
    return new MalformedMetadataError(this.reason, path);
  }
}

export class DuplicateNameError extends ScriptRepositoryError {
  readonly duplicateName: string;
  readonly paths: string[];

  constructor(name: string, paths: string[]) {
    super('DUPLICATE_NAME', `Duplicate script name "${name}": ${paths.join(', ')}`, 409, { name, paths });
    this.name = 'DuplicateNameError';
    this.duplicateName = name;
    this.paths = paths;
  }
}

export class CycleDetectedError extends ScriptRepositoryError {
  readonly cycleNodes: string[];

  constructor(cycleNodes: string[]) {
    super('CYCLE_DETECTED', `Circular dependency detected: ${[...cycleNodes, cycleNodes[0]].join(' -> ')}`, 422, {
      cycleNodes,
    });
    this.name = 'CycleDetectedError';
    this.cycleNodes = cycleNodes;
  }
}

export class UnresolvedDependencyError extends ScriptRepositoryError {
  readonly missingName: string;
  readonly missingFrom: string[];

  constructor(name: string, missingFrom: string[]) {
    super(
      'UNRESOLVED_DEPENDENCY',
      missingFrom.length > 0
        ? `Missing dependency "${name}" required by ${missingFrom.join(', ')}`
        : `Script not found: ${name}`,
      422,
      { name, missingFrom },
    );
    this.name = 'UnresolvedDependencyError';
    this.missingName = name;
    this.missingFrom = missingFrom;
  }
}

export class AlreadyExistsError extends ScriptRepositoryError {
  readonly path: string;

  constructor(path: string, message = `Already exists: ${path}`) {
    super('ALREADY_EXISTS', message, 409, { path });
    this.name = 'AlreadyExistsError';
    this.path = path;
  }
}

export class NotFoundError extends ScriptRepositoryError {
  constructor(name: string) {
    super('NOT_FOUND', `Script not found: ${name}`, 404, { name });
    this.name = 'NotFoundError';
  }
}

export class NameReferencedError extends ScriptRepositoryError {
  readonly dependents: string[];

  constructor(name: string, dependents: string[]) {
    super('NAME_REFERENCED', `Script "${name}" is required by ${dependents.join(', ')}`, 409, { name, dependents });
    this.name = 'NameReferencedError';
    this.dependents = dependents;
  }
}

export class InvalidNameError extends ScriptRepositoryError {
  constructor(field: 'name' | 'category', value: string) {
    super('INVALID_NAME', `Invalid ${field}: "${value}"`, 400, { field, value });
    this.name = 'InvalidNameError';
  }
}

export class FileSystemError extends ScriptRepositoryError {
  readonly path: string;

  constructor(operation: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('FILESYSTEM_ERROR', `Failed to ${operation} ${path}: ${reason}`, 500, { operation, path, reason });
    this.name = 'FileSystemError';
    this.path = path;
    this.cause = cause;
  }
}

export class LockTimeoutError extends ScriptRepositoryError {
  constructor(mode: 'read' | 'write', timeoutMs: number) {
    super('LOCK_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${mode} access to the repository`, 423, {
      mode,
      timeoutMs,
    });
    this.name = 'LockTimeoutError';
  }
}

export class OperationCancelledError extends ScriptRepositoryError {
  constructor(operation: string) {
    super('OPERATION_CANCELLED', `Operation cancelled: ${operation}`, 499, { operation });
    this.name = 'OperationCancelledError';
  }
}

/**
 * Throw OperationCancelledError if the signal has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

/**
 * Narrow an unknown thrown value to a Node.js errno error.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
