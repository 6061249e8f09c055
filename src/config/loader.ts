/**
 * Configuration loader for the script-shelf server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - Overrides from CONFIG_PATH, SCRIPT_ROOT, PORT and HOST
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  AnalysisConfig,
  AppConfig,
  CorsConfig,
  LockConfig,
  LogLevel,
  RepositorySettings,
  ServerConfig,
} from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: env CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Environment used for substitution and overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Config as read from the file: every section and field optional.
 */
export interface PartialConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  repository?: Partial<RepositorySettings>;
  lock?: Partial<LockConfig>;
  analysis?: Partial<AnalysisConfig>;
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_VAR_PATTERN, (_match: string, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ============================================================================
// Field readers
// ============================================================================

function readSection(parent: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = parent[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', key, value);
  }
  return value;
}

function readString(section: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigValidationError(`${key} must be a string`, `${path}.${key}`, value);
  }
  return value;
}

/**
 * Numbers may arrive as strings after env substitution (`${PORT:-3001}`).
 */
function readNumber(
  section: Record<string, unknown>,
  key: string,
  path: string,
  range: { min: number; max: number }
): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < range.min || n > range.max) {
    throw new ConfigValidationError(
      `${key} must be a number between ${range.min} and ${range.max}`,
      `${path}.${key}`,
      value
    );
  }
  return n;
}

function readBoolean(section: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (value === true || value === 'true') return true;
  if (value === false || value === 'false') return false;
  throw new ConfigValidationError(`${key} must be true or false`, `${path}.${key}`, value);
}

function readStringList(section: Record<string, unknown>, key: string, path: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigValidationError(`${key} must be a list`, `${path}.${key}`, value);
  }
  const items: string[] = [];
  for (const [i, item] of value.entries()) {
    if (typeof item !== 'string') {
      throw new ConfigValidationError(`${key} entries must be strings`, `${path}.${key}[${i}]`, item);
    }
    items.push(item);
  }
  return items;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate server configuration.
 */
function validateServerConfig(section: Record<string, unknown>, path = 'server'): NonNullable<PartialConfig['server']> {
  const logLevel = section.logLevel;
  if (logLevel !== undefined && logLevel !== null && !isLogLevel(logLevel)) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', `${path}.logLevel`, logLevel);
  }

  const corsSection = readSection(section, 'cors');
  const port = readNumber(section, 'port', path, { min: 1, max: 65535 });
  const host = readString(section, 'host', path);

  return {
    ...(port !== undefined ? { port } : {}),
    ...(host !== undefined ? { host } : {}),
    ...(isLogLevel(logLevel) ? { logLevel } : {}),
    ...(corsSection ? { cors: validateCorsConfig(corsSection, `${path}.cors`) } : {}),
  };
}

/**
 * Validate CORS configuration.
 */
function validateCorsConfig(section: Record<string, unknown>, path: string): Partial<CorsConfig> {
  const enabled = readBoolean(section, 'enabled', path);
  const origins = readStringList(section, 'origins', path);
  return {
    ...(enabled !== undefined ? { enabled } : {}),
    ...(origins !== undefined ? { origins } : {}),
  };
}

/**
 * Validate repository configuration.
 */
function validateRepositorySettings(section: Record<string, unknown>, path = 'repository'): Partial<RepositorySettings> {
  const root = readString(section, 'root', path);
  if (root !== undefined && root.trim() === '') {
    throw new ConfigValidationError('root must not be empty', `${path}.root`, root);
  }

  const extension = readString(section, 'extension', path);
  if (extension !== undefined && !/^\.[A-Za-z0-9]+$/.test(extension)) {
    throw new ConfigValidationError('extension must be a dot followed by letters or digits', `${path}.extension`, extension);
  }

  const indexPath = readString(section, 'indexPath', path);
  if (indexPath !== undefined && (indexPath.trim() === '' || indexPath.startsWith('/') || indexPath.includes('..'))) {
    throw new ConfigValidationError('indexPath must be a relative path inside the root', `${path}.indexPath`, indexPath);
  }

  return {
    ...(root !== undefined ? { root } : {}),
    ...(extension !== undefined ? { extension } : {}),
    ...(indexPath !== undefined ? { indexPath } : {}),
  };
}

/**
 * Validate lock configuration.
 */
function validateLockConfig(section: Record<string, unknown>, path = 'lock'): Partial<LockConfig> {
  const timeoutMs = readNumber(section, 'timeoutMs', path, { min: 0, max: 600_000 });
  const crossProcess = readBoolean(section, 'crossProcess', path);
  const staleMs = readNumber(section, 'staleMs', path, { min: 5_000, max: 3_600_000 });
  return {
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(crossProcess !== undefined ? { crossProcess } : {}),
    ...(staleMs !== undefined ? { staleMs } : {}),
  };
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): PartialConfig {
  if (config === undefined || config === null) {
    return {};
  }
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  const result: PartialConfig = {};

  const server = readSection(config, 'server');
  if (server) result.server = validateServerConfig(server);

  const repository = readSection(config, 'repository');
  if (repository) result.repository = validateRepositorySettings(repository);

  const lock = readSection(config, 'lock');
  if (lock) result.lock = validateLockConfig(lock);

  const analysis = readSection(config, 'analysis');
  if (analysis) {
    const dataSourceFunctions = readStringList(analysis, 'dataSourceFunctions', 'analysis');
    result.analysis = dataSourceFunctions !== undefined ? { dataSourceFunctions } : {};
  }

  return result;
}

/**
 * Merge a partial config over the defaults, section by section.
 */
export function mergeConfig(partial: PartialConfig, defaults: AppConfig = DEFAULT_CONFIG): AppConfig {
  return {
    server: {
      ...defaults.server,
      ...partial.server,
      cors: { ...defaults.server.cors, ...partial.server?.cors },
    },
    repository: { ...defaults.repository, ...partial.repository },
    lock: { ...defaults.lock, ...partial.lock },
    analysis: { ...defaults.analysis, ...partial.analysis },
  };
}

/**
 * Apply SCRIPT_ROOT, PORT and HOST.
 */
function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const overrides = validateConfig({
    server: { port: env.PORT || undefined, host: env.HOST || undefined },
    repository: { root: env.SCRIPT_ROOT || undefined },
  });
  return mergeConfig(overrides, config);
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ?? env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyEnvOverrides(mergeConfig({}), env);
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const substituted = substituteEnvVarsRecursive(parsed, env);
  const config = mergeConfig(validateConfig(substituted));

  return applyEnvOverrides(config, env);
}
