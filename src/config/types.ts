/**
 * Configuration types for the script-shelf server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

import { DEFAULT_DATA_SOURCE_FUNCTIONS } from '../resolver/ScriptAnalyzer.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Top-level server configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  repository: RepositorySettings;
  lock: LockConfig;
  analysis: AnalysisConfig;
}

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Script repository location and layout.
 */
export interface RepositorySettings {
  /** Root directory of the script files (default: './scripts') */
  root: string;
  /** Script file extension, including the dot (default: '.pq') */
  extension: string;
  /** Index snapshot path relative to the root (default: 'index.jsonl') */
  indexPath: string;
}

/**
 * Repository lock settings.
 */
export interface LockConfig {
  /** Longest wait for the lock before LockTimeout (default: 10000) */
  timeoutMs: number;
  /** Also hold a lock file so other processes are excluded (default: false) */
  crossProcess: boolean;
  /** Age after which another process's lock file is considered stale (default: 30000) */
  staleMs: number;
}

/**
 * Script analysis settings.
 */
export interface AnalysisConfig {
  /** Functions reported as data sources */
  dataSourceFunctions: string[];
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  repository: {
    root: './scripts',
    extension: '.pq',
    indexPath: 'index.jsonl',
  },
  lock: {
    timeoutMs: 10_000,
    crossProcess: false,
    staleMs: 30_000,
  },
  analysis: {
    dataSourceFunctions: [...DEFAULT_DATA_SOURCE_FUNCTIONS],
  },
};
