/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * Handlers stay thin: the manager owns every rule.
 */

import type { IndexStatus } from '../index/types.js';
import type { BuildReport, RefreshIndexReport, ResolvedScripts } from '../manager/ScriptManager.js';
import type { DependencyTreeNode, UnresolvedReport } from '../resolver/DependencyResolver.js';
import type { ScriptAnalysis } from '../resolver/ScriptAnalyzer.js';
import type { IndexEntry, ScriptRecord } from '../types/ScriptRecord.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error code (NOT_FOUND, ALREADY_EXISTS, BAD_REQUEST, ...) */
  error: string;
  /** Human-readable message */
  message: string;
  /** Structured details */
  details: Record<string, unknown>;
}

// ============================================================================
// Script Endpoints
// ============================================================================

/**
 * Request to create a script.
 */
export interface CreateScriptRequest {
  name: string;
  category?: string;
  tags?: string[];
  dependencies?: string[];
  description?: string;
  version?: string;
  /** Script body (default: empty) */
  body?: string;
}

/**
 * Request to edit a script's metadata. A new category moves the file; a
 * new name renames it.
 */
export interface UpdateMetadataRequest {
  name?: string;
  category?: string;
  tags?: string[];
  dependencies?: string[];
  description?: string;
  version?: string;
}

export interface UpdateBodyRequest {
  body: string;
}

/**
 * Request to resolve scripts into insertion order.
 */
export interface ResolveRequest {
  names: string[];
  /** Leave out missing dependencies instead of failing */
  partial?: boolean;
}

export interface ScriptParams {
  name: string;
}

export interface ListScriptsQuery {
  /** Substring matched against name, tags and description */
  q?: string;
}

export interface DependenciesQuery {
  partial?: string;
}

export interface DeleteQuery {
  force?: string;
}

export interface ListScriptsResponse {
  scripts: IndexEntry[];
  total: number;
}

export interface ScriptResponse {
  script: ScriptRecord;
}

export interface EntryResponse {
  entry: IndexEntry;
}

export interface DependenciesResponse {
  script: ScriptRecord;
  order: string[];
  unresolved: UnresolvedReport[];
}

export interface TreeResponse {
  tree: DependencyTreeNode;
}

export interface AnalysisResponse {
  analysis: ScriptAnalysis;
}

export interface CategoriesResponse {
  categories: string[];
}

export type ResolveResponse = ResolvedScripts;
export type BuildIndexResponse = BuildReport;
export type RefreshIndexResponse = RefreshIndexReport;

// ============================================================================
// Health
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  index: {
    status: IndexStatus;
    scripts: number;
  };
}
