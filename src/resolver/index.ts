/**
 * Dependency resolution and script analysis.
 */

export * from './DependencyResolver.js';
export * from './ScriptAnalyzer.js';
