/**
 * Manager module exports.
 */

export * from './DocumentAdapter.js';
export * from './JsonBundleAdapter.js';
export * from './ScriptManager.js';
