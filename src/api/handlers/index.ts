/**
 * Handler exports for the API layer.
 */

export * from './errors.js';
export * from './ScriptHandlers.js';
export * from './IndexHandlers.js';
