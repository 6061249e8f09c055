/**
 * Type exports for script-shelf.
 */

export * from './ScriptRecord.js';
export * from './errors.js';
