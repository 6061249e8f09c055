/**
 * Index module exports.
 */

export * from './types.js';
export * from './IndexStore.js';
