/**
 * Script file storage.
 */

export * from './types.js';
export * from './MetadataCodec.js';
export * from './StorageManager.js';
