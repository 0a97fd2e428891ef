/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { MemoryRecord } from './memory-snapshot.js';
export {
  memorySnapshotSchema,
  serializeSnapshot,
  deserializeSnapshot,
} from './memory-snapshot.js';
