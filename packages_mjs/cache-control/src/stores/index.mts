/**
 * Cache store implementations
 */

export {
  MemoryCacheStore,
  createMemoryCacheStore,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
} from './memory.mjs';

export {
  FileCacheStore,
  SeparateBodyFileCacheStore,
  createFileCacheStore,
  createSeparateBodyFileCacheStore,
  urlToFilePath,
  type FileCacheStoreOptions,
} from './file.mjs';
