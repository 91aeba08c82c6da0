/**
 * @httpcache/cache-control
 *
 * HTTP response caching decisions in the manner of RFC 7234:
 * - Freshness from Cache-Control max-age, Expires and request directives
 * - ETag and Last-Modified conditional revalidation with 304 merging
 * - Vary-aware cache keys
 * - Invalidation after successful unsafe requests
 * - Streaming body capture that stores only fully read bodies
 * - Pluggable storage: in-memory LRU, filesystem, filesystem with separate bodies
 *
 * @example Basic usage
 * ```typescript
 * import { CacheController, CaptureReadable, MemoryCacheStore } from '@httpcache/cache-control';
 *
 * const controller = new CacheController(new MemoryCacheStore());
 * const request = { method: 'GET', url: 'https://api.example.com/widgets/1' };
 *
 * const cached = await controller.cachedRequest(request);
 * if (cached) {
 *   return cached;
 * }
 *
 * const conditional = await controller.conditionalHeaders(request);
 * const response = await transport.send({ ...request, headers: conditional });
 *
 * if (response.statusCode === 304) {
 *   return (await controller.updateCachedResponse(request, response)).response;
 * }
 *
 * const body = new CaptureReadable(response.body, (bytes) =>
 *   controller.cacheResponse(request, response, bytes)
 * );
 * ```
 */

// Types
export type {
  RawHeaders,
  CacheControlDirectives,
  RequestDescriptor,
  ResponseHead,
  CacheEntry,
  StoredRecord,
  CachedResponse,
  RevalidationResult,
  CacheState,
  CacheEvent,
  CacheEventListener,
  UnifiedCacheStore,
  SeparateBodyCacheStore,
  CacheStore,
  CacheSerializer,
  CacheKeyDeriver,
  CacheHeuristic,
  CacheControlConfig,
  TransportRequest,
  TransportResponse,
  Transport,
} from './types.mjs';

// Parser utilities
export {
  parseCacheControl,
  getHeader,
  setHeader,
  getHeaderValue,
  normalizeHeaders,
  extractETag,
  extractLastModified,
  parseDateHeader,
  parseVary,
  isVaryUncacheable,
  extractVaryHeaders,
  freshnessLifetime,
  currentAge,
  isMethodIn,
} from './parser.mjs';

// Keys
export { deriveCacheKey, normalizeUrl } from './key.mjs';

// Serialization
export { JsonCacheSerializer, createJsonCacheSerializer } from './serializer.mjs';

// Heuristics
export {
  BaseHeuristic,
  ExpiresAfter,
  LastModifiedHeuristic,
  type ExpiresAfterOptions,
} from './heuristics.mjs';

// Body capture
export {
  BodyCapture,
  CaptureReadable,
  collectBody,
  bufferToStream,
  type CaptureOutcome,
  type CommitCallback,
  type BodyCaptureOptions,
} from './capture.mjs';

// Configuration
export {
  DEFAULT_CACHE_CONTROL_CONFIG,
  INVALIDATING_METHODS,
  PERMANENT_REDIRECT_STATUSES,
  mergeCacheControlConfig,
} from './config.mjs';

// Controller
export { CacheController, createCacheController } from './controller.mjs';

// Errors and logging
export { CacheDecodeError, CacheStorageError, isErrnoException, toError } from './errors.mjs';
export { logger, componentLogger } from './logger.mjs';

// Stores
export {
  MemoryCacheStore,
  createMemoryCacheStore,
  FileCacheStore,
  SeparateBodyFileCacheStore,
  createFileCacheStore,
  createSeparateBodyFileCacheStore,
  urlToFilePath,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
  type FileCacheStoreOptions,
} from './stores/index.mjs';
