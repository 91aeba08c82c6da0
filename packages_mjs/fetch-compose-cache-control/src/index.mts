/**
 * @httpcache/fetch-compose-cache-control
 * HTTP response caching for undici
 *
 * - CacheControlClient: request-style client over a pluggable transport
 * - cacheControlInterceptor: the same caching for undici's compose pattern
 *
 * Pure ESM module
 */

// Re-export the cache core
export type {
  RawHeaders,
  RequestDescriptor,
  ResponseHead,
  CachedResponse,
  CacheControlConfig,
  CacheStore,
  CacheEvent,
  CacheState,
  Transport,
  TransportRequest,
  TransportResponse,
} from '@httpcache/cache-control';

export {
  CacheController,
  MemoryCacheStore,
  FileCacheStore,
  SeparateBodyFileCacheStore,
  ExpiresAfter,
  LastModifiedHeuristic,
  collectBody,
} from '@httpcache/cache-control';

// Header conversions
export {
  extractHeaders,
  mergeHeaders,
  parseRawHeaders,
  toBufferHeaders,
  toRawHeaders,
} from './headers.mjs';

// Transport and client
export { createUndiciTransport } from './transport.mjs';
export * from './client.mjs';

// Interceptor exports
export * from './interceptor.mjs';
export { cacheControlInterceptor as default } from './interceptor.mjs';

// Factory exports
export * from './factory.mjs';
