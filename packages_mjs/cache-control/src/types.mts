/**
 * Types for RFC 7234 HTTP response caching
 */

import type { Readable } from 'node:stream';
import type { Logger } from 'pino';

/**
 * Ordered response header list. Names keep their original case and
 * repeated headers stay as separate pairs.
 */
export type RawHeaders = Array<[name: string, value: string]>;

/**
 * Parsed Cache-Control directives (request and response). Directives a
 * private client cache has no use for are dropped.
 */
export interface CacheControlDirectives {
  /** Response must not be cached */
  noStore?: boolean;
  /** Response must be revalidated before use */
  noCache?: boolean;
  /** Maximum age in seconds */
  maxAge?: number;
  /** Request accepts stale responses; Infinity when no limit was given */
  maxStale?: number;
  /** Request wants a response that stays fresh for at least this many seconds */
  minFresh?: number;
  /** Response must be revalidated if stale */
  mustRevalidate?: boolean;
}

/**
 * Request as seen by the cache
 */
export interface RequestDescriptor {
  method: string;
  /** Absolute URL */
  url: string;
  headers?: Record<string, string>;
}

/**
 * Status line and headers of a response
 */
export interface ResponseHead {
  statusCode: number;
  statusText?: string;
  headers: RawHeaders;
}

/**
 * A stored response
 */
export interface CacheEntry {
  statusCode: number;
  statusText: string;
  headers: RawHeaders;
  /** Null when the store keeps bodies apart from metadata */
  body: Buffer | null;
  /** When the entry was stored or last revalidated (Unix timestamp ms) */
  storedAt: number;
}

/**
 * What a cache key can point at: a response, or the list of request
 * headers that select between variants stored under derived keys.
 */
export type StoredRecord =
  | { kind: 'entry'; entry: CacheEntry }
  | { kind: 'vary'; headers: string[] };

/**
 * A response reconstructed from the cache
 */
export interface CachedResponse {
  statusCode: number;
  statusText: string;
  headers: RawHeaders;
  body: Readable;
  storedAt: number;
  fromCache: true;
}

/**
 * Outcome of merging a 304 into the stored entry
 */
export type RevalidationResult =
  | { updated: true; response: CachedResponse }
  | { updated: false; response: ResponseHead };

/**
 * Decision engine states. STORED means the record was handed to the
 * backend; a backend may still decline to keep it (see maxEntrySize on
 * MemoryCacheStore).
 */
export type CacheState =
  | 'MISS'
  | 'HIT_FRESH'
  | 'HIT_STALE_REVALIDATING'
  | 'STORED'
  | 'PASSTHROUGH'
  | 'INVALIDATED';

/**
 * Cache event
 */
export interface CacheEvent {
  type: CacheState;
  key: string;
  url: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

/**
 * Event listener type
 */
export type CacheEventListener = (event: CacheEvent) => void;

/**
 * Store keeping metadata and body in one value
 */
export interface UnifiedCacheStore {
  readonly kind: 'unified';
  get(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer): Promise<void>;
  delete(key: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Store addressing metadata and body separately under one key
 */
export interface SeparateBodyCacheStore {
  readonly kind: 'separate-body';
  getMetadata(key: string): Promise<Buffer | null>;
  setMetadata(key: string, value: Buffer): Promise<void>;
  getBody(key: string): Promise<Readable | null>;
  setBody(key: string, body: Buffer): Promise<void>;
  /** Removes metadata and body */
  delete(key: string): Promise<void>;
  close(): Promise<void>;
}

export type CacheStore = UnifiedCacheStore | SeparateBodyCacheStore;

/**
 * Encodes stored records to bytes and back. `decode` never throws.
 */
export interface CacheSerializer {
  encode(record: StoredRecord): Buffer;
  decode(bytes: Buffer): StoredRecord | null;
}

/**
 * Derives the cache key of a request
 */
export type CacheKeyDeriver = (
  method: string,
  url: string,
  varyValues?: Record<string, string>
) => string;

/**
 * Policy allowed to rewrite a network response's headers before the
 * storage decision, typically to add freshness the origin left out.
 */
export interface CacheHeuristic {
  apply(head: ResponseHead, now: number): ResponseHead;
}

/**
 * Configuration for the cache controller
 */
export interface CacheControlConfig {
  /** Methods whose responses are looked up and stored. Default: ['GET'] */
  cacheableMethods?: string[];
  /** Methods that invalidate the URL on success. Default: ['PUT', 'PATCH', 'DELETE'] */
  invalidatingMethods?: string[];
  /** Store ETag responses and send validators on revalidation. Default: true */
  cacheEtags?: boolean;
  /** Status codes that may be stored. Default: [200, 203, 300, 301, 308] */
  cacheableStatuses?: number[];
  /** Status codes stored regardless of directives. Default: [301, 308] */
  permanentRedirectStatuses?: number[];
  /** Freshness heuristic applied before storing. Default: null */
  heuristic?: CacheHeuristic | null;
  /** Record serializer. Default: JsonCacheSerializer */
  serializer?: CacheSerializer;
  /** Cache key derivation. Default: deriveCacheKey */
  keyDeriver?: CacheKeyDeriver;
  /** Clock in Unix ms. Default: Date.now */
  clock?: () => number;
  /** Logger. Default: the package logger */
  logger?: Logger;
}

/**
 * Request to a transport
 */
export interface TransportRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
}

/**
 * Response from a transport, body not yet read
 */
export interface TransportResponse extends ResponseHead {
  statusText: string;
  body: Readable;
  /** Transfer-Encoding: chunked. The capture then ignores contentLength. */
  chunked: boolean;
  /** Content-Length when the origin sent one */
  contentLength?: number;
  /** Drain whatever is left of the body and give the connection back */
  release(): Promise<void>;
}

/**
 * The network side of the cache: performs the actual request
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}
