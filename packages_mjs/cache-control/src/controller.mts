/**
 * Cache decision engine
 */

import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { bufferToStream } from './capture.mjs';
import { mergeCacheControlConfig } from './config.mjs';
import { componentLogger } from './logger.mjs';
import {
  currentAge,
  extractETag,
  extractLastModified,
  extractVaryHeaders,
  freshnessLifetime,
  getHeader,
  getHeaderValue,
  isMethodIn,
  isVaryUncacheable,
  parseCacheControl,
  parseDateHeader,
  parseVary,
} from './parser.mjs';
import type {
  CacheControlConfig,
  CacheControlDirectives,
  CachedResponse,
  CacheEntry,
  CacheEventListener,
  CacheState,
  CacheStore,
  RequestDescriptor,
  ResponseHead,
  RevalidationResult,
  StoredRecord,
} from './types.mjs';

/**
 * Headers a 304 must not overwrite in the stored entry
 */
const NOT_MODIFIED_EXCLUDED_HEADERS = new Set(['content-length']);

interface LocatedEntry {
  key: string;
  entry: CacheEntry;
}

/**
 * CacheController - decides what to serve from the store, what to
 * revalidate and what to store.
 *
 * @example
 * const controller = new CacheController(new MemoryCacheStore());
 *
 * const cached = await controller.cachedRequest(request);
 * if (cached) return cached;
 *
 * const headers = { ...request.headers, ...(await controller.conditionalHeaders(request)) };
 * const response = await transport.send({ ...request, headers });
 *
 * if (response.statusCode === 304) {
 *   const result = await controller.updateCachedResponse(request, response);
 * }
 */
export class CacheController {
  private readonly config: Required<CacheControlConfig>;
  private readonly logger: Logger;
  private readonly listeners: Set<CacheEventListener> = new Set();

  constructor(
    private readonly store: CacheStore,
    config?: CacheControlConfig
  ) {
    this.config = mergeCacheControlConfig(config);
    this.logger = componentLogger('cache-controller', this.config.logger);
  }

  /**
   * Cache key of a URL, for invalidation without a request object
   */
  cacheUrl(url: string, method: string = 'GET'): string {
    return this.config.keyDeriver(method, url);
  }

  isCacheableMethod(method: string): boolean {
    return isMethodIn(method, this.config.cacheableMethods);
  }

  isInvalidatingMethod(method: string): boolean {
    return isMethodIn(method, this.config.invalidatingMethods);
  }

  /**
   * Return a fresh stored response for the request, or null when the
   * network has to be asked (absent, stale, or bypassed by the request).
   */
  async cachedRequest(request: RequestDescriptor): Promise<CachedResponse | null> {
    const { url } = request;
    const primaryKey = this.cacheUrl(url, request.method);

    if (!this.isCacheableMethod(request.method)) {
      this.transition('PASSTHROUGH', primaryKey, url, { reason: 'method-not-cacheable' });
      return null;
    }

    const requestDirectives = parseCacheControl(getHeaderValue(request.headers, 'cache-control'));
    const pragma = getHeaderValue(request.headers, 'pragma') ?? '';
    if (
      requestDirectives.noCache ||
      requestDirectives.maxAge === 0 ||
      pragma.toLowerCase().includes('no-cache')
    ) {
      this.transition('MISS', primaryKey, url, { reason: 'request-no-cache' });
      return null;
    }

    const located = await this.locate(request);
    if (!located) {
      this.transition('MISS', primaryKey, url);
      return null;
    }

    const { key, entry } = located;
    const now = this.config.clock();

    if (
      this.config.permanentRedirectStatuses.includes(entry.statusCode) ||
      this.isFresh(entry, requestDirectives, now)
    ) {
      const body = await this.loadBody(key, entry);
      if (!body) {
        this.transition('MISS', key, url, { reason: 'body-missing' });
        return null;
      }
      this.transition('HIT_FRESH', key, url, { statusCode: entry.statusCode });
      return this.toCachedResponse(entry, body);
    }

    if (!this.hasValidators(entry)) {
      await this.deleteKey(key);
      this.transition('MISS', key, url, { reason: 'stale-without-validators' });
      return null;
    }

    this.transition('HIT_STALE_REVALIDATING', key, url);
    return null;
  }

  /**
   * Validators of the stored entry as conditional request headers
   */
  async conditionalHeaders(request: RequestDescriptor): Promise<Record<string, string>> {
    const headers: Record<string, string> = {};
    if (!this.config.cacheEtags || !this.isCacheableMethod(request.method)) {
      return headers;
    }

    const located = await this.locate(request);
    if (!located) {
      return headers;
    }

    const etag = extractETag(located.entry.headers);
    const lastModified = extractLastModified(located.entry.headers);
    if (etag) headers['If-None-Match'] = etag;
    if (lastModified) headers['If-Modified-Since'] = lastModified;
    return headers;
  }

  /**
   * Cheap check, before any body has been read, of whether a response
   * could be stored. cacheResponse makes the final decision.
   */
  shouldCapture(request: RequestDescriptor, head: ResponseHead): boolean {
    if (!this.isCacheableMethod(request.method) || head.statusCode === 304) {
      return false;
    }
    if (!this.config.cacheableStatuses.includes(head.statusCode)) {
      return false;
    }
    if (isVaryUncacheable(getHeader(head.headers, 'vary'))) {
      return false;
    }
    if (this.config.permanentRedirectStatuses.includes(head.statusCode)) {
      return true;
    }
    const requestDirectives = parseCacheControl(getHeaderValue(request.headers, 'cache-control'));
    const responseDirectives = parseCacheControl(getHeader(head.headers, 'cache-control'));
    return !requestDirectives.noStore && !responseDirectives.noStore;
  }

  /**
   * Store a complete response if it is eligible
   *
   * @returns Whether the response was stored
   */
  async cacheResponse(
    request: RequestDescriptor,
    head: ResponseHead,
    body: Buffer | null
  ): Promise<boolean> {
    const { url } = request;
    const primaryKey = this.cacheUrl(url, request.method);
    const now = this.config.clock();

    if (!this.isCacheableMethod(request.method)) {
      return this.skip(primaryKey, url, 'method-not-cacheable');
    }

    const response = this.config.heuristic ? this.config.heuristic.apply(head, now) : head;
    const bytes = body ?? Buffer.alloc(0);

    if (response.statusCode === 304) {
      return this.skip(primaryKey, url, 'not-modified');
    }
    if (!this.config.cacheableStatuses.includes(response.statusCode)) {
      return this.skip(primaryKey, url, 'status-not-cacheable');
    }
    if (isVaryUncacheable(getHeader(response.headers, 'vary'))) {
      return this.skip(primaryKey, url, 'vary-star');
    }

    const contentLength = getHeader(response.headers, 'content-length')?.trim();
    if (contentLength && /^\d+$/.test(contentLength) && parseInt(contentLength, 10) !== bytes.length) {
      return this.skip(primaryKey, url, 'content-length-mismatch');
    }

    if (this.config.permanentRedirectStatuses.includes(response.statusCode)) {
      return this.storeEntry(request, response, bytes, now, 'permanent-redirect');
    }

    const requestDirectives = parseCacheControl(getHeaderValue(request.headers, 'cache-control'));
    const responseDirectives = parseCacheControl(getHeader(response.headers, 'cache-control'));
    if (requestDirectives.noStore || responseDirectives.noStore) {
      return this.skip(primaryKey, url, 'no-store');
    }

    if (this.config.cacheEtags && extractETag(response.headers)) {
      return this.storeEntry(request, response, bytes, now, 'etag');
    }
    if (responseDirectives.maxAge !== undefined && responseDirectives.maxAge > 0) {
      return this.storeEntry(request, response, bytes, now, 'max-age');
    }

    const expires = parseDateHeader(getHeader(response.headers, 'expires'));
    const date = parseDateHeader(getHeader(response.headers, 'date')) ?? now;
    if (expires !== undefined && expires > date) {
      return this.storeEntry(request, response, bytes, now, 'expires');
    }

    return this.skip(primaryKey, url, 'no-freshness-information');
  }

  /**
   * Merge a 304 Not Modified into the stored entry and return the now
   * fresh stored response. With nothing stored for the request the 304 is
   * handed back as it is.
   */
  async updateCachedResponse(
    request: RequestDescriptor,
    head: ResponseHead
  ): Promise<RevalidationResult> {
    const { url } = request;
    const located = await this.locate(request);
    if (!located) {
      this.transition('MISS', this.cacheUrl(url, request.method), url, {
        reason: 'not-modified-without-entry',
      });
      return { updated: false, response: head };
    }

    const { key, entry } = located;
    const replaced = new Set(
      head.headers
        .map(([name]) => name.toLowerCase())
        .filter((name) => !NOT_MODIFIED_EXCLUDED_HEADERS.has(name))
    );
    const merged: CacheEntry = {
      ...entry,
      headers: [
        ...entry.headers.filter(([name]) => !replaced.has(name.toLowerCase())),
        ...head.headers.filter(([name]) => replaced.has(name.toLowerCase())),
      ],
      storedAt: this.config.clock(),
    };

    const body = await this.loadBody(key, entry);
    if (!body) {
      this.transition('MISS', key, url, { reason: 'body-missing' });
      return { updated: false, response: head };
    }

    try {
      await this.writeMetadata(key, merged);
      this.transition('STORED', key, url, { reason: 'revalidated' });
    } catch (error) {
      this.logger.warn({ err: error, key, url }, 'failed to store revalidated response');
    }

    return { updated: true, response: this.toCachedResponse(merged, body) };
  }

  /**
   * Drop stored responses for the URL after a successful unsafe request
   *
   * @returns Whether anything was invalidated
   */
  async invalidateOnSuccess(request: RequestDescriptor, head: ResponseHead): Promise<boolean> {
    if (!this.isInvalidatingMethod(request.method)) {
      return false;
    }
    if (head.statusCode < 200 || head.statusCode >= 400) {
      return false;
    }

    const { url } = request;
    const keys = new Set<string>();
    for (const method of this.config.cacheableMethods) {
      const primaryKey = this.cacheUrl(url, method);
      keys.add(primaryKey);
      const record = await this.readRecord(primaryKey);
      if (record?.kind === 'vary') {
        keys.add(
          this.config.keyDeriver(method, url, extractVaryHeaders(request.headers, record.headers))
        );
      }
    }

    for (const key of keys) {
      await this.deleteKey(key);
    }

    this.transition('INVALIDATED', this.cacheUrl(url), url, {
      method: request.method.toUpperCase(),
      statusCode: head.statusCode,
    });
    return true;
  }

  /**
   * Get configuration
   */
  getConfig(): Required<CacheControlConfig> {
    return this.config;
  }

  /**
   * Add event listener
   */
  on(listener: CacheEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove event listener
   */
  off(listener: CacheEventListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Close the store and release resources
   */
  async close(): Promise<void> {
    await this.store.close();
    this.listeners.clear();
  }

  private isFresh(
    entry: CacheEntry,
    requestDirectives: CacheControlDirectives,
    now: number
  ): boolean {
    const directives = parseCacheControl(getHeader(entry.headers, 'cache-control'));
    let lifetime = freshnessLifetime(entry.headers, directives, entry.storedAt);
    let age = currentAge(entry.headers, entry.storedAt, now);

    if (requestDirectives.maxAge !== undefined) {
      lifetime = Math.min(lifetime, requestDirectives.maxAge);
    }
    if (requestDirectives.minFresh !== undefined) {
      age += requestDirectives.minFresh;
    }
    if (requestDirectives.maxStale !== undefined && !directives.mustRevalidate) {
      lifetime += requestDirectives.maxStale;
    }

    return lifetime > age;
  }

  private hasValidators(entry: CacheEntry): boolean {
    if (!this.config.cacheEtags) {
      return false;
    }
    return (
      extractETag(entry.headers) !== undefined || extractLastModified(entry.headers) !== undefined
    );
  }

  /**
   * Find the entry for a request, following a Vary index to the variant
   */
  private async locate(request: RequestDescriptor): Promise<LocatedEntry | null> {
    let key = this.cacheUrl(request.url, request.method);
    let record = await this.readRecord(key);

    if (record?.kind === 'vary') {
      key = this.config.keyDeriver(
        request.method,
        request.url,
        extractVaryHeaders(request.headers, record.headers)
      );
      record = await this.readRecord(key);
    }

    if (!record || record.kind !== 'entry') {
      return null;
    }
    return { key, entry: record.entry };
  }

  private async readRecord(key: string): Promise<StoredRecord | null> {
    let bytes: Buffer | null;
    try {
      bytes = this.store.kind === 'unified' ? await this.store.get(key) : await this.store.getMetadata(key);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'cache read failed, treating as miss');
      return null;
    }
    if (!bytes) {
      return null;
    }

    let record: StoredRecord | null;
    try {
      record = this.config.serializer.decode(bytes);
    } catch (error) {
      this.logger.debug({ err: error, key }, 'cache serializer failed, treating as miss');
      return null;
    }
    if (!record) {
      this.logger.debug({ key }, 'cache entry could not be decoded, treating as miss');
    }
    return record;
  }

  private async loadBody(key: string, entry: CacheEntry): Promise<Readable | null> {
    if (this.store.kind === 'unified') {
      return bufferToStream(entry.body ?? Buffer.alloc(0));
    }
    try {
      return await this.store.getBody(key);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'cache body read failed, treating as miss');
      return null;
    }
  }

  private async storeEntry(
    request: RequestDescriptor,
    response: ResponseHead,
    body: Buffer,
    now: number,
    reason: string
  ): Promise<boolean> {
    const { method, url } = request;
    const primaryKey = this.cacheUrl(url, method);
    const varyNames = parseVary(getHeader(response.headers, 'vary'));
    const key =
      varyNames.length > 0
        ? this.config.keyDeriver(method, url, extractVaryHeaders(request.headers, varyNames))
        : primaryKey;

    const entry: CacheEntry = {
      statusCode: response.statusCode,
      statusText: response.statusText ?? '',
      headers: response.headers,
      body: this.store.kind === 'unified' ? body : null,
      storedAt: now,
    };

    try {
      if (this.store.kind === 'separate-body') {
        await this.store.setBody(key, body);
      }
      await this.writeMetadata(key, entry);
      if (varyNames.length > 0) {
        await this.writeRecord(primaryKey, { kind: 'vary', headers: varyNames });
      }
    } catch (error) {
      this.logger.warn({ err: error, key, url }, 'failed to store response, continuing uncached');
      return false;
    }

    this.transition('STORED', key, url, { reason, statusCode: response.statusCode });
    return true;
  }

  /**
   * Write an entry without touching a separately stored body
   */
  private async writeMetadata(key: string, entry: CacheEntry): Promise<void> {
    const stored = this.store.kind === 'unified' ? entry : { ...entry, body: null };
    await this.writeRecord(key, { kind: 'entry', entry: stored });
  }

  private async writeRecord(key: string, record: StoredRecord): Promise<void> {
    const bytes = this.config.serializer.encode(record);
    if (this.store.kind === 'unified') {
      await this.store.set(key, bytes);
    } else {
      await this.store.setMetadata(key, bytes);
    }
  }

  private async deleteKey(key: string): Promise<void> {
    try {
      await this.store.delete(key);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'failed to delete cache entry');
    }
  }

  private toCachedResponse(entry: CacheEntry, body: Readable): CachedResponse {
    return {
      statusCode: entry.statusCode,
      statusText: entry.statusText,
      headers: entry.headers,
      body,
      storedAt: entry.storedAt,
      fromCache: true,
    };
  }

  private skip(key: string, url: string, reason: string): false {
    this.transition('PASSTHROUGH', key, url, { reason });
    return false;
  }

  private transition(
    state: CacheState,
    key: string,
    url: string,
    metadata?: Record<string, unknown>
  ): void {
    this.logger.debug({ state, key, url, ...metadata }, 'cache state');

    const event = { type: state, key, url, timestamp: this.config.clock(), metadata };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ err: error }, 'cache event listener failed');
      }
    }
  }
}

/**
 * Create a cache controller
 */
export function createCacheController(
  store: CacheStore,
  config?: CacheControlConfig
): CacheController {
  return new CacheController(store, config);
}
