/**
 * Caching HTTP client
 */

import type { Readable } from 'node:stream';
import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import {
  CacheController,
  CaptureReadable,
  MemoryCacheStore,
  componentLogger,
  type CacheControlConfig,
  type CachedResponse,
  type CacheStore,
  type RawHeaders,
  type RequestDescriptor,
  type Transport,
  type TransportResponse,
} from '@httpcache/cache-control';
import { mergeHeaders } from './headers.mjs';
import { createUndiciTransport } from './transport.mjs';

/**
 * What happened to a response body on its way to the cache
 * - stored: read to the end and written to the store
 * - not-stored: read to the end, but the response was not eligible
 * - discarded: closed early, or shorter or longer than its Content-Length
 * - failed: the store rejected the write
 * - skipped: never captured (served from cache, or not cacheable)
 */
export type CacheWriteOutcome = 'stored' | 'not-stored' | 'discarded' | 'failed' | 'skipped';

export interface CacheAwareResponse {
  statusCode: number;
  statusText: string;
  headers: RawHeaders;
  body: Readable;
  /** Served from the store, including after a 304 revalidation */
  fromCache: boolean;
  /** A stale entry was confirmed by a 304 */
  revalidated: boolean;
  /** Settles once the body has been read to the end or closed */
  cacheWrite: Promise<CacheWriteOutcome>;
}

export interface CacheControlClientOptions {
  /** Controller to use; built from store and config when omitted */
  controller?: CacheController;
  /** Store for a new controller. Default: MemoryCacheStore */
  store?: CacheStore;
  /** Config for a new controller */
  config?: CacheControlConfig;
  /** Network transport. Default: undici request() */
  transport?: Transport;
  /** Dispatcher for the default transport */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

const SKIPPED: Promise<CacheWriteOutcome> = Promise.resolve('skipped');

/**
 * Client that answers from the cache when it can and stores what it
 * fetches once the caller has read it.
 *
 * @example
 * const client = new CacheControlClient({
 *   store: new FileCacheStore({ directory: '.http-cache' }),
 * });
 *
 * const response = await client.request({ method: 'GET', url: 'https://api.example.com/widgets' });
 * const body = await collectBody(response.body);
 * console.log(response.fromCache, await response.cacheWrite);
 */
export class CacheControlClient {
  readonly controller: CacheController;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(options: CacheControlClientOptions = {}) {
    this.controller =
      options.controller ??
      new CacheController(options.store ?? new MemoryCacheStore(), options.config);
    this.transport = options.transport ?? createUndiciTransport(options.dispatcher);
    this.logger = componentLogger('cache-client', options.logger);
  }

  async request(req: RequestDescriptor): Promise<CacheAwareResponse> {
    const request: RequestDescriptor = { ...req, method: req.method.toUpperCase() };

    if (this.controller.isCacheableMethod(request.method)) {
      const cached = await this.controller.cachedRequest(request);
      if (cached) {
        return this.fromCache(cached, false);
      }
    }

    const conditional = await this.controller.conditionalHeaders(request);
    const response = await this.transport.send({
      method: request.method,
      url: request.url,
      headers: mergeHeaders(request.headers, conditional),
    });

    this.logger.debug(
      { method: request.method, url: request.url, statusCode: response.statusCode },
      'network response'
    );

    if (response.statusCode === 304 && Object.keys(conditional).length > 0) {
      const result = await this.controller.updateCachedResponse(request, response);
      if (result.updated) {
        await response.release();
        return this.fromCache(result.response, true);
      }
    }

    if (this.controller.isInvalidatingMethod(request.method)) {
      await this.controller.invalidateOnSuccess(request, response);
    }

    if (this.controller.shouldCapture(request, response)) {
      return this.capture(request, response);
    }

    return this.fromNetwork(response, response.body, SKIPPED);
  }

  async close(): Promise<void> {
    await this.controller.close();
  }

  private capture(request: RequestDescriptor, response: TransportResponse): CacheAwareResponse {
    let stored = false;
    const body = new CaptureReadable(
      response.body,
      async (bytes) => {
        stored = await this.controller.cacheResponse(request, response, bytes);
      },
      {
        // Content-Length does not bound a chunked body
        expectedLength: response.chunked ? undefined : response.contentLength,
        logger: this.logger,
      }
    );

    const cacheWrite = body.settled.then((outcome): CacheWriteOutcome => {
      if (outcome === 'committed') {
        return stored ? 'stored' : 'not-stored';
      }
      return outcome;
    });

    return this.fromNetwork(response, body, cacheWrite);
  }

  private fromCache(cached: CachedResponse, revalidated: boolean): CacheAwareResponse {
    return {
      statusCode: cached.statusCode,
      statusText: cached.statusText,
      headers: cached.headers,
      body: cached.body,
      fromCache: true,
      revalidated,
      cacheWrite: SKIPPED,
    };
  }

  private fromNetwork(
    response: TransportResponse,
    body: Readable,
    cacheWrite: Promise<CacheWriteOutcome>
  ): CacheAwareResponse {
    return {
      statusCode: response.statusCode,
      statusText: response.statusText,
      headers: response.headers,
      body,
      fromCache: false,
      revalidated: false,
      cacheWrite,
    };
  }
}
