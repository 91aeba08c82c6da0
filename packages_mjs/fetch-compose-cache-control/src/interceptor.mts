/**
 * Cache-control interceptor for undici's compose pattern
 * Serves fresh responses from the store, revalidates stale ones with
 * conditional requests and stores bodies once they have been delivered
 * in full.
 */

import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import {
  BodyCapture,
  CacheController,
  MemoryCacheStore,
  collectBody,
  componentLogger,
  getHeader,
  toError,
  type CacheControlConfig,
  type CacheStore,
  type RawHeaders,
  type RequestDescriptor,
  type ResponseHead,
} from '@httpcache/cache-control';
import { extractHeaders, mergeHeaders, parseRawHeaders, toBufferHeaders } from './headers.mjs';

export type CacheStatus = 'HIT' | 'MISS' | 'REVALIDATED';

/**
 * Options for the cache-control interceptor
 */
export interface CacheControlInterceptorOptions {
  /** Controller to use; built from store and config when omitted */
  controller?: CacheController;
  /** Store for a new controller. Default: MemoryCacheStore */
  store?: CacheStore;
  /** Config for a new controller */
  config?: CacheControlConfig;
  /** Response header naming the cache status, or false for none. Default: 'x-cache' */
  cacheStatusHeader?: string | false;
  /** Callback when a fresh response is served from the store */
  onCacheHit?: (url: string) => void;
  /** Callback when the request goes to the network */
  onCacheMiss?: (url: string) => void;
  /** Callback when a response is stored */
  onCacheStore?: (url: string, statusCode: number) => void;
  /** Callback when a 304 confirms the stored response */
  onRevalidated?: (url: string) => void;
  logger?: Logger;
}

interface InterceptorContext {
  controller: CacheController;
  statusHeader: string | false;
  logger: Logger;
  options: CacheControlInterceptorOptions;
}

/**
 * Create a cache-control interceptor for undici's compose pattern
 *
 * @example Basic usage
 * ```typescript
 * const client = new Agent().compose(
 *   cacheControlInterceptor(),
 *   interceptors.retry({ maxRetries: 3 })
 * );
 * ```
 *
 * @example Filesystem store
 * ```typescript
 * const client = new Agent().compose(
 *   cacheControlInterceptor({
 *     store: new FileCacheStore({ directory: '.http-cache' }),
 *     onCacheHit: (url) => logger.info({ url }, 'cache hit'),
 *   })
 * );
 * ```
 */
export function cacheControlInterceptor(
  options: CacheControlInterceptorOptions = {}
): Dispatcher.DispatcherComposeInterceptor {
  const controller =
    options.controller ??
    new CacheController(options.store ?? new MemoryCacheStore(), options.config);
  const context: InterceptorContext = {
    controller,
    statusHeader: options.cacheStatusHeader ?? 'x-cache',
    logger: componentLogger('cache-interceptor', options.logger),
    options,
  };

  return (dispatch: Dispatcher.Dispatch) => {
    return (opts: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandler): boolean => {
      const method = opts.method.toUpperCase();
      const origin =
        typeof opts.origin === 'string' ? opts.origin.replace(/\/+$/, '') : (opts.origin?.origin ?? '');
      const request: RequestDescriptor = {
        method,
        url: `${origin}${opts.path}`,
        headers: extractHeaders(opts.headers),
      };

      if (controller.isCacheableMethod(method)) {
        handleCacheableRequest(dispatch, opts, handler, request, context).catch(
          (error: unknown) => {
            handler.onError?.(toError(error));
          }
        );
        return true;
      }

      if (controller.isInvalidatingMethod(method)) {
        return dispatch(opts, createInvalidatingHandler(handler, request, context));
      }

      return dispatch(opts, createPassThroughHandler(handler, context));
    };
  };
}

/**
 * Look the request up, then serve it from the store or send it on
 */
async function handleCacheableRequest(
  dispatch: Dispatcher.Dispatch,
  opts: Dispatcher.DispatchOptions,
  handler: Dispatcher.DispatchHandler,
  request: RequestDescriptor,
  context: InterceptorContext
): Promise<void> {
  const { controller, options } = context;

  const cached = await controller.cachedRequest(request);
  if (cached) {
    options.onCacheHit?.(request.url);
    const body = await collectBody(cached.body);
    serveResponse(handler, cached, body, 'HIT', context);
    return;
  }

  options.onCacheMiss?.(request.url);

  const conditional = await controller.conditionalHeaders(request);
  const revalidating = Object.keys(conditional).length > 0;
  const dispatchOpts = revalidating
    ? { ...opts, headers: mergeHeaders(extractHeaders(opts.headers), conditional) }
    : opts;

  dispatch(dispatchOpts, createCachingHandler(handler, request, revalidating, context));
}

/**
 * Handler that passes the response on while capturing its body, and that
 * swaps a 304 for the stored response it confirms
 */
function createCachingHandler(
  handler: Dispatcher.DispatchHandler,
  request: RequestDescriptor,
  revalidating: boolean,
  context: InterceptorContext
): Dispatcher.DispatchHandler {
  const { controller, options, logger } = context;
  let head: ResponseHead | undefined;
  let notModified = false;
  let capture: BodyCapture | undefined;

  return {
    onConnect: (abort: (err?: Error) => void): void => {
      handler.onConnect?.(abort);
    },
    onHeaders: (
      statusCode: number,
      headers: Buffer[],
      resume: () => void,
      statusText: string
    ): boolean => {
      const response: ResponseHead = { statusCode, statusText, headers: parseRawHeaders(headers) };
      head = response;

      if (statusCode === 304 && revalidating) {
        notModified = true;
        return true;
      }

      if (controller.shouldCapture(request, response)) {
        const chunked = /chunked/i.test(getHeader(response.headers, 'transfer-encoding') ?? '');
        const contentLength = chunked
          ? undefined
          : getHeader(response.headers, 'content-length')?.trim();
        capture = new BodyCapture(
          async (bytes) => {
            const stored = await controller.cacheResponse(request, response, bytes);
            if (stored) {
              options.onCacheStore?.(request.url, statusCode);
            }
          },
          {
            expectedLength:
              contentLength && /^\d+$/.test(contentLength) ? parseInt(contentLength, 10) : undefined,
            logger,
          }
        );
      }

      return (
        handler.onHeaders?.(
          statusCode,
          withCacheStatus(headers, 'MISS', context),
          resume,
          statusText
        ) ?? true
      );
    },
    onData: (chunk: Buffer): boolean => {
      if (notModified) {
        return true;
      }
      capture?.append(chunk);
      return handler.onData?.(chunk) ?? true;
    },
    onComplete: (trailers: string[] | null): void => {
      if (notModified && head) {
        completeRevalidation(handler, request, head, context).catch((error: unknown) => {
          handler.onError?.(toError(error));
        });
        return;
      }
      capture?.finish();
      handler.onComplete?.(trailers);
    },
    onError: (error: Error): void => {
      capture?.abandon();
      handler.onError?.(error);
    },
  };
}

/**
 * Merge a 304 into the stored entry and serve the result. When nothing
 * is stored any more the 304 itself is passed on.
 */
async function completeRevalidation(
  handler: Dispatcher.DispatchHandler,
  request: RequestDescriptor,
  head: ResponseHead,
  context: InterceptorContext
): Promise<void> {
  const result = await context.controller.updateCachedResponse(request, head);

  if (result.updated) {
    context.options.onRevalidated?.(request.url);
    const body = await collectBody(result.response.body);
    serveResponse(handler, result.response, body, 'REVALIDATED', context);
    return;
  }

  serveResponse(handler, head, Buffer.alloc(0), 'MISS', context);
}

/**
 * Handler that drops stored responses for the URL once an unsafe request
 * has completed successfully
 */
function createInvalidatingHandler(
  handler: Dispatcher.DispatchHandler,
  request: RequestDescriptor,
  context: InterceptorContext
): Dispatcher.DispatchHandler {
  let head: ResponseHead | undefined;

  return {
    onConnect: (abort: (err?: Error) => void): void => {
      handler.onConnect?.(abort);
    },
    onHeaders: (
      statusCode: number,
      headers: Buffer[],
      resume: () => void,
      statusText: string
    ): boolean => {
      head = { statusCode, statusText, headers: parseRawHeaders(headers) };
      return (
        handler.onHeaders?.(
          statusCode,
          withCacheStatus(headers, 'MISS', context),
          resume,
          statusText
        ) ?? true
      );
    },
    onData: (chunk: Buffer): boolean => handler.onData?.(chunk) ?? true,
    onComplete: (trailers: string[] | null): void => {
      if (!head) {
        handler.onComplete?.(trailers);
        return;
      }
      context.controller
        .invalidateOnSuccess(request, head)
        .catch((error: unknown) => {
          context.logger.warn({ err: error, url: request.url }, 'cache invalidation failed');
          return false;
        })
        .then(() => handler.onComplete?.(trailers))
        .catch((error: unknown) => {
          handler.onError?.(toError(error));
        });
    },
    onError: (error: Error): void => {
      handler.onError?.(error);
    },
  };
}

/**
 * Handler for methods the cache leaves alone: only marks the response
 */
function createPassThroughHandler(
  handler: Dispatcher.DispatchHandler,
  context: InterceptorContext
): Dispatcher.DispatchHandler {
  return {
    onConnect: (abort: (err?: Error) => void): void => {
      handler.onConnect?.(abort);
    },
    onHeaders: (
      statusCode: number,
      headers: Buffer[],
      resume: () => void,
      statusText: string
    ): boolean =>
      handler.onHeaders?.(
        statusCode,
        withCacheStatus(headers, 'MISS', context),
        resume,
        statusText
      ) ?? true,
    onData: (chunk: Buffer): boolean => handler.onData?.(chunk) ?? true,
    onComplete: (trailers: string[] | null): void => {
      handler.onComplete?.(trailers);
    },
    onError: (error: Error): void => {
      handler.onError?.(error);
    },
  };
}

/**
 * Deliver a complete response to the handler
 */
function serveResponse(
  handler: Dispatcher.DispatchHandler,
  response: { statusCode: number; statusText?: string; headers: RawHeaders },
  body: Buffer,
  status: CacheStatus,
  context: InterceptorContext
): void {
  let aborted = false;
  handler.onConnect?.(() => {
    aborted = true;
  });
  if (aborted) {
    return;
  }

  handler.onHeaders?.(
    response.statusCode,
    withCacheStatus(toBufferHeaders(response.headers), status, context),
    () => {},
    response.statusText ?? ''
  );

  if (body.length > 0 && !aborted) {
    handler.onData?.(body);
  }
  if (!aborted) {
    handler.onComplete?.([]);
  }
}

function withCacheStatus(
  headers: Buffer[],
  status: CacheStatus,
  context: InterceptorContext
): Buffer[] {
  if (!context.statusHeader) {
    return headers;
  }
  return [...headers, Buffer.from(context.statusHeader), Buffer.from(status)];
}

export default cacheControlInterceptor;
