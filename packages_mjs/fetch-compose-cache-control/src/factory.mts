/**
 * Factory functions for cache-control dispatchers and clients
 */

import { Agent, type Dispatcher } from 'undici';
import { CacheControlClient, type CacheControlClientOptions } from './client.mjs';
import {
  cacheControlInterceptor,
  type CacheControlInterceptorOptions,
} from './interceptor.mjs';

/**
 * Create a dispatcher with cache-control capabilities
 *
 * @example
 * const dispatcher = createCacheControlDispatcher(new Agent(), {
 *   config: { cacheEtags: false }
 * });
 */
export function createCacheControlDispatcher(
  baseDispatcher: Dispatcher.ComposedDispatcher | Agent,
  options?: CacheControlInterceptorOptions
): Dispatcher.ComposedDispatcher {
  return baseDispatcher.compose(cacheControlInterceptor(options));
}

/**
 * Create an agent with cache-control capabilities
 *
 * @example
 * const agent = createCacheControlAgent(
 *   { store: new FileCacheStore({ directory: '.http-cache' }) },
 *   { connections: 10 }
 * );
 */
export function createCacheControlAgent(
  options?: CacheControlInterceptorOptions,
  agentOptions?: Agent.Options
): Dispatcher.ComposedDispatcher {
  const agent = new Agent(agentOptions);
  return agent.compose(cacheControlInterceptor(options));
}

/**
 * Compose the cache-control interceptor with other interceptors. The cache
 * goes first so that hits never reach the rest of the chain.
 *
 * @example
 * const client = new Agent().compose(
 *   ...composeCacheControl([interceptors.retry({ maxRetries: 3 })])
 * );
 */
export function composeCacheControl(
  interceptors: Dispatcher.DispatcherComposeInterceptor[],
  cacheControlOptions?: CacheControlInterceptorOptions
): Dispatcher.DispatcherComposeInterceptor[] {
  return [cacheControlInterceptor(cacheControlOptions), ...interceptors];
}

/**
 * Create a caching client
 */
export function createCacheControlClient(options?: CacheControlClientOptions): CacheControlClient {
  return new CacheControlClient(options);
}
