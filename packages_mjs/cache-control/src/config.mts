/**
 * Configuration utilities for cache-control
 */

import { deriveCacheKey } from './key.mjs';
import { logger } from './logger.mjs';
import { JsonCacheSerializer } from './serializer.mjs';
import type { CacheControlConfig } from './types.mjs';

/**
 * Methods whose success invalidates cached responses for the URL
 */
export const INVALIDATING_METHODS = ['PUT', 'PATCH', 'DELETE'];

/**
 * Redirects that are cached regardless of Cache-Control
 */
export const PERMANENT_REDIRECT_STATUSES = [301, 308];

/**
 * Default cache-control configuration
 */
export const DEFAULT_CACHE_CONTROL_CONFIG: Required<CacheControlConfig> = {
  cacheableMethods: ['GET'],
  invalidatingMethods: INVALIDATING_METHODS,
  cacheEtags: true,
  cacheableStatuses: [200, 203, 300, 301, 308],
  permanentRedirectStatuses: PERMANENT_REDIRECT_STATUSES,
  heuristic: null,
  serializer: new JsonCacheSerializer(),
  keyDeriver: deriveCacheKey,
  clock: Date.now,
  logger,
};

/**
 * Merge user config with defaults
 */
export function mergeCacheControlConfig(
  config?: CacheControlConfig
): Required<CacheControlConfig> {
  if (!config) {
    return { ...DEFAULT_CACHE_CONTROL_CONFIG };
  }

  return {
    cacheableMethods: (config.cacheableMethods ?? DEFAULT_CACHE_CONTROL_CONFIG.cacheableMethods).map(
      (m) => m.toUpperCase()
    ),
    invalidatingMethods: (
      config.invalidatingMethods ?? DEFAULT_CACHE_CONTROL_CONFIG.invalidatingMethods
    ).map((m) => m.toUpperCase()),
    cacheEtags: config.cacheEtags ?? DEFAULT_CACHE_CONTROL_CONFIG.cacheEtags,
    cacheableStatuses: config.cacheableStatuses ?? DEFAULT_CACHE_CONTROL_CONFIG.cacheableStatuses,
    permanentRedirectStatuses:
      config.permanentRedirectStatuses ?? DEFAULT_CACHE_CONTROL_CONFIG.permanentRedirectStatuses,
    heuristic: config.heuristic ?? DEFAULT_CACHE_CONTROL_CONFIG.heuristic,
    serializer: config.serializer ?? DEFAULT_CACHE_CONTROL_CONFIG.serializer,
    keyDeriver: config.keyDeriver ?? DEFAULT_CACHE_CONTROL_CONFIG.keyDeriver,
    clock: config.clock ?? DEFAULT_CACHE_CONTROL_CONFIG.clock,
    logger: config.logger ?? DEFAULT_CACHE_CONTROL_CONFIG.logger,
  };
}
