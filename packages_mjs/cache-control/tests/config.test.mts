/**
 * Tests for configuration merging
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CACHE_CONTROL_CONFIG,
  INVALIDATING_METHODS,
  PERMANENT_REDIRECT_STATUSES,
  mergeCacheControlConfig,
} from '../src/config.mjs';
import { ExpiresAfter } from '../src/heuristics.mjs';
import { deriveCacheKey } from '../src/key.mjs';

describe('DEFAULT_CACHE_CONTROL_CONFIG', () => {
  it('should have the default policy', () => {
    expect(DEFAULT_CACHE_CONTROL_CONFIG.cacheableMethods).toEqual(['GET']);
    expect(DEFAULT_CACHE_CONTROL_CONFIG.invalidatingMethods).toEqual(['PUT', 'PATCH', 'DELETE']);
    expect(DEFAULT_CACHE_CONTROL_CONFIG.cacheEtags).toBe(true);
    expect(DEFAULT_CACHE_CONTROL_CONFIG.cacheableStatuses).toEqual([200, 203, 300, 301, 308]);
    expect(DEFAULT_CACHE_CONTROL_CONFIG.permanentRedirectStatuses).toEqual([301, 308]);
    expect(DEFAULT_CACHE_CONTROL_CONFIG.heuristic).toBeNull();
    expect(DEFAULT_CACHE_CONTROL_CONFIG.keyDeriver).toBe(deriveCacheKey);
  });

  it('should export method and status lists', () => {
    expect(INVALIDATING_METHODS).toEqual(['PUT', 'PATCH', 'DELETE']);
    expect(PERMANENT_REDIRECT_STATUSES).toEqual([301, 308]);
  });
});

describe('mergeCacheControlConfig', () => {
  it('should return a copy of the defaults without config', () => {
    const merged = mergeCacheControlConfig();
    expect(merged).toEqual(DEFAULT_CACHE_CONTROL_CONFIG);
    expect(merged).not.toBe(DEFAULT_CACHE_CONTROL_CONFIG);
  });

  it('should uppercase method lists', () => {
    const merged = mergeCacheControlConfig({
      cacheableMethods: ['get', 'head'],
      invalidatingMethods: ['post'],
    });
    expect(merged.cacheableMethods).toEqual(['GET', 'HEAD']);
    expect(merged.invalidatingMethods).toEqual(['POST']);
  });

  it('should keep provided values and default the rest', () => {
    const heuristic = new ExpiresAfter({ hours: 1 });
    const clock = (): number => 42;
    const merged = mergeCacheControlConfig({ cacheEtags: false, heuristic, clock });

    expect(merged.cacheEtags).toBe(false);
    expect(merged.heuristic).toBe(heuristic);
    expect(merged.clock()).toBe(42);
    expect(merged.cacheableStatuses).toEqual([200, 203, 300, 301, 308]);
  });
});
