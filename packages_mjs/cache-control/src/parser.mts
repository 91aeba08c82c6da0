/**
 * Cache-Control header parsing and header utilities for RFC 7234 compliance
 */

import type { CacheControlDirectives, RawHeaders } from './types.mjs';

/**
 * Parse a delta-seconds directive value. Invalid values are ignored.
 */
function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Parse Cache-Control header into directives
 */
export function parseCacheControl(header: string | undefined | null): CacheControlDirectives {
  const directives: CacheControlDirectives = {};

  if (!header) {
    return directives;
  }

  for (const part of header.toLowerCase().split(',')) {
    const separator = part.indexOf('=');
    const key = (separator === -1 ? part : part.slice(0, separator)).trim();
    const value =
      separator === -1 ? undefined : part.slice(separator + 1).trim().replace(/^"(.*)"$/, '$1');

    switch (key) {
      case 'no-store':
        directives.noStore = true;
        break;
      case 'no-cache':
        directives.noCache = true;
        break;
      case 'max-age': {
        const seconds = parseSeconds(value);
        if (seconds !== undefined) directives.maxAge = seconds;
        break;
      }
      case 'max-stale': {
        const seconds = value === undefined ? Infinity : parseSeconds(value);
        if (seconds !== undefined) directives.maxStale = seconds;
        break;
      }
      case 'min-fresh': {
        const seconds = parseSeconds(value);
        if (seconds !== undefined) directives.minFresh = seconds;
        break;
      }
      case 'must-revalidate':
        directives.mustRevalidate = true;
        break;
    }
  }

  return directives;
}

/**
 * Get a response header value case-insensitively. Repeated headers are
 * joined with ", ".
 */
export function getHeader(headers: RawHeaders, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  const values = headers.filter(([k]) => k.toLowerCase() === lowerName).map(([, v]) => v);
  return values.length > 0 ? values.join(', ') : undefined;
}

/**
 * Replace every occurrence of a header with a single value
 */
export function setHeader(headers: RawHeaders, name: string, value: string): RawHeaders {
  const lowerName = name.toLowerCase();
  return [...headers.filter(([k]) => k.toLowerCase() !== lowerName), [name, value]];
}

/**
 * Get request header value case-insensitively
 */
export function getHeaderValue(
  headers: Record<string, string> | undefined,
  key: string
): string | undefined {
  if (!headers) return undefined;
  const lowerKey = key.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() === lowerKey) {
      return v;
    }
  }
  return undefined;
}

/**
 * Normalize headers to lowercase keys
 */
export function normalizeHeaders(headers: Record<string, string> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers ?? {})) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * Extract ETag from response headers
 */
export function extractETag(headers: RawHeaders): string | undefined {
  return getHeader(headers, 'etag')?.trim();
}

/**
 * Extract Last-Modified from response headers
 */
export function extractLastModified(headers: RawHeaders): string | undefined {
  return getHeader(headers, 'last-modified')?.trim();
}

/**
 * Parse an HTTP date header to a timestamp
 */
export function parseDateHeader(header: string | undefined): number | undefined {
  if (!header) return undefined;
  const date = new Date(header);
  return isNaN(date.getTime()) ? undefined : date.getTime();
}

/**
 * Parse Vary header into a sorted list of lowercase header names
 */
export function parseVary(header: string | undefined | null): string[] {
  if (!header) return [];
  const names = header
    .split(',')
    .map((h) => h.trim().toLowerCase())
    .filter((h) => h.length > 0);
  if (names.includes('*')) return ['*'];
  return [...new Set(names)].sort();
}

/**
 * Check if Vary header indicates uncacheable
 */
export function isVaryUncacheable(vary: string | undefined | null): boolean {
  return parseVary(vary).includes('*');
}

/**
 * Extract the request values of the varied headers. Absent headers map to ''.
 */
export function extractVaryHeaders(
  requestHeaders: Record<string, string> | undefined,
  vary: string[]
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of vary) {
    if (name === '*') continue;
    result[name.toLowerCase()] = getHeaderValue(requestHeaders, name) ?? '';
  }
  return result;
}

/**
 * Freshness lifetime of a stored response in seconds
 */
export function freshnessLifetime(
  headers: RawHeaders,
  directives: CacheControlDirectives,
  storedAt: number
): number {
  if (directives.noCache) {
    return 0;
  }

  if (directives.maxAge !== undefined) {
    return directives.maxAge;
  }

  const expires = parseDateHeader(getHeader(headers, 'expires'));
  if (expires !== undefined) {
    const date = parseDateHeader(getHeader(headers, 'date')) ?? storedAt;
    return Math.max(0, (expires - date) / 1000);
  }

  return 0;
}

/**
 * Age of a stored response in seconds
 */
export function currentAge(headers: RawHeaders, storedAt: number, now: number): number {
  const ageHeader = parseSeconds(getHeader(headers, 'age')?.trim()) ?? 0;
  return Math.max(0, (now - storedAt) / 1000) + ageHeader;
}

/**
 * Check if request method is in a method list
 */
export function isMethodIn(method: string, methods: string[]): boolean {
  const upper = method.toUpperCase();
  return methods.some((m) => m.toUpperCase() === upper);
}
