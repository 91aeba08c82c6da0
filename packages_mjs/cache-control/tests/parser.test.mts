/**
 * Tests for Cache-Control parsing and header utilities
 */

import { describe, it, expect } from 'vitest';
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
  normalizeHeaders,
  parseCacheControl,
  parseDateHeader,
  parseVary,
  setHeader,
} from '../src/parser.mjs';
import type { RawHeaders } from '../src/types.mjs';

const DATE = Date.UTC(2024, 0, 1, 12, 0, 0);

describe('parseCacheControl', () => {
  it('should return empty object for missing header', () => {
    expect(parseCacheControl(undefined)).toEqual({});
    expect(parseCacheControl(null)).toEqual({});
    expect(parseCacheControl('')).toEqual({});
  });

  it('should parse response directives', () => {
    expect(parseCacheControl('public, max-age=3600, must-revalidate')).toEqual({
      maxAge: 3600,
      mustRevalidate: true,
    });
  });

  it('should parse flags case-insensitively', () => {
    expect(parseCacheControl('No-Store, NO-CACHE, Must-Revalidate')).toEqual({
      noStore: true,
      noCache: true,
      mustRevalidate: true,
    });
  });

  it('should strip quotes from values', () => {
    expect(parseCacheControl('max-age="60"')).toEqual({ maxAge: 60 });
  });

  it('should ignore invalid numeric values', () => {
    expect(parseCacheControl('max-age=abc, s-maxage=-1, min-fresh=1.5')).toEqual({});
  });

  it('should parse request directives', () => {
    expect(parseCacheControl('max-stale=30, min-fresh=10, only-if-cached')).toEqual({
      maxStale: 30,
      minFresh: 10,
    });
  });

  it('should treat max-stale without a value as unlimited', () => {
    expect(parseCacheControl('max-stale').maxStale).toBe(Infinity);
  });

  it('should drop shared-cache and transform directives', () => {
    expect(
      parseCacheControl('private, s-maxage=120, immutable, no-transform, max-age=5')
    ).toEqual({ maxAge: 5 });
  });

  it('should ignore unknown directives', () => {
    expect(parseCacheControl('stale-if-error=60, max-age=5')).toEqual({ maxAge: 5 });
  });
});

describe('getHeader', () => {
  const headers: RawHeaders = [
    ['Content-Type', 'text/plain'],
    ['Set-Cookie', 'a=1'],
    ['set-cookie', 'b=2'],
  ];

  it('should look up names case-insensitively', () => {
    expect(getHeader(headers, 'content-type')).toBe('text/plain');
  });

  it('should join repeated headers', () => {
    expect(getHeader(headers, 'SET-COOKIE')).toBe('a=1, b=2');
  });

  it('should return undefined for absent headers', () => {
    expect(getHeader(headers, 'etag')).toBeUndefined();
  });
});

describe('setHeader', () => {
  it('should replace every occurrence and append the new value', () => {
    const headers: RawHeaders = [
      ['expires', 'old'],
      ['Content-Type', 'text/plain'],
      ['Expires', 'older'],
    ];
    expect(setHeader(headers, 'Expires', 'new')).toEqual([
      ['Content-Type', 'text/plain'],
      ['Expires', 'new'],
    ]);
  });

  it('should not modify the input', () => {
    const headers: RawHeaders = [['A', '1']];
    setHeader(headers, 'A', '2');
    expect(headers).toEqual([['A', '1']]);
  });
});

describe('getHeaderValue', () => {
  it('should find request headers case-insensitively', () => {
    expect(getHeaderValue({ 'Cache-Control': 'no-cache' }, 'cache-control')).toBe('no-cache');
  });

  it('should handle missing headers', () => {
    expect(getHeaderValue(undefined, 'cache-control')).toBeUndefined();
    expect(getHeaderValue({}, 'cache-control')).toBeUndefined();
  });
});

describe('normalizeHeaders', () => {
  it('should lowercase keys', () => {
    expect(normalizeHeaders({ 'Accept-Language': 'en', ACCEPT: '*/*' })).toEqual({
      'accept-language': 'en',
      accept: '*/*',
    });
  });

  it('should return empty object for undefined', () => {
    expect(normalizeHeaders(undefined)).toEqual({});
  });
});

describe('validators', () => {
  it('should extract and trim ETag', () => {
    expect(extractETag([['ETag', ' "v1" ']])).toBe('"v1"');
  });

  it('should extract Last-Modified', () => {
    const value = new Date(DATE).toUTCString();
    expect(extractLastModified([['last-modified', value]])).toBe(value);
  });

  it('should return undefined without validators', () => {
    expect(extractETag([])).toBeUndefined();
    expect(extractLastModified([])).toBeUndefined();
  });
});

describe('parseDateHeader', () => {
  it('should parse HTTP dates', () => {
    expect(parseDateHeader(new Date(DATE).toUTCString())).toBe(DATE);
  });

  it('should return undefined for invalid or missing dates', () => {
    expect(parseDateHeader('not a date')).toBeUndefined();
    expect(parseDateHeader(undefined)).toBeUndefined();
  });
});

describe('parseVary', () => {
  it('should lowercase, dedupe and sort names', () => {
    expect(parseVary('Accept-Language, accept-encoding, Accept-Language')).toEqual([
      'accept-encoding',
      'accept-language',
    ]);
  });

  it('should collapse to star when present', () => {
    expect(parseVary('Accept, *')).toEqual(['*']);
  });

  it('should return empty list for missing header', () => {
    expect(parseVary(undefined)).toEqual([]);
    expect(parseVary(' , ')).toEqual([]);
  });
});

describe('isVaryUncacheable', () => {
  it('should detect Vary: *', () => {
    expect(isVaryUncacheable('*')).toBe(true);
    expect(isVaryUncacheable('Accept')).toBe(false);
    expect(isVaryUncacheable(undefined)).toBe(false);
  });
});

describe('extractVaryHeaders', () => {
  it('should map absent request headers to empty strings', () => {
    expect(
      extractVaryHeaders({ 'Accept-Language': 'en' }, ['accept-language', 'accept'])
    ).toEqual({ 'accept-language': 'en', accept: '' });
  });

  it('should skip star', () => {
    expect(extractVaryHeaders({}, ['*'])).toEqual({});
  });
});

describe('freshnessLifetime', () => {
  it('should use max-age', () => {
    expect(freshnessLifetime([], { maxAge: 60 }, DATE)).toBe(60);
  });

  it('should prefer max-age over Expires', () => {
    const headers: RawHeaders = [['Expires', new Date(DATE + 3600000).toUTCString()]];
    expect(freshnessLifetime(headers, { maxAge: 60 }, DATE)).toBe(60);
  });

  it('should use Expires minus Date', () => {
    const headers: RawHeaders = [
      ['Date', new Date(DATE).toUTCString()],
      ['Expires', new Date(DATE + 120000).toUTCString()],
    ];
    expect(freshnessLifetime(headers, {}, DATE + 999000)).toBe(120);
  });

  it('should fall back to the storage time without Date', () => {
    const headers: RawHeaders = [['Expires', new Date(DATE + 30000).toUTCString()]];
    expect(freshnessLifetime(headers, {}, DATE)).toBe(30);
  });

  it('should never be negative', () => {
    const headers: RawHeaders = [['Expires', new Date(DATE - 30000).toUTCString()]];
    expect(freshnessLifetime(headers, {}, DATE)).toBe(0);
  });

  it('should be zero with no-cache', () => {
    expect(freshnessLifetime([], { noCache: true, maxAge: 60 }, DATE)).toBe(0);
  });

  it('should be zero without freshness information', () => {
    expect(freshnessLifetime([], {}, DATE)).toBe(0);
  });
});

describe('currentAge', () => {
  it('should add resident time to the Age header', () => {
    expect(currentAge([['Age', '10']], DATE, DATE + 5000)).toBe(15);
  });

  it('should ignore an invalid Age header', () => {
    expect(currentAge([['Age', 'soon']], DATE, DATE + 2000)).toBe(2);
  });

  it('should not go below zero when the clock moves back', () => {
    expect(currentAge([], DATE, DATE - 5000)).toBe(0);
  });
});

describe('isMethodIn', () => {
  it('should compare case-insensitively', () => {
    expect(isMethodIn('get', ['GET'])).toBe(true);
    expect(isMethodIn('POST', ['get'])).toBe(false);
  });
});
