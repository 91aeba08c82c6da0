/**
 * Tests for freshness heuristics
 */

import { describe, it, expect } from 'vitest';
import { ExpiresAfter, LastModifiedHeuristic } from '../src/heuristics.mjs';
import type { ResponseHead } from '../src/types.mjs';

const NOW = Date.UTC(2024, 0, 11, 0, 0, 0);
const DAY = 24 * 60 * 60 * 1000;

describe('ExpiresAfter', () => {
  it('should set Expires, public Cache-Control and a Warning', () => {
    const head: ResponseHead = {
      statusCode: 200,
      headers: [
        ['Content-Type', 'text/plain'],
        ['cache-control', 'no-cache'],
      ],
    };

    const result = new ExpiresAfter({ days: 1 }).apply(head, NOW);

    expect(result.statusCode).toBe(200);
    expect(result.headers).toEqual([
      ['Content-Type', 'text/plain'],
      ['Expires', new Date(NOW + DAY).toUTCString()],
      ['Cache-Control', 'public'],
      ['Warning', '110 - "Response is Stale"'],
    ]);
  });

  it('should combine all units', () => {
    const result = new ExpiresAfter({ hours: 1, minutes: 2, seconds: 3 }).apply(
      { statusCode: 200, headers: [] },
      NOW
    );
    expect(result.headers[0]).toEqual(['Expires', new Date(NOW + 3723000).toUTCString()]);
  });

  it('should not modify the input head', () => {
    const head: ResponseHead = { statusCode: 200, headers: [] };
    new ExpiresAfter({ seconds: 10 }).apply(head, NOW);
    expect(head.headers).toEqual([]);
  });
});

describe('LastModifiedHeuristic', () => {
  const heuristic = new LastModifiedHeuristic();
  const date = new Date(NOW).toUTCString();

  it('should expire after a tenth of the time since modification', () => {
    const lastModified = new Date(NOW - 5 * DAY).toUTCString();
    const head: ResponseHead = {
      statusCode: 200,
      headers: [
        ['Date', date],
        ['Last-Modified', lastModified],
      ],
    };

    expect(heuristic.apply(head, NOW).headers).toEqual([
      ['Date', date],
      ['Last-Modified', lastModified],
      ['Expires', new Date(NOW + DAY / 2).toUTCString()],
    ]);
  });

  it('should cap freshness at one day', () => {
    const head: ResponseHead = {
      statusCode: 200,
      headers: [
        ['Date', date],
        ['Last-Modified', new Date(NOW - 100 * DAY).toUTCString()],
      ],
    };

    const result = heuristic.apply(head, NOW);
    expect(result.headers[2]).toEqual(['Expires', new Date(NOW + DAY).toUTCString()]);
  });

  it('should leave responses with explicit freshness untouched', () => {
    const head: ResponseHead = {
      statusCode: 200,
      headers: [
        ['Date', date],
        ['Last-Modified', new Date(NOW - DAY).toUTCString()],
        ['Cache-Control', 'max-age=5'],
      ],
    };
    expect(heuristic.apply(head, NOW)).toBe(head);
  });

  it('should leave statuses that are not cacheable by default untouched', () => {
    const head: ResponseHead = {
      statusCode: 500,
      headers: [
        ['Date', date],
        ['Last-Modified', new Date(NOW - DAY).toUTCString()],
      ],
    };
    expect(heuristic.apply(head, NOW)).toBe(head);
  });

  it('should need both Date and Last-Modified', () => {
    const head: ResponseHead = { statusCode: 200, headers: [['Date', date]] };
    expect(heuristic.apply(head, NOW)).toBe(head);
  });
});
