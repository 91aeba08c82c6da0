/**
 * Freshness heuristics
 *
 * A heuristic runs on a network response before the storage decision and
 * may add freshness information the origin did not send.
 */

import { getHeader, parseCacheControl, parseDateHeader, setHeader } from './parser.mjs';
import type { CacheHeuristic, ResponseHead } from './types.mjs';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Base class for heuristics. Subclasses return the headers to set; the
 * base class applies them and adds a Warning header when anything changed.
 */
export abstract class BaseHeuristic implements CacheHeuristic {
  /**
   * Headers to set on the response, or null to leave it untouched
   */
  protected abstract updateHeaders(head: ResponseHead, now: number): Record<string, string> | null;

  protected warning(_head: ResponseHead): string | undefined {
    return '110 - "Response is Stale"';
  }

  apply(head: ResponseHead, now: number): ResponseHead {
    const updates = this.updateHeaders(head, now);
    if (!updates || Object.keys(updates).length === 0) {
      return head;
    }

    let headers = head.headers;
    for (const [name, value] of Object.entries(updates)) {
      headers = setHeader(headers, name, value);
    }

    const warning = this.warning(head);
    if (warning) {
      headers = [...headers, ['Warning', warning]];
    }

    return { ...head, headers };
  }
}

export interface ExpiresAfterOptions {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
}

/**
 * Mark every response fresh for a fixed period from now
 */
export class ExpiresAfter extends BaseHeuristic {
  private readonly deltaMs: number;

  constructor(options: ExpiresAfterOptions) {
    super();
    const { days = 0, hours = 0, minutes = 0, seconds = 0 } = options;
    this.deltaMs = (((days * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000;
  }

  protected updateHeaders(_head: ResponseHead, now: number): Record<string, string> {
    return {
      Expires: new Date(now + this.deltaMs).toUTCString(),
      'Cache-Control': 'public',
    };
  }
}

/**
 * RFC 7234 section 4.2.2: a response with Last-Modified but no explicit
 * freshness stays fresh for a tenth of the time since it was modified,
 * capped at one day.
 */
export class LastModifiedHeuristic extends BaseHeuristic {
  private static readonly CACHEABLE_BY_DEFAULT = new Set([
    200, 203, 204, 206, 300, 301, 404, 405, 410, 414, 501,
  ]);

  protected updateHeaders(head: ResponseHead): Record<string, string> | null {
    if (!LastModifiedHeuristic.CACHEABLE_BY_DEFAULT.has(head.statusCode)) {
      return null;
    }

    const directives = parseCacheControl(getHeader(head.headers, 'cache-control'));
    if (getHeader(head.headers, 'expires') !== undefined || directives.maxAge !== undefined) {
      return null;
    }
    if (directives.noStore || directives.noCache) {
      return null;
    }

    const date = parseDateHeader(getHeader(head.headers, 'date'));
    const lastModified = parseDateHeader(getHeader(head.headers, 'last-modified'));
    if (date === undefined || lastModified === undefined || lastModified > date) {
      return null;
    }

    const freshnessMs = Math.min((date - lastModified) / 10, ONE_DAY_MS);
    return { Expires: new Date(date + freshnessMs).toUTCString() };
  }

  protected warning(): undefined {
    return undefined;
  }
}
