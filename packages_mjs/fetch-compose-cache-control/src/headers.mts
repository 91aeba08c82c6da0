/**
 * Conversions between undici header shapes and the cache's raw header list
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { Dispatcher } from 'undici';
import type { RawHeaders } from '@httpcache/cache-control';

type HeaderValue = string | string[] | undefined;

function isHeaderIterable(headers: object): headers is Iterable<[string, HeaderValue]> {
  return Symbol.iterator in headers;
}

function joinValue(value: HeaderValue): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.join(', ');
  return undefined;
}

/**
 * Extract request headers from any of the shapes undici accepts. Names are
 * lowercased; repeated names are joined.
 */
export function extractHeaders(
  headers: Dispatcher.DispatchOptions['headers']
): Record<string, string> | undefined {
  if (!headers) return undefined;

  const result: Record<string, string> = {};
  const add = (key: string, value: HeaderValue): void => {
    const joined = joinValue(value);
    if (joined === undefined) return;
    const name = key.toLowerCase();
    result[name] = result[name] === undefined ? joined : `${result[name]}, ${joined}`;
  };

  if (Array.isArray(headers)) {
    for (let i = 0; i + 1 < headers.length; i += 2) {
      add(String(headers[i]), String(headers[i + 1]));
    }
  } else if (isHeaderIterable(headers)) {
    for (const [key, value] of headers) {
      add(key, value);
    }
  } else {
    for (const [key, value] of Object.entries(headers)) {
      add(key, value);
    }
  }

  return Object.keys(result).length > 0 ? result : undefined;
}

/**
 * Overlay headers, replacing existing names case-insensitively
 */
export function mergeHeaders(
  base: Record<string, string> | undefined,
  overrides: Record<string, string>
): Record<string, string> {
  const overridden = new Set(Object.keys(overrides).map((name) => name.toLowerCase()));
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(base ?? {})) {
    if (!overridden.has(name.toLowerCase())) {
      result[name] = value;
    }
  }
  return { ...result, ...overrides };
}

/**
 * Parse undici's flat response header array into pairs
 */
export function parseRawHeaders(headers: Buffer[] | string[] | null | undefined): RawHeaders {
  const result: RawHeaders = [];
  if (!headers) return result;

  for (let i = 0; i + 1 < headers.length; i += 2) {
    result.push([headers[i].toString(), headers[i + 1].toString()]);
  }
  return result;
}

/**
 * Flatten pairs back into undici's response header array
 */
export function toBufferHeaders(headers: RawHeaders): Buffer[] {
  const result: Buffer[] = [];
  for (const [name, value] of headers) {
    result.push(Buffer.from(name), Buffer.from(value));
  }
  return result;
}

/**
 * Convert a parsed header object, as returned by undici's request(), to pairs
 */
export function toRawHeaders(headers: IncomingHttpHeaders): RawHeaders {
  const result: RawHeaders = [];
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result.push([name, value]);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        result.push([name, item]);
      }
    }
  }
  return result;
}
