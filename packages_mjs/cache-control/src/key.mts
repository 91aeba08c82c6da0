/**
 * Cache key derivation
 *
 * Keys are SHA-256 hashes of the method, the normalized absolute URL and,
 * for responses that declared Vary, the request's values of the varied
 * headers.
 */

import { createHash } from 'node:crypto';

/**
 * Normalize an absolute URL: lowercase scheme and host, drop the default
 * port and the fragment, keep path and query as they are.
 *
 * @throws TypeError when the URL is not absolute
 */
export function normalizeUrl(url: string): string {
  const parsed = new URL(url);
  parsed.hash = '';
  return parsed.href;
}

/**
 * Generate a deterministic cache key.
 *
 * @example
 * ```ts
 * deriveCacheKey('GET', 'https://api.example.com/widgets/1');
 * deriveCacheKey('GET', 'https://api.example.com/widgets/1', { 'accept-language': 'en' });
 * ```
 */
export function deriveCacheKey(
  method: string,
  url: string,
  varyValues?: Record<string, string>
): string {
  let input = `${method.toUpperCase()} ${normalizeUrl(url)}`;

  if (varyValues) {
    const names = Object.keys(varyValues)
      .map((name) => name.toLowerCase())
      .sort();
    const lowered = Object.fromEntries(
      Object.entries(varyValues).map(([name, value]) => [name.toLowerCase(), value])
    );
    for (const name of names) {
      input += `\n${name}: ${lowered[name] ?? ''}`;
    }
  }

  return createHash('sha256').update(input).digest('hex');
}
