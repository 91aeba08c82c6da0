/**
 * undici transport
 */

import { STATUS_CODES } from 'node:http';
import { request, type Dispatcher } from 'undici';
import type { Transport, TransportRequest, TransportResponse } from '@httpcache/cache-control';
import { toRawHeaders } from './headers.mjs';

/**
 * Transport that performs requests with undici's request(). Uses the
 * global dispatcher unless one is given.
 *
 * @example
 * const transport = createUndiciTransport(new Agent({ connections: 10 }));
 */
export function createUndiciTransport(dispatcher?: Dispatcher): Transport {
  return {
    async send(req: TransportRequest): Promise<TransportResponse> {
      const response = await request(req.url, {
        method: req.method,
        headers: req.headers,
        dispatcher,
      });

      const transferEncoding = response.headers['transfer-encoding'];
      const contentLength = response.headers['content-length'];
      const body = response.body;

      return {
        statusCode: response.statusCode,
        statusText: STATUS_CODES[response.statusCode] ?? '',
        headers: toRawHeaders(response.headers),
        body,
        chunked:
          typeof transferEncoding === 'string' &&
          transferEncoding.toLowerCase().includes('chunked'),
        contentLength:
          typeof contentLength === 'string' && /^\d+$/.test(contentLength.trim())
            ? parseInt(contentLength, 10)
            : undefined,
        async release(): Promise<void> {
          if (!body.destroyed && !body.readableEnded) {
            await body.dump();
          }
        },
      };
    },
  };
}
