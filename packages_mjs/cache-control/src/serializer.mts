/**
 * Stored record serialization
 *
 * Format: the ASCII prefix `cc=1,` followed by a JSON document. Bodies are
 * base64 encoded. Anything that does not match the schema decodes to null.
 */

import { z } from 'zod';
import { CacheDecodeError } from './errors.mjs';
import type { CacheSerializer, RawHeaders, StoredRecord } from './types.mjs';

const FORMAT_PREFIX = 'cc=1,';

const HeaderPairSchema = z.tuple([z.string(), z.string()]);

const EntryRecordSchema = z.object({
  kind: z.literal('entry'),
  statusCode: z.number().int().min(100).max(599),
  statusText: z.string(),
  headers: z.array(HeaderPairSchema),
  body: z.string().base64().nullable(),
  storedAt: z.number().finite(),
});

const VaryRecordSchema = z.object({
  kind: z.literal('vary'),
  headers: z.array(z.string().min(1)),
});

const StoredRecordSchema = z.discriminatedUnion('kind', [EntryRecordSchema, VaryRecordSchema]);

type SerializedRecord = z.infer<typeof StoredRecordSchema>;

/**
 * JSON serializer validated with zod
 */
export class JsonCacheSerializer implements CacheSerializer {
  encode(record: StoredRecord): Buffer {
    let serialized: SerializedRecord;
    if (record.kind === 'vary') {
      serialized = { kind: 'vary', headers: record.headers };
    } else {
      const { entry } = record;
      serialized = {
        kind: 'entry',
        statusCode: entry.statusCode,
        statusText: entry.statusText,
        headers: entry.headers,
        body: entry.body ? entry.body.toString('base64') : null,
        storedAt: entry.storedAt,
      };
    }
    return Buffer.from(FORMAT_PREFIX + JSON.stringify(serialized), 'utf8');
  }

  /**
   * Decode bytes, raising CacheDecodeError with the reason on failure
   */
  decodeOrThrow(bytes: Buffer): StoredRecord {
    const text = bytes.toString('utf8');
    if (!text.startsWith(FORMAT_PREFIX)) {
      throw new CacheDecodeError('Unknown cache record format');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text.slice(FORMAT_PREFIX.length));
    } catch (error) {
      throw new CacheDecodeError('Cache record is not valid JSON', { cause: error });
    }

    const parsed = StoredRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CacheDecodeError(`Cache record failed validation: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    if (data.kind === 'vary') {
      return { kind: 'vary', headers: data.headers };
    }

    const headers: RawHeaders = data.headers.map(([name, value]) => [name, value]);
    return {
      kind: 'entry',
      entry: {
        statusCode: data.statusCode,
        statusText: data.statusText,
        headers,
        body: data.body === null ? null : Buffer.from(data.body, 'base64'),
        storedAt: data.storedAt,
      },
    };
  }

  decode(bytes: Buffer): StoredRecord | null {
    try {
      return this.decodeOrThrow(bytes);
    } catch (error) {
      if (error instanceof CacheDecodeError) {
        return null;
      }
      throw error;
    }
  }
}

export function createJsonCacheSerializer(): JsonCacheSerializer {
  return new JsonCacheSerializer();
}
