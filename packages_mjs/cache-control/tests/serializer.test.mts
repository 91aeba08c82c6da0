/**
 * Tests for the JSON cache serializer
 */

import { describe, it, expect } from 'vitest';
import { CacheDecodeError } from '../src/errors.mjs';
import { JsonCacheSerializer } from '../src/serializer.mjs';
import type { StoredRecord } from '../src/types.mjs';

describe('JsonCacheSerializer', () => {
  const serializer = new JsonCacheSerializer();

  const entryRecord: StoredRecord = {
    kind: 'entry',
    entry: {
      statusCode: 200,
      statusText: 'OK',
      headers: [
        ['Content-Type', 'application/octet-stream'],
        ['Set-Cookie', 'a=1'],
        ['Set-Cookie', 'b=2'],
      ],
      body: Buffer.from([0, 1, 2, 255, 254]),
      storedAt: 1704067200000,
    },
  };

  it('should prefix the format version', () => {
    expect(serializer.encode(entryRecord).subarray(0, 5).toString('utf8')).toBe('cc=1,');
  });

  it('should round trip an entry with a binary body', () => {
    expect(serializer.decode(serializer.encode(entryRecord))).toEqual(entryRecord);
  });

  it('should round trip an entry without a body', () => {
    const record: StoredRecord = {
      kind: 'entry',
      entry: { statusCode: 301, statusText: '', headers: [], body: null, storedAt: 5 },
    };
    expect(serializer.decode(serializer.encode(record))).toEqual(record);
  });

  it('should round trip a vary index', () => {
    const record: StoredRecord = { kind: 'vary', headers: ['accept', 'accept-language'] };
    expect(serializer.decode(serializer.encode(record))).toEqual(record);
  });

  it('should decode arbitrary bytes to null', () => {
    expect(serializer.decode(Buffer.from([0xde, 0xad, 0xbe, 0xef]))).toBeNull();
    expect(serializer.decode(Buffer.alloc(0))).toBeNull();
  });

  it('should decode truncated records to null', () => {
    const bytes = serializer.encode(entryRecord);
    expect(serializer.decode(bytes.subarray(0, bytes.length - 3))).toBeNull();
  });

  it('should decode records failing validation to null', () => {
    const invalid = Buffer.from('cc=1,' + JSON.stringify({ kind: 'entry', statusCode: 42 }));
    expect(serializer.decode(invalid)).toBeNull();
  });

  it('should report the reason from decodeOrThrow', () => {
    expect(() => serializer.decodeOrThrow(Buffer.from('cc=2,{}'))).toThrow(CacheDecodeError);
    expect(() => serializer.decodeOrThrow(Buffer.from('cc=1,{'))).toThrow(
      'Cache record is not valid JSON'
    );
  });
});
